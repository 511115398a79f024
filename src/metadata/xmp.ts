/**
 * XMP packet builder.
 *
 * The packet carries the variant marker twice (pdfx: and pdfvtid:
 * GTS_PDFVTVersion) plus whatever extra properties the profile declares,
 * e.g. PDF/VT-3's pdf:PDFVersion and pdfx6:GTS_PDFXConformance.
 */

import {
  COMPLIANCE_KEY,
  STANDARD_XMP_NAMESPACES,
  isStandardXmpPrefix,
  type VersionProfile,
} from "../profiles/index.js";

/** Adobe's fixed xpacket id. */
const XPACKET_ID = "W5M0MpCehiHzreSzNTczkc9d";

export interface XmpFields {
  title: string;
  creator: string;
  description: string;
  creatorTool: string;
  producer: string;
}

export interface XmpOptions {
  /** Create/modify timestamp; defaults to now */
  timestamp?: Date;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * XMP date without milliseconds, e.g. "2024-01-15T09:30:12Z".
 */
export function formatXmpDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function namespaceDeclarations(profile: Readonly<VersionProfile>): string[] {
  const declared = Object.entries(STANDARD_XMP_NAMESPACES).map(
    ([prefix, uri]) => `xmlns:${prefix}="${uri}"`
  );
  for (const [prefix, namespace] of Object.entries(profile.extraMetadataNamespaces ?? {})) {
    if (!isStandardXmpPrefix(prefix) && namespace.uri !== undefined) {
      declared.push(`xmlns:${prefix}="${escapeXml(namespace.uri)}"`);
    }
  }
  return declared;
}

function extraProperties(profile: Readonly<VersionProfile>): string[] {
  const lines: string[] = [];
  for (const [prefix, namespace] of Object.entries(profile.extraMetadataNamespaces ?? {})) {
    for (const [name, value] of Object.entries(namespace.properties)) {
      lines.push(`<${prefix}:${name}>${escapeXml(value)}</${prefix}:${name}>`);
    }
  }
  return lines;
}

/**
 * Build the packet text for `profile`.
 */
export function buildXmpPacket(
  profile: Readonly<VersionProfile>,
  fields: XmpFields,
  options: XmpOptions = {}
): string {
  const date = formatXmpDate(options.timestamp ?? new Date());
  const marker = escapeXml(profile.marker);
  const pad = (depth: number) => "  ".repeat(depth);

  const properties = [
    `<dc:title>`,
    `  <rdf:Alt>`,
    `    <rdf:li xml:lang="x-default">${escapeXml(fields.title)}</rdf:li>`,
    `  </rdf:Alt>`,
    `</dc:title>`,
    `<dc:creator>`,
    `  <rdf:Seq>`,
    `    <rdf:li>${escapeXml(fields.creator)}</rdf:li>`,
    `  </rdf:Seq>`,
    `</dc:creator>`,
    `<dc:description>`,
    `  <rdf:Alt>`,
    `    <rdf:li xml:lang="x-default">${escapeXml(fields.description)}</rdf:li>`,
    `  </rdf:Alt>`,
    `</dc:description>`,
    `<xmp:CreatorTool>${escapeXml(fields.creatorTool)}</xmp:CreatorTool>`,
    `<xmp:CreateDate>${date}</xmp:CreateDate>`,
    `<xmp:ModifyDate>${date}</xmp:ModifyDate>`,
    `<pdf:Producer>${escapeXml(fields.producer)}</pdf:Producer>`,
    `<pdfx:${COMPLIANCE_KEY}>${marker}</pdfx:${COMPLIANCE_KEY}>`,
    `<pdfvtid:${COMPLIANCE_KEY}>${marker}</pdfvtid:${COMPLIANCE_KEY}>`,
    ...extraProperties(profile),
  ];

  return [
    `<?xpacket begin="\uFEFF" id="${XPACKET_ID}"?>`,
    `<x:xmpmeta xmlns:x="adobe:ns:meta/">`,
    `${pad(1)}<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">`,
    `${pad(2)}<rdf:Description rdf:about=""`,
    ...namespaceDeclarations(profile).map((decl) => `${pad(4)}${decl}`),
    `${pad(4)}>`,
    ...properties.map((line) => `${pad(3)}${line}`),
    `${pad(2)}</rdf:Description>`,
    `${pad(1)}</rdf:RDF>`,
    `</x:xmpmeta>`,
    `<?xpacket end="w"?>`,
  ].join("\n");
}

/**
 * UTF-8 bytes of the packet, ready to attach to a document.
 */
export function encodeXmpPacket(packet: string): Uint8Array {
  return new TextEncoder().encode(packet);
}
