/**
 * Version profile schema.
 *
 * A version profile is the data description of one PDF/VT variant: the
 * marker string written into the catalog and XMP packet, the PDF version
 * rule the variant imposes, and the extra XMP properties it needs.
 *
 * The marker is the join key between the three metadata locations
 * (catalog entry, XMP packet, and the checker's registry lookup), so it
 * must be unique and must never change for a published variant.
 */

import { z } from "zod";

/** Key under which the marker is stored in the catalog and the XMP packet. */
export const COMPLIANCE_KEY = "GTS_PDFVTVersion";

/**
 * XMP namespaces every generated packet declares.
 * Extra namespaces in a profile may reuse these prefixes without a URI.
 */
export const STANDARD_XMP_NAMESPACES = {
  dc: "http://purl.org/dc/elements/1.1/",
  xmp: "http://ns.adobe.com/xap/1.0/",
  pdf: "http://ns.adobe.com/pdf/1.3/",
  pdfx: "http://ns.adobe.com/pdfx/1.3/",
  pdfxid: "http://www.npes.org/pdfx/ns/id/",
  pdfvtid: "http://www.npes.org/pdfvt/ns/id/",
} as const;

export type StandardXmpPrefix = keyof typeof STANDARD_XMP_NAMESPACES;

/** Prefixes owned by the packet envelope; never usable by a profile. */
export const RESERVED_XMP_PREFIXES: readonly string[] = ["x", "rdf", "xml"];

export function isStandardXmpPrefix(prefix: string): prefix is StandardXmpPrefix {
  return Object.prototype.hasOwnProperty.call(STANDARD_XMP_NAMESPACES, prefix);
}

/**
 * Variant identifier used by callers (e.g. "VT1", "VT3").
 */
export const VariantId = z
  .string()
  .regex(/^[A-Z][A-Z0-9_]*$/, "Variant id must be upper-case letters, digits or underscores");
export type VariantId = z.infer<typeof VariantId>;

/**
 * An XML name usable as a namespace prefix or property local name.
 */
const XmlName = z.string().regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, "Must be a valid XML name");

/**
 * Minimum PDF version, e.g. PDF/VT-1 accepts 1.6 and anything newer.
 */
export const AtLeastRuleSchema = z.object({
  kind: z.literal("atLeast"),
  major: z.number().int().min(1),
  minor: z.number().int().min(0),
});

/**
 * Exact PDF version, e.g. PDF/VT-3 accepts "2.0" only.
 */
export const ExactlyRuleSchema = z.object({
  kind: z.literal("exactly"),
  version: z.string().regex(/^\d+\.\d+$/, "Version must look like \"major.minor\""),
});

export const PdfVersionRuleSchema = z.discriminatedUnion("kind", [
  AtLeastRuleSchema,
  ExactlyRuleSchema,
]);
export type PdfVersionRule = z.infer<typeof PdfVersionRuleSchema>;

/**
 * Additional XMP properties grouped under one namespace prefix.
 */
export const MetadataNamespaceSchema = z.object({
  /** Namespace URI; required unless the prefix is a standard one */
  uri: z.string().url().optional(),
  /** Property local name -> text value */
  properties: z
    .record(XmlName, z.string())
    .refine((props) => Object.keys(props).length > 0, "At least one property is required"),
});
export type MetadataNamespace = z.infer<typeof MetadataNamespaceSchema>;

export const VersionProfileSchema = z
  .object({
    id: VariantId,
    /**
     * Marker written verbatim to GTS_PDFVTVersion and the XMP packet.
     * XML special characters would be escaped in the packet and no longer
     * match the catalog text, so they are refused.
     */
    marker: z
      .string()
      .min(1)
      .regex(/^[\x20-\x7E]+$/, "Marker must be printable ASCII")
      .regex(/^[^&<>"']+$/, "Marker must not contain XML special characters"),
    pdfVersionRule: PdfVersionRuleSchema,
    /** Production standard the variant extends (e.g. "PDF/X-4") */
    baseStandardName: z.string().min(1),
    /** Governing ISO document, display only */
    isoReference: z.string().min(1),
    /** Display-only feature lines, in order */
    featureDescriptions: z.array(z.string().min(1)),
    extraMetadataNamespaces: z.record(XmlName, MetadataNamespaceSchema).optional(),
  })
  .strict()
  .superRefine((profile, ctx) => {
    for (const [prefix, namespace] of Object.entries(profile.extraMetadataNamespaces ?? {})) {
      if (RESERVED_XMP_PREFIXES.includes(prefix)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["extraMetadataNamespaces", prefix],
          message: `Prefix "${prefix}" is reserved by the XMP envelope`,
        });
        continue;
      }

      if (isStandardXmpPrefix(prefix)) {
        if (namespace.uri !== undefined && namespace.uri !== STANDARD_XMP_NAMESPACES[prefix]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["extraMetadataNamespaces", prefix, "uri"],
            message: `Prefix "${prefix}" is bound to ${STANDARD_XMP_NAMESPACES[prefix]}`,
          });
        }
      } else if (namespace.uri === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["extraMetadataNamespaces", prefix, "uri"],
          message: `Namespace "${prefix}" is not a standard prefix and needs a uri`,
        });
      }
    }
  });

export type VersionProfile = z.infer<typeof VersionProfileSchema>;
