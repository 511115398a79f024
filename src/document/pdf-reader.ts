/**
 * pdf-lib reader for the three compliance metadata locations.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import {
  PDFBool,
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFRawStream,
  PDFString,
  decodePDFRawStream,
} from "pdf-lib";
import { comparePdfVersions, normalizePdfVersion, parsePdfVersion } from "../profiles/version-rule.js";
import { DocumentNotFoundError, type DocumentReader } from "./types.js";

/** Header must appear within the first KB of the file. */
const HEADER_SCAN_BYTES = 1024;
const HEADER_PATTERN = /%PDF-(\d+)\.(\d+)/;

export interface PdfHandle {
  readonly path: string;
  /** Version from the file header, "major.minor" */
  readonly headerVersion: string | undefined;
  document: PDFDocument | undefined;
}

function readHeaderVersion(bytes: Uint8Array): string | undefined {
  const head = Buffer.from(bytes.subarray(0, HEADER_SCAN_BYTES)).toString("latin1");
  const match = HEADER_PATTERN.exec(head);
  return match ? `${Number(match[1])}.${Number(match[2])}` : undefined;
}

/**
 * Name text without the leading slash, with #xx escapes decoded.
 */
function nameText(name: PDFName): string {
  return name
    .asString()
    .replace(/^\//, "")
    .replace(/#([0-9A-Fa-f]{2})/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)));
}

function openDocument(handle: PdfHandle): PDFDocument {
  if (!handle.document) {
    throw new Error(`Document handle for ${handle.path} is closed`);
  }
  return handle.document;
}

export class PdfDocumentReader implements DocumentReader<PdfHandle> {
  /**
   * @throws DocumentNotFoundError when the file is missing
   * @throws whatever pdf-lib raises for an unparseable file
   */
  async open(path: string): Promise<PdfHandle> {
    if (!existsSync(path)) {
      throw new DocumentNotFoundError(path);
    }

    const bytes = await readFile(path);
    const document = await PDFDocument.load(bytes, { updateMetadata: false });
    return { path, headerVersion: readHeaderVersion(bytes), document };
  }

  /**
   * Header version, raised by the catalog /Version entry when that is
   * newer (PDF 1.4+ lets an incremental update bump the version there).
   */
  getDeclaredVersion(handle: PdfHandle): string {
    const document = openDocument(handle);
    const header =
      handle.headerVersion ?? normalizePdfVersion(document.context.header.toString()) ?? "";

    const override = document.catalog.lookup(PDFName.of("Version"));
    if (override instanceof PDFName) {
      const catalogVersion = normalizePdfVersion(nameText(override));
      const fromCatalog = catalogVersion ? parsePdfVersion(catalogVersion) : undefined;
      const fromHeader = parsePdfVersion(header);
      if (catalogVersion && fromCatalog && (!fromHeader || comparePdfVersions(fromCatalog, fromHeader) > 0)) {
        return catalogVersion;
      }
    }

    return header;
  }

  getCatalogEntry(handle: PdfHandle, key: string): string | undefined {
    const value = openDocument(handle).catalog.lookup(PDFName.of(key));
    if (value instanceof PDFString || value instanceof PDFHexString) {
      return value.decodeText();
    }
    if (value instanceof PDFName) {
      return nameText(value);
    }
    return undefined;
  }

  getCatalogStructureFlag(handle: PdfHandle): boolean | undefined {
    const markInfo = openDocument(handle).catalog.lookup(PDFName.of("MarkInfo"));
    if (!(markInfo instanceof PDFDict)) {
      return undefined;
    }
    const marked = markInfo.lookup(PDFName.of("Marked"));
    return marked instanceof PDFBool ? marked.asBoolean() : undefined;
  }

  getMetadataPacket(handle: PdfHandle): Uint8Array | undefined {
    const metadata = openDocument(handle).catalog.lookup(PDFName.of("Metadata"));
    if (!(metadata instanceof PDFRawStream)) {
      return undefined;
    }
    return decodePDFRawStream(metadata).decode();
  }

  close(handle: PdfHandle): void {
    handle.document = undefined;
  }
}
