/**
 * pdf-lib authoring session.
 *
 * Everything is staged on an in-memory PDFDocument; nothing reaches disk
 * until save(), so a failed stamp or layout never leaves a partial file.
 */

import { writeFile } from "node:fs/promises";
import { PDFDocument, PDFName, PDFString } from "pdf-lib";
import { parsePdfVersion, type PdfVersion } from "../profiles/version-rule.js";
import type { DocumentAuthor, InfoField } from "./types.js";
import { layoutSamplePage, type PageContent } from "./layout.js";

/**
 * Escape a value for a PDF literal string.
 */
function escapeLiteral(value: string): string {
  return value.replace(/[\\()]/g, "\\$&");
}

const HEADER_PATTERN = /^%PDF-\d\.\d$/;

/**
 * Rewrite the `%PDF-x.y` header of saved bytes in place.
 *
 * pdf-lib always serializes a 1.7 header whatever `context.header` says.
 * The replacement has the same length, so xref offsets stay valid.
 */
export function stampHeaderVersion(bytes: Uint8Array, version: PdfVersion): Uint8Array {
  const header = Buffer.from(bytes.subarray(0, 8)).toString("latin1");
  if (!HEADER_PATTERN.test(header)) {
    throw new Error(`Unexpected PDF header "${header}"`);
  }
  bytes.set(Buffer.from(`${version.major}.${version.minor}`, "latin1"), 5);
  return bytes;
}

export class PdfAuthoringSession implements DocumentAuthor {
  private constructor(
    public readonly document: PDFDocument,
    private readonly version: PdfVersion
  ) {}

  /**
   * Start a new document whose header declares `pdfVersion` ("1.6", "2.0").
   */
  static async create(pdfVersion: string): Promise<PdfAuthoringSession> {
    const version = parsePdfVersion(pdfVersion);
    // The header holds one digit on each side of the dot.
    if (!version || version.major > 9 || version.minor > 9) {
      throw new Error(`Cannot author a document with PDF version "${pdfVersion}"`);
    }

    const document = await PDFDocument.create();
    return new PdfAuthoringSession(document, version);
  }

  setInfoField(key: InfoField, value: string): void {
    switch (key) {
      case "Title":
        this.document.setTitle(value);
        break;
      case "Author":
        this.document.setAuthor(value);
        break;
      case "Subject":
        this.document.setSubject(value);
        break;
      case "Keywords":
        this.document.setKeywords([value]);
        break;
      case "Creator":
        this.document.setCreator(value);
        break;
      case "Producer":
        this.document.setProducer(value);
        break;
    }
  }

  setCatalogEntry(key: string, value: string): void {
    this.document.catalog.set(PDFName.of(key), PDFString.of(escapeLiteral(value)));
  }

  setCatalogStructureFlag(marked: boolean): void {
    const markInfo = this.document.context.obj({ Marked: marked });
    this.document.catalog.set(PDFName.of("MarkInfo"), markInfo);
  }

  attachMetadataPacket(packet: Uint8Array): void {
    const stream = this.document.context.stream(packet, {
      Type: "Metadata",
      Subtype: "XML",
      Length: packet.length,
    });
    const ref = this.document.context.register(stream);
    this.document.catalog.set(PDFName.of("Metadata"), ref);
  }

  /**
   * Lay out the sample page for this document.
   */
  async layout(content: PageContent): Promise<void> {
    await layoutSamplePage(this.document, content);
  }

  async toBytes(): Promise<Uint8Array> {
    return stampHeaderVersion(await this.document.save(), this.version);
  }

  async save(outputPath: string): Promise<void> {
    await writeFile(outputPath, await this.toBytes());
  }
}
