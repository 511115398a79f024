/**
 * Document collaborators: interfaces plus the pdf-lib implementations.
 */

export {
  DocumentNotFoundError,
  withDocument,
  type DocumentAuthor,
  type DocumentReader,
  type InfoField,
} from "./types.js";

export { PdfAuthoringSession } from "./pdf-author.js";
export { PdfDocumentReader, type PdfHandle } from "./pdf-reader.js";
export { layoutSamplePage, wrapText, toWinAnsi, type PageContent } from "./layout.js";
