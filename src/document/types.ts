/**
 * Document collaborator interfaces.
 *
 * The metadata writer and compliance checker only see these narrow
 * surfaces; the pdf-lib implementations live beside them.
 */

/** Document-information dictionary keys the writer fills in. */
export type InfoField = "Title" | "Author" | "Subject" | "Keywords" | "Creator" | "Producer";

/**
 * Authoring side: everything the metadata writer needs to stamp a document.
 */
export interface DocumentAuthor {
  setInfoField(key: InfoField, value: string): void;
  setCatalogEntry(key: string, value: string): void;
  setCatalogStructureFlag(marked: boolean): void;
  attachMetadataPacket(packet: Uint8Array): void;
}

/**
 * Reading side: one open document per handle.
 */
export interface DocumentReader<THandle = unknown> {
  /** @throws DocumentNotFoundError when nothing exists at `path` */
  open(path: string): Promise<THandle>;
  /** Declared PDF version as "major.minor" */
  getDeclaredVersion(handle: THandle): string;
  getCatalogEntry(handle: THandle, key: string): string | undefined;
  getCatalogStructureFlag(handle: THandle): boolean | undefined;
  getMetadataPacket(handle: THandle): Uint8Array | undefined;
  close(handle: THandle): void;
}

/**
 * Raised when the document to read does not exist. This is caller misuse,
 * never reported as a compliance issue.
 */
export class DocumentNotFoundError extends Error {
  public readonly path: string;

  constructor(path: string) {
    super(`PDF file not found: ${path}`);
    this.name = "DocumentNotFoundError";
    this.path = path;
  }
}

/**
 * Open a document, run `fn`, and close the handle on every exit path.
 */
export async function withDocument<THandle, TResult>(
  reader: DocumentReader<THandle>,
  path: string,
  fn: (handle: THandle) => TResult | Promise<TResult>
): Promise<TResult> {
  const handle = await reader.open(path);
  try {
    return await fn(handle);
  } finally {
    reader.close(handle);
  }
}
