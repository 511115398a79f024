/**
 * PDF/VT metadata generation.
 */

export {
  buildXmpPacket,
  encodeXmpPacket,
  escapeXml,
  formatXmpDate,
  type XmpFields,
  type XmpOptions,
} from "./xmp.js";

export {
  MetadataWriter,
  CREATOR_TOOL,
  PRODUCER,
  DEFAULT_AUTHOR,
  type DocumentInfo,
  type MetadataWriterOptions,
  type CreatedDocument,
} from "./writer.js";
