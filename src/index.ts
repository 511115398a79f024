/**
 * pdfvt-toolkit: PDF/VT-1 and PDF/VT-3 document generation and
 * compliance checking.
 *
 * @example
 *   const registry = createDefaultRegistry();
 *   const writer = new MetadataWriter(registry);
 *   await writer.createDocument(VT3, "statement.pdf");
 *
 *   const checker = new ComplianceChecker(registry, new PdfDocumentReader());
 *   await checker.isCompliant("statement.pdf", VT3); // true
 */

export * from "./profiles/index.js";
export * from "./metadata/index.js";
export * from "./compliance/index.js";
export * from "./document/index.js";
export { loadConfig, validateConfig, ConfigError, type AppConfig } from "./config/index.js";
export {
  createLogger,
  silentLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logging/index.js";
