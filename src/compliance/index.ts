/**
 * PDF/VT compliance checking.
 *
 * Usage:
 *   const checker = new ComplianceChecker(registry, new PdfDocumentReader());
 *   const result = await checker.check("statement.pdf");
 *   console.log(formatComplianceResult(result));
 */

export { ComplianceChecker, type ComplianceCheckerOptions } from "./checker.js";

export {
  ComplianceResultSchema,
  ComplianceReportSchema,
  buildComplianceReport,
  createDraft,
  finalizeResult,
  type ComplianceResult,
  type ComplianceDraft,
  type ComplianceReport,
} from "./result.js";

export { formatComplianceResult } from "./format.js";
