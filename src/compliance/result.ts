/**
 * Compliance verdict and the evidence behind it.
 *
 * A result is assembled by one check and frozen before it is returned;
 * callers treat it as a value.
 */

import { z } from "zod";
import { VariantId } from "../profiles/index.js";

export const ComplianceResultSchema = z.object({
  isCompliant: z.boolean(),
  /** Registered variant the marker resolved to */
  detectedVariant: VariantId.optional(),
  /** Marker as literally found, even when no profile matches it */
  rawMarker: z.string().optional(),
  /** Declared PDF version, "major.minor" */
  declaredPdfVersion: z.string().optional(),
  hasCatalogMarker: z.boolean(),
  hasPacketMarker: z.boolean(),
  hasStructureFlag: z.boolean(),
  /** Diagnostics in the order they were found */
  issues: z.array(z.string()),
});

type ComplianceFields = z.infer<typeof ComplianceResultSchema>;

export type ComplianceResult = Readonly<Omit<ComplianceFields, "issues">> & {
  readonly issues: readonly string[];
};

/**
 * Mutable result used while a check is running.
 */
export type ComplianceDraft = ComplianceFields;

export function createDraft(): ComplianceDraft {
  return {
    isCompliant: false,
    hasCatalogMarker: false,
    hasPacketMarker: false,
    hasStructureFlag: false,
    issues: [],
  };
}

export function finalizeResult(draft: ComplianceDraft): ComplianceResult {
  return Object.freeze({ ...draft, issues: Object.freeze([...draft.issues]) });
}

/**
 * Machine-readable report for one checked file.
 */
export const ComplianceReportSchema = z.object({
  file: z.string(),
  checkedAt: z.string().datetime(),
  result: ComplianceResultSchema,
});
export type ComplianceReport = z.infer<typeof ComplianceReportSchema>;

export function buildComplianceReport(
  file: string,
  result: ComplianceResult,
  checkedAt: Date = new Date()
): ComplianceReport {
  return {
    file,
    checkedAt: checkedAt.toISOString(),
    result: { ...result, issues: [...result.issues] },
  };
}
