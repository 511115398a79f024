/**
 * Text rendering of a compliance result for terminals and logs.
 */

import type { ComplianceResult } from "./result.js";

const mark = (ok: boolean): string => (ok ? "✓" : "✗");

/**
 * Render a result as an indented report.
 *
 * @example
 *   PDF/VT Compliance Check Results
 *      PDF Version: 1.6
 *      Detected: PDF/VT-1
 *      Compliant: ✓ Yes
 */
export function formatComplianceResult(result: ComplianceResult): string {
  const lines = [
    "PDF/VT Compliance Check Results",
    `   PDF Version: ${result.declaredPdfVersion ?? "unknown"}`,
    `   Detected: ${result.rawMarker ?? "Not PDF/VT"}`,
    `   Compliant: ${result.isCompliant ? "✓ Yes" : "✗ No"}`,
    "",
    "   Validation Details:",
    `   ├─ GTS in Catalog: ${mark(result.hasCatalogMarker)}`,
    `   ├─ GTS in XMP:     ${mark(result.hasPacketMarker)}`,
    `   └─ MarkInfo:       ${mark(result.hasStructureFlag)}`,
  ];

  if (result.issues.length > 0) {
    lines.push("", "   Issues:");
    for (const issue of result.issues) {
      lines.push(`   ⚠ ${issue}`);
    }
  }

  return lines.join("\n");
}
