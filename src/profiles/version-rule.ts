/**
 * PDF version parsing and rule evaluation.
 */

import type { PdfVersionRule } from "./schema.js";

export interface PdfVersion {
  major: number;
  minor: number;
}

export interface RuleEvaluation {
  satisfied: boolean;
  /** Mismatch explanation, present when not satisfied */
  issue?: string;
}

const DOTTED = /^(\d+)\.(\d+)$/;
const HEADER = /^%?PDF-(\d+)\.(\d+)/;
const COMPACT = /^(\d)(\d)$/;

/**
 * Normalize a declared version to "major.minor".
 *
 * Accepts "1.6", a header such as "%PDF-1.6", or the compact "16" form
 * some PDF libraries report. Returns undefined for anything else.
 */
export function normalizePdfVersion(raw: string): string | undefined {
  const text = raw.trim();
  const match = DOTTED.exec(text) ?? HEADER.exec(text) ?? COMPACT.exec(text);
  if (!match) {
    return undefined;
  }
  return `${Number(match[1])}.${Number(match[2])}`;
}

/**
 * Parse a "major.minor" version string.
 */
export function parsePdfVersion(text: string): PdfVersion | undefined {
  const normalized = normalizePdfVersion(text);
  if (normalized === undefined) {
    return undefined;
  }
  const [major, minor] = normalized.split(".").map(Number);
  return { major, minor };
}

/**
 * Order two versions: negative when a < b, zero when equal, positive when a > b.
 */
export function comparePdfVersions(a: PdfVersion, b: PdfVersion): number {
  return a.major !== b.major ? a.major - b.major : a.minor - b.minor;
}

/**
 * Human-readable rule, e.g. "PDF 1.6+" or "PDF 2.0".
 */
export function describeVersionRule(rule: PdfVersionRule): string {
  switch (rule.kind) {
    case "atLeast":
      return `PDF ${rule.major}.${rule.minor}+`;
    case "exactly":
      return `PDF ${rule.version}`;
  }
}

/**
 * The version a writer declares for a document targeting this rule:
 * the minimum for "atLeast", the only allowed value for "exactly".
 */
export function targetPdfVersion(rule: PdfVersionRule): string {
  switch (rule.kind) {
    case "atLeast":
      return `${rule.major}.${rule.minor}`;
    case "exactly":
      return rule.version;
  }
}

/**
 * Check a declared PDF version against a profile rule.
 *
 * "atLeast" passes on a higher major version regardless of minor;
 * "exactly" is plain string equality, so a newer version fails too.
 * A missing or unparseable version never satisfies a rule.
 *
 * @param label - Variant marker used in the mismatch message
 */
export function evaluateVersionRule(
  rule: PdfVersionRule,
  declared: string | undefined,
  label: string
): RuleEvaluation {
  const found = declared ?? "unknown version";
  const mismatch = `${label} requires ${describeVersionRule(rule)}, found ${found}`;

  switch (rule.kind) {
    case "atLeast": {
      const version = declared === undefined ? undefined : parsePdfVersion(declared);
      if (version && comparePdfVersions(version, { major: rule.major, minor: rule.minor }) >= 0) {
        return { satisfied: true };
      }
      return { satisfied: false, issue: mismatch };
    }
    case "exactly":
      return declared === rule.version
        ? { satisfied: true }
        : { satisfied: false, issue: mismatch };
  }
}
