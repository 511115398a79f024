/**
 * PDF/VT version profiles.
 *
 * Each supported variant is a data record (marker, PDF version rule,
 * base standard, extra XMP properties). The registry is built once,
 * frozen, and shared by the writer and the checker.
 *
 * Usage:
 *   import { createDefaultRegistry, VT1 } from "./profiles/index.js";
 *
 *   const registry = createDefaultRegistry();
 *   const profile = registry.getById(VT1);
 */

export {
  COMPLIANCE_KEY,
  VersionProfileSchema,
  PdfVersionRuleSchema,
  MetadataNamespaceSchema,
  VariantId,
  STANDARD_XMP_NAMESPACES,
  isStandardXmpPrefix,
  type VersionProfile,
  type PdfVersionRule,
  type MetadataNamespace,
  type StandardXmpPrefix,
} from "./schema.js";

export { VT1, VT3, PDF_VT_1, PDF_VT_3, BUILTIN_PROFILES } from "./defaults.js";

export {
  normalizePdfVersion,
  parsePdfVersion,
  comparePdfVersions,
  describeVersionRule,
  targetPdfVersion,
  evaluateVersionRule,
  type PdfVersion,
  type RuleEvaluation,
} from "./version-rule.js";

export { ProfileValidationError, validateProfiles, type ProfileIssue } from "./validation.js";

export { ProfileRegistry } from "./registry.js";

export {
  parseProfiles,
  loadProfiles,
  loadProfilesFromFile,
  createDefaultRegistry,
} from "./loader.js";
