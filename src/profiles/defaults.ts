/**
 * Built-in PDF/VT variants.
 *
 * PDF/VT-2 (the streamed, multi-file variant of ISO 16612-2) is not
 * supported: it cannot be produced as a single self-contained file.
 */

import type { VersionProfile } from "./schema.js";

export const VT1 = "VT1";
export const VT3 = "VT3";

/**
 * PDF/VT-1: ISO 16612-2, built on PDF/X-4, PDF 1.6 or newer.
 */
export const PDF_VT_1: VersionProfile = {
  id: VT1,
  marker: "PDF/VT-1",
  pdfVersionRule: { kind: "atLeast", major: 1, minor: 6 },
  baseStandardName: "PDF/X-4",
  isoReference: "ISO 16612-2:2010",
  featureDescriptions: [
    "Document Part Metadata (DPM) for tracking individual records",
    "Efficient reuse of common resources across pages",
    "Support for encapsulated external content",
    "Optimized for high-speed variable data printing",
    "Built on PDF/X-4 foundation for print production",
    "Uses PDF 1.6 with transparency and layers support",
  ],
};

/**
 * PDF/VT-3: ISO 16612-3, built on PDF/X-6, exactly PDF 2.0.
 */
export const PDF_VT_3: VersionProfile = {
  id: VT3,
  marker: "PDF/VT-3",
  pdfVersionRule: { kind: "exactly", version: "2.0" },
  baseStandardName: "PDF/X-6",
  isoReference: "ISO 16612-3:2020",
  featureDescriptions: [
    "Document Part Metadata (DPM) for tracking individual records",
    "Efficient reuse of common resources across pages",
    "Simplified transparency rules (page-level only)",
    "Per-page Output Intents with optional CxF/X-4 spectral data",
    "Enhanced Black Point Compensation support",
    "Built on PDF/X-6 foundation (PDF 2.0)",
    "Modern toolchain alignment for VDP workflows",
  ],
  extraMetadataNamespaces: {
    pdf: {
      properties: { PDFVersion: "2.0" },
    },
    pdfx6: {
      uri: "http://www.npes.org/pdfx6/ns/id/",
      properties: { GTS_PDFXConformance: "PDF/X-6" },
    },
  },
};

/** Registration order; later entries are the newer variants. */
export const BUILTIN_PROFILES: readonly VersionProfile[] = [PDF_VT_1, PDF_VT_3];
