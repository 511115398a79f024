/**
 * PDF/VT compliance checker.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * DETECTION AND VALIDATION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * One pass over the document, no backtracking:
 *
 *   1. Declared PDF version, normalized to "major.minor".
 *   2. Catalog GTS_PDFVTVersion: the primary marker.
 *   3. Catalog MarkInfo.Marked: the structure flag.
 *   4. XMP packet: consistency evidence for the marker. Only when the
 *      catalog has no marker is the packet scanned for one, testing
 *      profiles in the registry's detection order.
 *   5. Marker -> profile via the registry.
 *   6. The profile's PDF version rule, plus the catalog marker and the
 *      structure flag, decide compliance. The packet never gates it.
 *
 * A missing file throws DocumentNotFoundError. Every other failure,
 * including an unparseable file, ends up as an issue on the result.
 */

import {
  DocumentNotFoundError,
  withDocument,
  type DocumentReader,
} from "../document/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import {
  COMPLIANCE_KEY,
  evaluateVersionRule,
  normalizePdfVersion,
  type ProfileRegistry,
  type VariantId,
} from "../profiles/index.js";
import {
  createDraft,
  finalizeResult,
  type ComplianceDraft,
  type ComplianceResult,
} from "./result.js";

export interface ComplianceCheckerOptions {
  logger?: Logger;
}

export class ComplianceChecker<THandle = unknown> {
  private readonly logger: Logger;
  private readonly decoder = new TextDecoder("utf-8");

  constructor(
    private readonly registry: ProfileRegistry,
    private readonly reader: DocumentReader<THandle>,
    options: ComplianceCheckerOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Check a document and explain the verdict.
   *
   * @throws DocumentNotFoundError when `path` does not exist
   */
  async check(path: string): Promise<ComplianceResult> {
    const draft = createDraft();

    try {
      await withDocument(this.reader, path, (handle) => this.inspect(handle, draft));
    } catch (err) {
      if (err instanceof DocumentNotFoundError) {
        throw err;
      }
      const reason = err instanceof Error ? err.message : String(err);
      draft.issues.push(`Error reading PDF: ${reason}`);
      draft.isCompliant = false;
      this.logger.warn("Could not read document", { path, reason });
    }

    const result = finalizeResult(draft);
    this.logger.info("Compliance check finished", {
      path,
      compliant: result.isCompliant,
      variant: result.detectedVariant ?? null,
      issues: result.issues.length,
    });
    return result;
  }

  /**
   * True when the document is compliant and declares `expected`.
   */
  async isCompliant(path: string, expected: VariantId): Promise<boolean> {
    const result = await this.check(path);
    return result.isCompliant && result.detectedVariant === expected;
  }

  private inspect(handle: THandle, draft: ComplianceDraft): void {
    const declared = this.reader.getDeclaredVersion(handle);
    draft.declaredPdfVersion = normalizePdfVersion(declared) ?? (declared || undefined);

    let marker = this.readCatalogMarker(handle, draft);
    this.readStructureFlag(handle, draft);
    marker = this.readPacket(handle, draft, marker);

    if (marker === undefined) {
      draft.issues.push("No PDF/VT version marker found");
      return;
    }

    draft.rawMarker = marker;
    const profile = this.registry.getByMarker(marker);
    if (!profile) {
      draft.issues.push(`Unknown PDF/VT version: ${marker}`);
      return;
    }
    draft.detectedVariant = profile.id;

    const rule = evaluateVersionRule(profile.pdfVersionRule, draft.declaredPdfVersion, profile.marker);
    if (rule.issue) {
      draft.issues.push(rule.issue);
    }

    draft.isCompliant = rule.satisfied && draft.hasCatalogMarker && draft.hasStructureFlag;
  }

  private readCatalogMarker(handle: THandle, draft: ComplianceDraft): string | undefined {
    const marker = this.reader.getCatalogEntry(handle, COMPLIANCE_KEY);
    // An empty string names no variant.
    if (marker === undefined || marker === "") {
      draft.issues.push(`${COMPLIANCE_KEY} not found in catalog`);
      return undefined;
    }
    draft.hasCatalogMarker = true;
    return marker;
  }

  private readStructureFlag(handle: THandle, draft: ComplianceDraft): void {
    draft.hasStructureFlag = this.reader.getCatalogStructureFlag(handle) === true;
    if (!draft.hasStructureFlag) {
      draft.issues.push("MarkInfo with Marked=true not found");
    }
  }

  /**
   * Record packet evidence; returns the marker to resolve, which is the
   * catalog marker when there is one and the packet fallback otherwise.
   * The marker may sit under any property, but the fallback scan runs
   * only when the packet carries the compliance key.
   */
  private readPacket(
    handle: THandle,
    draft: ComplianceDraft,
    catalogMarker: string | undefined
  ): string | undefined {
    const packet = this.reader.getMetadataPacket(handle);
    if (!packet) {
      draft.issues.push("XMP metadata not found");
      return catalogMarker;
    }

    const text = this.decoder.decode(packet);
    const hasKey = text.includes(COMPLIANCE_KEY);
    if (!hasKey) {
      draft.issues.push(`${COMPLIANCE_KEY} not found in XMP metadata`);
    }

    let marker = catalogMarker;
    if (marker === undefined && hasKey) {
      marker = this.registry.detectionOrder().find((p) => text.includes(p.marker))?.marker;
      if (marker !== undefined) {
        this.logger.debug("Marker recovered from XMP metadata", { marker });
      }
    }

    if (marker !== undefined) {
      draft.hasPacketMarker = text.includes(marker);
      if (!draft.hasPacketMarker) {
        draft.issues.push(`XMP metadata does not contain version marker "${marker}"`);
      }
    }
    return marker;
  }
}
