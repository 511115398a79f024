/**
 * Metadata writer.
 *
 * Stamps a document with the three metadata locations a variant needs:
 *   1. catalog GTS_PDFVTVersion = profile marker
 *   2. catalog MarkInfo { Marked true }
 *   3. XMP packet carrying the same marker (plus profile extras)
 * alongside informational document-info fields.
 *
 * The writer holds no per-document state; one instance can stamp any
 * number of documents. Collaborator failures propagate unchanged.
 */

import { PdfAuthoringSession, type DocumentAuthor, type PageContent } from "../document/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import {
  COMPLIANCE_KEY,
  describeVersionRule,
  targetPdfVersion,
  type ProfileRegistry,
  type VariantId,
  type VersionProfile,
} from "../profiles/index.js";
import { buildXmpPacket, encodeXmpPacket } from "./xmp.js";

export const CREATOR_TOOL = "pdfvt-toolkit";
export const PRODUCER = "pdfvt-toolkit (pdf-lib)";
export const DEFAULT_AUTHOR = "PDFVT Generator";

/**
 * Informational fields; the checker never validates these.
 */
export interface DocumentInfo {
  title: string;
  author: string;
  subject: string;
  keywords: string;
  description: string;
}

export interface MetadataWriterOptions {
  /** Default author for documents that don't override it */
  author?: string;
  logger?: Logger;
  /** Clock used for XMP dates and the page footer */
  now?: () => Date;
}

export interface CreatedDocument {
  profile: Readonly<VersionProfile>;
  outputPath: string;
  pdfVersion: string;
}

export class MetadataWriter {
  private readonly author: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly registry: ProfileRegistry,
    options: MetadataWriterOptions = {}
  ) {
    this.author = options.author ?? DEFAULT_AUTHOR;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Default document info for a profile, with optional overrides.
   */
  describe(profile: Readonly<VersionProfile>, overrides: Partial<DocumentInfo> = {}): DocumentInfo {
    const marker = profile.marker;
    return {
      title: `${marker} Sample Document`,
      author: this.author,
      subject: `Sample ${marker} document with text and image`,
      keywords: `${marker}, Variable Data, Transactional Printing`,
      description:
        `Sample ${marker} document based on PDF ${targetPdfVersion(profile.pdfVersionRule)} ` +
        `and ${profile.baseStandardName} for variable data printing`,
      ...overrides,
    };
  }

  /**
   * Write info fields and all three compliance locations in one pass.
   */
  stamp(
    profile: Readonly<VersionProfile>,
    author: DocumentAuthor,
    info: DocumentInfo = this.describe(profile)
  ): void {
    this.logger.debug("Stamping PDF/VT metadata", { variant: profile.id, marker: profile.marker });

    author.setInfoField("Title", info.title);
    author.setInfoField("Author", info.author);
    author.setInfoField("Subject", info.subject);
    author.setInfoField("Keywords", info.keywords);
    author.setInfoField("Creator", CREATOR_TOOL);
    author.setInfoField("Producer", PRODUCER);

    author.setCatalogEntry(COMPLIANCE_KEY, profile.marker);
    author.setCatalogStructureFlag(true);

    const packet = buildXmpPacket(
      profile,
      {
        title: info.title,
        creator: info.author,
        description: info.description,
        creatorTool: CREATOR_TOOL,
        producer: PRODUCER,
      },
      { timestamp: this.now() }
    );
    author.attachMetadataPacket(encodeXmpPacket(packet));
  }

  /**
   * Page content shown on the sample document.
   */
  pageContent(profile: Readonly<VersionProfile>): PageContent {
    const marker = profile.marker;
    const generatedAt = this.now().toISOString().replace("T", " ").replace(/\.\d{3}Z$/, " UTC");
    return {
      title: `${marker} Document Sample`,
      subtitle: "Variable Data & Transactional Printing",
      introduction:
        `This document demonstrates ${marker} (Variable Data and Transactional Printing) ` +
        `capabilities. This version is based on ${profile.baseStandardName} ` +
        `(${profile.isoReference}) and requires ${describeVersionRule(profile.pdfVersionRule)}.`,
      featuresHeading: `Key Features of ${marker}:`,
      features: profile.featureDescriptions,
      figureHeading: "Sample Figure",
      figureCaption: "Figure 1: Geometric design sample drawn with vector graphics",
      footerLines: [`Generated on ${generatedAt}`, `Created with ${CREATOR_TOOL} | ${marker}`],
    };
  }

  /**
   * Author a complete sample document for `variant` and save it.
   *
   * Layout and metadata are staged in memory; the file is written only
   * once every location has been stamped.
   *
   * @throws Error when the variant is not registered
   */
  async createDocument(
    variant: VariantId,
    outputPath: string,
    overrides: Partial<DocumentInfo> = {}
  ): Promise<CreatedDocument> {
    const profile = this.registry.getById(variant);
    if (!profile) {
      throw new Error(
        `Unknown PDF/VT variant: ${variant}. Known variants: ${this.registry.ids().join(", ")}`
      );
    }

    const pdfVersion = targetPdfVersion(profile.pdfVersionRule);
    this.logger.info("Creating document", { variant: profile.id, pdfVersion, outputPath });

    const session = await PdfAuthoringSession.create(pdfVersion);
    await session.layout(this.pageContent(profile));
    this.stamp(profile, session, this.describe(profile, overrides));
    await session.save(outputPath);

    this.logger.info("Document written", { variant: profile.id, outputPath });
    return { profile, outputPath, pdfVersion };
  }
}
