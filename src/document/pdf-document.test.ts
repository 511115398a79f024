/**
 * Tests for the pdf-lib authoring session and reader.
 *
 * Run: node --import tsx src/document/pdf-document.test.ts
 *
 * Tests cover:
 *   1. Header version written by the session
 *   2. Catalog entry, MarkInfo and metadata stream read back from disk
 *   3. Catalog /Version overrides
 *   4. Reader error paths and handle lifecycle
 *   5. Sample page layout and page breaks
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { PDFDocument, PDFName } from "pdf-lib";

import { PdfAuthoringSession, stampHeaderVersion } from "./pdf-author.js";
import { PdfDocumentReader, type PdfHandle } from "./pdf-reader.js";
import { DocumentNotFoundError, withDocument, type DocumentReader } from "./types.js";
import { layoutSamplePage, toWinAnsi, type PageContent } from "./layout.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const tempDir = mkdtempSync(join(tmpdir(), "pdfvt-document-"));
const reader = new PdfDocumentReader();
let fileCount = 0;

/**
 * Save a session to a fresh temp file and return its path.
 */
async function saveToTemp(session: PdfAuthoringSession): Promise<string> {
  fileCount++;
  const path = join(tempDir, `doc-${fileCount}.pdf`);
  await session.save(path);
  return path;
}

async function newSession(version: string): Promise<PdfAuthoringSession> {
  const session = await PdfAuthoringSession.create(version);
  session.document.addPage();
  return session;
}

// ═══════════════════════════════════════════════════════════════════════════
// AUTHORING
// ═══════════════════════════════════════════════════════════════════════════

section("PdfAuthoringSession");

await test("writes the requested header version", async () => {
  const bytes = await (await newSession("1.6")).toBytes();
  assert.equal(Buffer.from(bytes.subarray(0, 8)).toString("latin1"), "%PDF-1.6");
});

await test("writes a PDF 2.0 header", async () => {
  const bytes = await (await newSession("2.0")).toBytes();
  assert.equal(Buffer.from(bytes.subarray(0, 8)).toString("latin1"), "%PDF-2.0");
});

await test("the saved file declares the requested version when read back", async () => {
  const path = await saveToTemp(await newSession("1.4"));

  await withDocument(reader, path, (handle) => {
    assert.equal(reader.getDeclaredVersion(handle), "1.4");
  });
});

await test("refuses a version the header cannot hold", async () => {
  await assert.rejects(
    () => PdfAuthoringSession.create("1.10"),
    /Cannot author a document with PDF version "1.10"/
  );
});

await test("stampHeaderVersion rewrites only the version digits", () => {
  const bytes = new TextEncoder().encode("%PDF-1.7\n%body");
  const stamped = stampHeaderVersion(bytes, { major: 2, minor: 0 });
  assert.equal(new TextDecoder().decode(stamped), "%PDF-2.0\n%body");
});

await test("stampHeaderVersion rejects bytes without a header", () => {
  assert.throws(
    () => stampHeaderVersion(new TextEncoder().encode("not a pdf"), { major: 1, minor: 6 }),
    /Unexpected PDF header "not a pd"/
  );
});

await test("refuses a version it cannot parse", async () => {
  await assert.rejects(
    () => PdfAuthoringSession.create("latest"),
    /Cannot author a document with PDF version "latest"/
  );
});

await test("fills in document info", async () => {
  const session = await newSession("1.6");
  session.setInfoField("Title", "Statement");
  session.setInfoField("Author", "Test Author");
  session.setInfoField("Producer", "test-producer");

  assert.equal(session.document.getTitle(), "Statement");
  assert.equal(session.document.getAuthor(), "Test Author");
  assert.equal(session.document.getProducer(), "test-producer");
});

// ═══════════════════════════════════════════════════════════════════════════
// READ BACK
// ═══════════════════════════════════════════════════════════════════════════

section("PdfDocumentReader — Round Trip");

await test("reads back all three compliance locations", async () => {
  const session = await newSession("1.6");
  session.setCatalogEntry("GTS_PDFVTVersion", "PDF/VT-1");
  session.setCatalogStructureFlag(true);
  session.attachMetadataPacket(new TextEncoder().encode("<x>PDF/VT-1</x>"));
  const path = await saveToTemp(session);

  await withDocument(reader, path, (handle) => {
    assert.equal(reader.getDeclaredVersion(handle), "1.6");
    assert.equal(reader.getCatalogEntry(handle, "GTS_PDFVTVersion"), "PDF/VT-1");
    assert.equal(reader.getCatalogStructureFlag(handle), true);
    const packet = reader.getMetadataPacket(handle);
    assert.ok(packet);
    assert.equal(new TextDecoder().decode(packet), "<x>PDF/VT-1</x>");
  });
});

await test("keeps parentheses in catalog strings", async () => {
  const session = await newSession("1.6");
  session.setCatalogEntry("GTS_PDFVTVersion", "PDF/VT-1 (draft)");
  const path = await saveToTemp(session);

  await withDocument(reader, path, (handle) => {
    assert.equal(reader.getCatalogEntry(handle, "GTS_PDFVTVersion"), "PDF/VT-1 (draft)");
  });
});

await test("reads a false structure flag", async () => {
  const session = await newSession("2.0");
  session.setCatalogStructureFlag(false);
  const path = await saveToTemp(session);

  await withDocument(reader, path, (handle) => {
    assert.equal(reader.getCatalogStructureFlag(handle), false);
  });
});

await test("reports absent locations as undefined", async () => {
  const path = await saveToTemp(await newSession("2.0"));

  await withDocument(reader, path, (handle) => {
    assert.equal(reader.getDeclaredVersion(handle), "2.0");
    assert.equal(reader.getCatalogEntry(handle, "GTS_PDFVTVersion"), undefined);
    assert.equal(reader.getCatalogStructureFlag(handle), undefined);
    assert.equal(reader.getMetadataPacket(handle), undefined);
  });
});

await test("reads name-valued catalog entries without the slash", async () => {
  const session = await newSession("1.6");
  session.document.catalog.set(PDFName.of("GTS_PDFVTVersion"), PDFName.of("PDF/VT-1"));
  const path = await saveToTemp(session);

  await withDocument(reader, path, (handle) => {
    assert.equal(reader.getCatalogEntry(handle, "GTS_PDFVTVersion"), "PDF/VT-1");
  });
});

section("PdfDocumentReader — Catalog /Version");

await test("a newer catalog version raises the declared version", async () => {
  const session = await newSession("1.6");
  session.document.catalog.set(PDFName.of("Version"), PDFName.of("2.0"));
  const path = await saveToTemp(session);

  await withDocument(reader, path, (handle) => {
    assert.equal(reader.getDeclaredVersion(handle), "2.0");
  });
});

await test("an older catalog version is ignored", async () => {
  const session = await newSession("1.7");
  session.document.catalog.set(PDFName.of("Version"), PDFName.of("1.4"));
  const path = await saveToTemp(session);

  await withDocument(reader, path, (handle) => {
    assert.equal(reader.getDeclaredVersion(handle), "1.7");
  });
});

section("PdfDocumentReader — Errors");

await test("a missing file raises DocumentNotFoundError", async () => {
  const missing = join(tempDir, "missing.pdf");
  await assert.rejects(
    () => reader.open(missing),
    (err: unknown) => {
      assert.ok(err instanceof DocumentNotFoundError);
      assert.equal(err.path, missing);
      assert.equal(err.message, `PDF file not found: ${missing}`);
      return true;
    }
  );
});

await test("a file without a PDF header fails to open", async () => {
  const path = join(tempDir, "not-a-pdf.pdf");
  writeFileSync(path, "this is plain text, not a document");
  await assert.rejects(() => reader.open(path));
});

await test("a closed handle cannot be read", async () => {
  const path = await saveToTemp(await newSession("1.6"));
  const handle = await reader.open(path);
  reader.close(handle);
  assert.throws(() => reader.getCatalogEntry(handle, "GTS_PDFVTVersion"), /is closed/);
});

section("withDocument");

await test("closes the handle when the callback throws", async () => {
  const closed: string[] = [];
  const stub: DocumentReader<string> = {
    open: async (path) => path,
    getDeclaredVersion: () => "1.6",
    getCatalogEntry: () => undefined,
    getCatalogStructureFlag: () => undefined,
    getMetadataPacket: () => undefined,
    close: (handle) => {
      closed.push(handle);
    },
  };

  await assert.rejects(
    () =>
      withDocument(stub, "a.pdf", () => {
        throw new Error("inspection failed");
      }),
    /inspection failed/
  );
  assert.deepEqual(closed, ["a.pdf"]);
});

await test("returns the callback's result", async () => {
  const path = await saveToTemp(await newSession("1.6"));
  const version = await withDocument<PdfHandle, string>(reader, path, (handle) =>
    reader.getDeclaredVersion(handle)
  );
  assert.equal(version, "1.6");
});

section("Layout");

const sampleContent: PageContent = {
  title: "Sample Statement",
  subtitle: "Layout check",
  introduction: "A short introduction that wraps onto a second line once it grows past the width of the page body.",
  featuresHeading: "Features",
  features: ["First feature", "Second feature", "Third feature"],
  figureHeading: "Figure",
  figureCaption: "Figure 1: shapes",
  footerLines: ["Footer line"],
};

await test("toWinAnsi replaces characters the standard fonts cannot draw", () => {
  assert.equal(toWinAnsi("Café • 5€ ✓"), "Café • 5€ ?");
});

await test("short content fits on one page", async () => {
  const document = await PDFDocument.create();
  await layoutSamplePage(document, sampleContent);
  assert.equal(document.getPageCount(), 1);
});

await test("a long feature list continues on a new page", async () => {
  const document = await PDFDocument.create();
  const features = Array.from({ length: 80 }, (_, i) => `Feature ${i + 1}`);
  await layoutSamplePage(document, { ...sampleContent, features });
  assert.ok(document.getPageCount() > 1);
});

// ═══════════════════════════════════════════════════════════════════════════
// Cleanup
// ═══════════════════════════════════════════════════════════════════════════

rmSync(tempDir, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
