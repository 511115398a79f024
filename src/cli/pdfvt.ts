#!/usr/bin/env node
/**
 * PDF/VT document generator and compliance checker.
 *
 * Usage:
 *   npx tsx src/cli/pdfvt.ts [options]
 *   npm run pdfvt -- [options]
 *
 * Options:
 *   --version, -v <vt1|vt3>  PDF/VT variant to generate (default: vt1)
 *   --output, -o <path>      Output file path (default: output.pdf)
 *   --check, -c <path>       Check compliance of an existing PDF instead
 *   --json                   Print the check result as JSON
 *   --help, -h               Show help
 *
 * Exit codes:
 *   0 - Document written, or document is compliant
 *   1 - Invalid arguments, file not found, or document not compliant
 */

import { parseArgs } from "node:util";

import { ConfigError, loadConfig, validateConfig } from "../config/index.js";
import { DocumentNotFoundError, PdfDocumentReader } from "../document/index.js";
import { createLogger, initRunId, isLogLevel, type Logger } from "../logging/index.js";
import { MetadataWriter } from "../metadata/index.js";
import {
  ProfileValidationError,
  createDefaultRegistry,
  describeVersionRule,
  targetPdfVersion,
  type ProfileRegistry,
} from "../profiles/index.js";
import {
  ComplianceChecker,
  buildComplianceReport,
  formatComplianceResult,
} from "../compliance/index.js";

// ============================================================
// Types
// ============================================================

export interface CliOptions {
  variant: string;
  output: string;
  check?: string;
  json: boolean;
  help: boolean;
}

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface CliContext {
  registry: ProfileRegistry;
  writer: MetadataWriter;
  checker: ComplianceChecker;
  io: CliIo;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

// ============================================================
// CLI Parsing
// ============================================================

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        version: { type: "string", short: "v", default: "vt1" },
        output: { type: "string", short: "o", default: "output.pdf" },
        check: { type: "string", short: "c" },
        json: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseRawArgs(argv);
  return {
    variant: values.version ?? "vt1",
    output: values.output ?? "output.pdf",
    check: values.check,
    json: values.json ?? false,
    help: values.help ?? false,
  };
}

export function helpText(registry: ProfileRegistry): string {
  const variants = registry
    .ids()
    .map((id) => id.toLowerCase())
    .join("|");
  return `
Usage: pdfvt [options]

Options:
  --version, -v <${variants}>  PDF/VT variant to generate (default: vt1)
  --output, -o <path>      Output file path (default: output.pdf)
  --check, -c <path>       Check compliance of an existing PDF
  --json                   Print the check result as JSON
  --help, -h               Show this help message

Examples:
  pdfvt --version vt1
  pdfvt -v vt3 -o my_document.pdf
  pdfvt --check document.pdf
`;
}

// ============================================================
// Commands
// ============================================================

export async function runGenerate(options: CliOptions, ctx: CliContext): Promise<number> {
  const profile = ctx.registry.resolveVariant(options.variant);
  if (!profile) {
    throw new CliUsageError(
      `Invalid PDF/VT version: '${options.variant}'. Use one of: ${ctx.registry
        .ids()
        .map((id) => id.toLowerCase())
        .join(", ")}.`
    );
  }

  ctx.io.out("PDF/VT Document Generator");
  ctx.io.out(`   Version: ${profile.id}`);
  ctx.io.out(`   Output: ${options.output}`);
  ctx.io.out("");
  ctx.io.out(`Creating ${profile.marker} document...`);
  ctx.io.out(`  - PDF Version: ${targetPdfVersion(profile.pdfVersionRule)}`);
  ctx.io.out(`  - Requirement: ${describeVersionRule(profile.pdfVersionRule)} (${profile.isoReference})`);

  await ctx.writer.createDocument(profile.id, options.output);

  ctx.io.out("");
  ctx.io.out(`✓ ${profile.marker} document created successfully: ${options.output}`);
  return 0;
}

export async function runCheck(path: string, options: CliOptions, ctx: CliContext): Promise<number> {
  const result = await ctx.checker.check(path);

  if (options.json) {
    ctx.io.out(JSON.stringify(buildComplianceReport(path, result), null, 2));
  } else {
    ctx.io.out("PDF/VT Compliance Checker");
    ctx.io.out(`   File: ${path}`);
    ctx.io.out("");
    ctx.io.out(formatComplianceResult(result));
  }

  return result.isCompliant ? 0 : 1;
}

/**
 * Run the CLI and return its exit code.
 */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      ctx.io.out(helpText(ctx.registry));
      return 0;
    }
    return options.check !== undefined
      ? await runCheck(options.check, options, ctx)
      : await runGenerate(options, ctx);
  } catch (err) {
    if (err instanceof DocumentNotFoundError) {
      ctx.io.err(`Error: File not found - ${err.path}`);
      return 1;
    }
    if (err instanceof CliUsageError) {
      ctx.io.err(`Error: ${err.message}`);
      ctx.io.err(helpText(ctx.registry));
      return 1;
    }
    throw err;
  }
}

// ============================================================
// Main
// ============================================================

function createContext(logger: Logger, profilesFile: string | undefined, author: string): CliContext {
  const registry = createDefaultRegistry(profilesFile);
  return {
    registry,
    writer: new MetadataWriter(registry, { author, logger }),
    checker: new ComplianceChecker(registry, new PdfDocumentReader(), { logger }),
    io: {
      out: (line) => console.log(line),
      err: (line) => console.error(line),
    },
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  validateConfig(config);

  const runId = initRunId();
  const logger = createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    logDir: config.logDir,
    console: config.logToConsole,
    file: config.logToFile,
  });
  logger.debug("pdfvt starting", { runId, env: config.env });

  const ctx = createContext(logger, config.profilesFile, config.author);
  const code = await runCli(process.argv.slice(2), ctx);
  process.exit(code);
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("pdfvt.ts") ||
   process.argv[1].endsWith("pdfvt.js") ||
   process.argv[1].endsWith("pdfvt"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else if (err instanceof ProfileValidationError) {
      console.error(err.format());
    } else {
      console.error("Unexpected error:", err);
    }
    process.exit(1);
  });
}
