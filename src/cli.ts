#!/usr/bin/env node
/**
 * gtf-refflat - convert a GTF annotation into a RefFlat table
 *
 * Usage: gtf-refflat <gtf> [-o <refflat>] [--normalized <path> | --no-normalized]
 *        [--group-by-transcript]
 */

import { readFileSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { type } from "arktype";
import { Command } from "commander";
import { GtfConversionError } from "./errors";
import { assertConverted, convertGtfToRefFlat } from "./operations/refflat/convert";

const PackageManifest = type({ version: "string" });

function readVersion(): string {
  const manifest = PackageManifest(
    JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"))
  );
  return manifest instanceof type.errors ? "0.0.0" : manifest.version;
}

/**
 * Parsed command-line options
 */
export interface CliOptions {
  output?: string;
  /** Path when given, false with --no-normalized */
  normalized?: string | false;
  groupByTranscript?: boolean;
}

/**
 * Where the command reports to
 */
export interface CliOutput {
  out(message: string): void;
  err(message: string): void;
}

const consoleOutput: CliOutput = {
  out: (message) => console.log(message),
  err: (message) => console.error(message),
};

/**
 * Run one conversion and report it
 *
 * @returns Process exit code: 0 on success, 1 on failure
 */
export async function runConversion(
  gtfPath: string,
  options: CliOptions,
  output: CliOutput = consoleOutput
): Promise<number> {
  const result = await convertGtfToRefFlat(gtfPath, {
    outputPath: options.output,
    normalizedPath: typeof options.normalized === "string" ? options.normalized : undefined,
    writeNormalized: options.normalized !== false,
    groupByTranscript: options.groupByTranscript === true,
  });

  try {
    const success = assertConverted(result);
    output.out(`Wrote ${success.rowCount} transcripts to ${success.outputPath}`);
    if (success.conflicts.length > 0) {
      output.out(`Dropped ${success.conflicts.length} transcripts with mixed strands`);
    }
    return 0;
  } catch (error) {
    if (error instanceof GtfConversionError) {
      output.err(error.message);
      output.err(error.cause.toString());
      return 1;
    }
    throw error;
  }
}

/**
 * Build the command-line program
 */
export function createProgram(output: CliOutput = consoleOutput): Command {
  const program = new Command();

  program
    .name("gtf-refflat")
    .description("Convert a GTF annotation into a RefFlat table")
    .version(readVersion())
    .argument("<gtf>", "GTF file, plain or gzip-compressed")
    .option("-o, --output <path>", "RefFlat output path (default: <gtf>.refflat)")
    .option("--normalized <path>", "normalized intermediate path (default: <gtf>.gff3)")
    .option("--no-normalized", "do not write the normalized intermediate file")
    .option("--group-by-transcript", "regroup interleaved features by transcript id")
    .action(async (gtfPath: string, options: CliOptions) => {
      process.exitCode = await runConversion(gtfPath, options, output);
    });

  return program;
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  await createProgram().parseAsync();
}
