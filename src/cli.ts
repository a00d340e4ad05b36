#!/usr/bin/env node
import { Command } from "commander";
import fs from "node:fs/promises";
import path from "node:path";
import { DiagramParseError } from "./compiler/errors.js";
import { compileDiagram } from "./compiler/index.js";
import { isErrorDiagnostic } from "./compiler/parse.js";
import { parsePatchYaml } from "./compiler/patch.js";
import { formatDiagnostic, formatSummary } from "./report.js";
import type { LayoutPatch } from "./types.js";

const program = new Command();

interface BuildCliOptions {
  output?: string;
  patch?: string;
  strict?: boolean;
  verbose?: boolean;
}

function defaultOutputPath(input: string): string {
  const parsed = path.parse(input);
  return path.join(parsed.dir, `${parsed.name}.layout.json`);
}

async function readSource(input: string): Promise<string> {
  const resolved = path.resolve(input);
  let stat;
  try {
    stat = await fs.stat(resolved);
  } catch {
    throw new Error(`Input not found: ${input}`);
  }
  if (!stat.isFile()) {
    throw new Error(`Input must be a file: ${input}`);
  }
  return fs.readFile(resolved, "utf8");
}

async function runBuild(input: string, opts: BuildCliOptions): Promise<void> {
  const source = await readSource(input);
  const outputPath = opts.output ?? defaultOutputPath(input);

  let patch: LayoutPatch | undefined;
  if (opts.patch) {
    patch = parsePatchYaml(await fs.readFile(opts.patch, "utf8"));
  }

  const { model, diagnostics } = compileDiagram(source, {
    patch,
    strict: opts.strict,
  });

  if (opts.verbose) {
    for (const diagnostic of diagnostics) {
      process.stderr.write(`${formatDiagnostic(diagnostic, input)}\n`);
    }
    process.stdout.write(`${formatSummary(model, diagnostics)}\n`);
  }

  await fs.writeFile(outputPath, `${JSON.stringify(model, null, 2)}\n`, "utf8");
  process.stdout.write(`Generated: ${outputPath}\n`);
}

async function runCheck(input: string): Promise<void> {
  const source = await readSource(input);
  const { model, diagnostics } = compileDiagram(source);

  for (const diagnostic of diagnostics) {
    process.stderr.write(`${formatDiagnostic(diagnostic, input)}\n`);
  }
  process.stdout.write(`${formatSummary(model, diagnostics)}\n`);

  if (diagnostics.some(isErrorDiagnostic)) {
    process.exitCode = 1;
  }
}

program
  .name("lanemap")
  .description("Lay out swimlane flowcharts into a positioned JSON model")
  .version("0.1.0");

program
  .command("build", { isDefault: true })
  .description("Write the positioned model as JSON (default command)")
  .argument("<input>", "input diagram file")
  .option("-o, --output <path>", "output model JSON path")
  .option("-p, --patch <path>", "layout patch yaml path")
  .option("--strict", "fail on unrecognized lines and dropped edges")
  .option("-v, --verbose", "print diagnostics and a summary")
  .action(async (input: string, opts: BuildCliOptions) => runBuild(input, opts));

program
  .command("check")
  .argument("<input>", "input diagram file")
  .description("Report ignored lines and dropped edges (exit 1) and resolved conflicts (warnings)")
  .action(async (input: string) => runCheck(input));

function describeFailure(error: unknown): string {
  if (error instanceof DiagramParseError) {
    return [error.message, ...error.diagnostics.map((diagnostic) => formatDiagnostic(diagnostic))].join("\n");
  }
  return error instanceof Error ? error.message : String(error);
}

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    process.stderr.write(`lanemap: ${describeFailure(error)}\n`);
    process.exitCode = 1;
  }
}

void main();
