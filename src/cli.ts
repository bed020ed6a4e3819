#!/usr/bin/env node

import path from 'node:path';
import fs from 'node:fs/promises';
import { Command } from 'commander';
import { VERSION } from './index';
import { optionalPath, parseBoolish, parseIntish, parseReportFormat } from './cli/args';
import { loadModelFile } from './model/loadModel';
import { buildModelIndex, type ModelIndex } from './model/modelIndex';
import { scanModelFiles, toPosixPath } from './scan/modelScanner';
import { createEmptyReport, finalizeReport } from './report/validationReport';
import { recordLoadFailure, recordModelResult } from './report/reportBuilder';
import { NO_PROBLEMS_TEXT } from './report/diagnosticSink';
import { writeReportFile, type ReportFormat } from './report/writeReport';
import { stableStringify } from './util/deterministicJson';
import { validateModelIndex } from './validation/validateModel';
import type { ValidationProblem } from './validation/problems';

export type ValidateCliOptions = {
  /** Single model document. Takes precedence over `source`. */
  model?: string;
  /** Directory scanned for `*.ontouml.json` documents. */
  source?: string;
  exclude: string[];
  maxFiles?: number;
  checkErrors: boolean;
  checkAntipatterns: boolean;
  /** Problem list output (JSON). */
  out?: string;
  report?: string;
  reportFormat: ReportFormat;
  failOnProblems: boolean;
  verbose: boolean;
};

export type ProblemsOutput = {
  schema: 'ontouml-problems-v1';
  models: Array<{ file: string; problems: ValidationProblem[] }>;
};

/** Raw commander options; values of `[bool]` options arrive as string or true. */
type RawValidateOptions = {
  model?: string;
  source?: string;
  exclude?: string[];
  maxFiles?: string;
  errors?: string | boolean;
  antipatterns?: string | boolean;
  out?: string;
  report?: string;
  reportFormat?: string;
  failOnProblems?: string | boolean;
  verbose?: boolean;
};

async function resolveModelFiles(opts: ValidateCliOptions): Promise<Array<{ file: string; display: string }>> {
  if (opts.model) return [{ file: opts.model, display: toPosixPath(opts.model) }];
  const sourceRoot = opts.source ?? '.';
  const rel = await scanModelFiles({ sourceRoot, excludeGlobs: opts.exclude, maxFiles: opts.maxFiles });
  return rel.map((r) => ({ file: path.join(sourceRoot, r), display: r }));
}

/**
 * Validate one document or every document under a directory.
 *
 * Exit codes: 0 ok, 2 when a document could not be loaded, 3 when
 * `failOnProblems` is set and at least one problem was found.
 */
export async function runValidate(opts: ValidateCliOptions): Promise<number> {
  const checks = { errors: opts.checkErrors, antipatterns: opts.checkAntipatterns };
  const report = createEmptyReport({ toolName: 'ontouml-validate', toolVersion: VERSION, checks });
  const output: ProblemsOutput = { schema: 'ontouml-problems-v1', models: [] };

  const files = await resolveModelFiles(opts);
  report.modelsScanned = files.length;

  let loadFailures = 0;
  let problemCount = 0;
  for (const { file, display } of files) {
    let index: ModelIndex;
    try {
      index = buildModelIndex(await loadModelFile(file));
    } catch (e) {
      loadFailures++;
      recordLoadFailure(report, display, e);
      // eslint-disable-next-line no-console
      console.error(e instanceof Error ? e.message : String(e));
      continue;
    }

    const problems = validateModelIndex(index, { checkErrors: opts.checkErrors, checkAntipatterns: opts.checkAntipatterns });
    problemCount += problems.length;
    recordModelResult(report, display, index, problems);
    output.models.push({ file: display, problems });

    if (opts.verbose) {
      const errors = problems.filter((p) => p.type === 'error').length;
      // eslint-disable-next-line no-console
      console.log(
        problems.length === 0
          ? `${display}: ${NO_PROBLEMS_TEXT}`
          : `${display}: ${errors} error(s), ${problems.length - errors} anti-pattern(s)`,
      );
    }
  }

  if (opts.out) {
    const abs = path.resolve(opts.out);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, stableStringify(output), 'utf8');
  }
  if (opts.report) await writeReportFile(opts.report, finalizeReport(report), opts.reportFormat);

  if (opts.verbose) {
    // eslint-disable-next-line no-console
    console.log(`Validated ${report.modelsValidated}/${files.length} model(s), ${problemCount} problem(s).`);
    if (opts.out) {
      // eslint-disable-next-line no-console
      console.log(`Wrote problems: ${opts.out}`);
    }
    if (opts.report) {
      // eslint-disable-next-line no-console
      console.log(`Wrote report: ${opts.report}`);
    }
  }

  if (loadFailures > 0) return 2;
  if (opts.failOnProblems && problemCount > 0) return 3;
  return 0;
}

export async function main(argv: string[]): Promise<number> {
  const program = new Command();

  program
    .name('ontouml-validate')
    .description('Check OntoUML class diagrams for structural errors and modeling anti-patterns')
    .version(VERSION)
    .option('--model <file>', 'Model document to validate')
    .option('--source <path>', 'Directory scanned for *.ontouml.json documents')
    .option('--exclude <glob...>', 'Repeatable exclude globs (relative to --source)', [])
    .option('--max-files <n>', 'Safety cap on scanned documents (default no cap)', (v) => v, undefined)
    .option('--errors [bool]', 'Run structural checks (default true)', (v) => v, undefined)
    .option('--antipatterns [bool]', 'Run anti-pattern detectors (default false)', (v) => v, undefined)
    .option('--out <file>', 'Write the problem list as JSON', '')
    .option('--report <file>', 'Write a summary report', '')
    .option('--report-format <format>', 'md|json', 'md')
    .option('--fail-on-problems [bool]', 'Exit 3 if any problem is found (default false)', (v) => v, undefined)
    .option('-v, --verbose', 'Verbose logging', false);

  program.action(async (raw: RawValidateOptions) => {
    const model = optionalPath(raw.model);
    const source = optionalPath(raw.source);
    if (!model && !source) {
      // eslint-disable-next-line no-console
      console.error('Missing required option: --model <file> or --source <path>');
      process.exitCode = 1;
      return;
    }

    process.exitCode = await runValidate({
      model,
      source,
      exclude: raw.exclude ?? [],
      maxFiles: parseIntish(raw.maxFiles),
      checkErrors: parseBoolish(raw.errors, true),
      checkAntipatterns: parseBoolish(raw.antipatterns, false),
      out: optionalPath(raw.out),
      report: optionalPath(raw.report),
      reportFormat: parseReportFormat(raw.reportFormat),
      failOnProblems: parseBoolish(raw.failOnProblems, false),
      verbose: Boolean(raw.verbose),
    });
  });

  try {
    await program.parseAsync(argv);
    return Number(process.exitCode ?? 0);
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  // eslint-disable-next-line @typescript-eslint/no-floating-promises
  main(process.argv).then((code) => {
    process.exitCode = code;
  });
}
