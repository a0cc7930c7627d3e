/**
 * CLI runner: Loads the three input files, runs the analysis and writes the reports.
 * Kept free of process globals so it can be exercised from tests.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Logger } from 'pino';
import type { DelayAnalysisReport } from '@delaylens/shared';
import { ScheduleLoadError, ValidationError } from '../errors/AppError.js';
import { loadCriticalPathFile, loadScheduleFile } from '../services/scheduleLoader.js';
import { runDelayAnalysis } from '../services/analysisService.js';
import {
  renderConsoleSummary,
  renderJsonReport,
  renderMarkdownReport,
} from '../services/reportRenderer.js';
import type { CliOptions } from './options.js';
import { USAGE, parseCliArgs } from './options.js';

export interface CliContext {
  logger: Logger;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  now: () => Date;
}

export const EXIT_OK = 0;
export const EXIT_LOAD_FAILED = 1;
export const EXIT_USAGE = 2;

export interface AnalysisOutcome {
  report: DelayAnalysisReport;
  writtenFiles: string[];
}

/**
 * Run one analysis for parsed options. Load failures propagate as ScheduleLoadError.
 */
export async function runAnalysis(
  options: CliOptions,
  context: CliContext,
): Promise<AnalysisOutcome> {
  const { logger } = context;

  logger.info({ file: options.baseline }, 'Loading baseline schedule');
  const baseline = await loadScheduleFile(options.baseline);
  logger.info({ activities: baseline.activities.size }, 'Loaded baseline schedule');

  logger.info({ file: options.updated }, 'Loading updated schedule');
  const updated = await loadScheduleFile(options.updated);
  logger.info({ activities: updated.activities.size }, 'Loaded updated schedule');

  logger.info({ file: options.criticalPath }, 'Loading critical path');
  const criticalPath = await loadCriticalPathFile(options.criticalPath);
  logger.info({ activities: criticalPath.taskCodes.size }, 'Loaded critical path');

  const report = runDelayAnalysis({
    baseline,
    updated,
    criticalPath,
    scope: options.scope,
    sources: {
      baseline: basename(options.baseline),
      updated: basename(options.updated),
      criticalPath: basename(options.criticalPath),
    },
    now: context.now(),
  });

  for (const warning of report.loadWarnings) {
    logger.warn({ source: warning.source }, warning.message);
  }
  logger.info({ scope: options.scope, ...report.summary }, 'Delay analysis completed');

  await mkdir(options.outputDir, { recursive: true });
  const prefix = join(options.outputDir, options.output);
  const writtenFiles: string[] = [];

  if (options.format === 'json' || options.format === 'both') {
    const path = `${prefix}.json`;
    await writeFile(path, renderJsonReport(report), 'utf-8');
    logger.info({ path }, 'JSON report written');
    writtenFiles.push(path);
  }

  if (options.format === 'md' || options.format === 'both') {
    const path = `${prefix}.md`;
    await writeFile(path, renderMarkdownReport(report), 'utf-8');
    logger.info({ path }, 'Markdown report written');
    writtenFiles.push(path);
  }

  context.stdout(renderConsoleSummary(report));
  return { report, writtenFiles };
}

/**
 * Parse arguments, run, and map the outcome to an exit code.
 * Errors other than usage and load failures propagate.
 */
export async function runCli(argv: string[], context: CliContext): Promise<number> {
  let command: ReturnType<typeof parseCliArgs>;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof ValidationError) {
      context.stderr(`${err.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (command.kind === 'help') {
    context.stdout(USAGE);
    return EXIT_OK;
  }

  try {
    await runAnalysis(command.options, context);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ScheduleLoadError) {
      context.logger.error({ source: err.source, reason: err.reason }, err.message);
      context.stderr(`${err.message}\n`);
      return EXIT_LOAD_FAILED;
    }
    throw err;
  }
}
