/**
 * gc-triage command
 *
 * Reads the log line by line, runs the engine and writes the report. Returns
 * the exit code instead of exiting so the command can run in-process.
 */

import { createReadStream, readFileSync } from 'node:fs';
import { stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createInterface } from 'node:readline';
import type { Logger } from 'pino';
import { z } from 'zod';
import { analyzeLogAsync } from '../analysis/engine.js';
import { TriageError, toTriageError } from '../api/errors.js';
import { findPackageRoot, loadConfig, toThresholdConfig } from '../config/loader.js';
import { renderReport, type ReportFormat } from '../report/renderer.js';
import { EXIT_CODES, computeExitCode, type ExitCode } from '../report/severity.js';
import { createLogger, resolveLogLevel } from '../utils/logger-helpers.js';
import { HELP_TEXT, parseArgs, validateArgs } from './args.js';

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Replaces the stderr pino logger */
  logger?: Logger;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const PackageJsonSchema = z.object({ name: z.string(), version: z.string() });

export function readVersion(): string {
  const text = readFileSync(join(findPackageRoot(), 'package.json'), 'utf8');
  const parsed = PackageJsonSchema.safeParse(JSON.parse(text));
  return parsed.success ? parsed.data.version : '0.0.0';
}

async function assertReadableFile(path: string): Promise<void> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new TriageError('InputReadError', `Not a regular file: ${path}`, { path });
    }
  } catch (error) {
    const triageError = toTriageError(error);
    if (triageError.code === 'InputNotFound') {
      throw new TriageError('InputNotFound', `Log file not found: ${path}`, { path });
    }
    throw triageError;
  }
}

export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<ExitCode> {
  let logger = io.logger;

  try {
    const options = validateArgs(parseArgs(argv));

    if (options.help) {
      io.stdout(`${HELP_TEXT}\n`);
      return EXIT_CODES.OK;
    }
    if (options.version) {
      io.stdout(`gc-triage v${readVersion()}\n`);
      return EXIT_CODES.OK;
    }

    logger ??= createLogger(resolveLogLevel(options.verbose));

    const config = loadConfig({ configPath: options.configPath, logger });
    const thresholds = toThresholdConfig(config);
    if (options.oldTrendThreshold !== undefined) {
      thresholds.oldTrendThreshold = options.oldTrendThreshold;
    }
    const tailWindowMinutes = options.tailWindowMinutes ?? config.analysis.tail_window_minutes ?? null;
    const format: ReportFormat = options.format ?? config.analysis.format ?? 'md';

    if (options.logPath === null) {
      throw new TriageError('InvalidArguments', 'Missing log file: gc-triage <gc.log>');
    }
    await assertReadableFile(options.logPath);

    logger.debug({ path: options.logPath, tailWindowMinutes, format }, 'Analyzing GC log');

    const input = createReadStream(options.logPath, { encoding: 'utf8' });
    const lines = createInterface({ input, crlfDelay: Infinity });
    const result = await analyzeLogAsync(lines, { tailWindowMinutes, thresholds, logger }).finally(
      () => {
        lines.close();
        input.destroy();
      }
    );

    const report = renderReport(result, format);
    if (options.output) {
      await writeFile(options.output, `${report}\n`, 'utf8');
      logger.info({ output: options.output }, 'Report written');
    } else {
      io.stdout(`${report}\n`);
    }

    return computeExitCode(result.findings, result.metrics);
  } catch (error) {
    const triageError = toTriageError(error);
    logger?.debug({ error: triageError.toObject() }, 'gc-triage failed');
    io.stderr(`gc-triage: ${triageError.message}\n`);
    if (triageError.code === 'InvalidArguments') {
      io.stderr('Run gc-triage --help for usage.\n');
    }
    return EXIT_CODES.FAILURE;
  }
}
