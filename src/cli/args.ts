/**
 * gc-triage argument parsing
 */

import { z } from 'zod';
import { TriageError, zodErrorToTriageError } from '../api/errors.js';
import { REPORT_FORMATS, type ReportFormat } from '../report/renderer.js';

export interface RawArgs {
  _: string[];
  flags: Record<string, string | boolean>;
}

const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['help', 'version', 'verbose']);

export function parseArgs(args: readonly string[]): RawArgs {
  const result: RawArgs = { _: [], flags: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq >= 0) {
        result.flags[body.slice(0, eq)] = body.slice(eq + 1);
        continue;
      }

      const nextArg = args[i + 1];
      if (!BOOLEAN_FLAGS.has(body) && nextArg !== undefined && !nextArg.startsWith('--')) {
        result.flags[body] = nextArg;
        i++;
      } else {
        result.flags[body] = true;
      }
    } else {
      result._.push(arg);
    }
  }

  return result;
}

const numberFlag = (label: string) =>
  z
    .string({ invalid_type_error: `${label} needs a value` })
    .regex(/^-?\d+(\.\d+)?$/, `${label} must be a number`)
    .transform(Number)
    .pipe(z.number().positive(`${label} must be positive`));

const pathFlag = (label: string) =>
  z.string({ invalid_type_error: `${label} needs a value` }).min(1, `${label} needs a value`);

const switchFlag = z.literal(true).optional();

export const CliFlagsSchema = z
  .object({
    'tail-window': numberFlag('--tail-window').optional(),
    'old-trend-threshold': numberFlag('--old-trend-threshold').optional(),
    format: z
      .enum(REPORT_FORMATS, {
        errorMap: () => ({ message: `--format must be one of ${REPORT_FORMATS.join(', ')}` }),
      })
      .optional(),
    output: pathFlag('--output').optional(),
    config: pathFlag('--config').optional(),
    verbose: switchFlag,
    help: switchFlag,
    version: switchFlag,
  })
  .strict();

export interface CliOptions {
  logPath: string | null;
  tailWindowMinutes?: number;
  oldTrendThreshold?: number;
  format?: ReportFormat;
  output?: string;
  configPath?: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

/**
 * Validate raw arguments. The log path may only be absent with --help or
 * --version.
 */
export function validateArgs(raw: RawArgs): CliOptions {
  const parsed = CliFlagsSchema.safeParse(raw.flags);
  if (!parsed.success) {
    const unrecognized = parsed.error.issues.find((issue) => issue.code === 'unrecognized_keys');
    if (unrecognized && unrecognized.code === 'unrecognized_keys') {
      throw new TriageError(
        'InvalidArguments',
        `Unknown option: --${unrecognized.keys.join(', --')}`,
        { keys: unrecognized.keys }
      );
    }
    throw zodErrorToTriageError(parsed.error, 'InvalidArguments');
  }

  const flags = parsed.data;
  const help = flags.help === true;
  const version = flags.version === true;

  if (raw._.length > 1) {
    throw new TriageError('InvalidArguments', `Expected one log file, got ${raw._.length}`, {
      positional: raw._,
    });
  }
  const logPath = raw._[0] ?? null;
  if (logPath === null && !help && !version) {
    throw new TriageError('InvalidArguments', 'Missing log file: gc-triage <gc.log>');
  }

  return {
    logPath,
    tailWindowMinutes: flags['tail-window'],
    oldTrendThreshold: flags['old-trend-threshold'],
    format: flags.format,
    output: flags.output,
    configPath: flags.config,
    verbose: flags.verbose === true,
    help,
    version,
  };
}

export const HELP_TEXT = `
gc-triage - Triage a G1 unified GC log and name the most likely suspects

USAGE:
  gc-triage <gc.log> [options]

OPTIONS:
  --tail-window <minutes>               Analyze only the last N minutes of JVM uptime
  --old-trend-threshold <regions/min>   Old-gen growth that marks retention (default: 5.0)
  --format <md|txt|json>                Report format (default: md)
  --output <file>                       Write the report to a file instead of stdout
  --config <file>                       YAML thresholds file (default: config/triage.yaml)
  --verbose                             Debug logging on stderr
  --help                                Show this help message
  --version                             Show version

EXIT CODES:
  0  no finding
  1  findings, none critical
  2  at least one critical finding
  3  bad arguments, unreadable file or unsupported log

EXAMPLES:
  # Whole log
  gc-triage gc.log

  # Last 30 minutes, plain text
  gc-triage gc.log --tail-window 30 --format txt

  # Enable TLAB statistics on the JVM side first
  java -Xlog:gc*,gc+tlab=debug:file=gc.log ...

ENVIRONMENT VARIABLES:
  GC_TRIAGE_LOG_LEVEL                   Log level (trace|debug|info|warn|error|fatal)
  NODE_ENV                              Selects the environments section of the config
`;
