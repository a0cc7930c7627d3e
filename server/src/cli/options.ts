import { parseArgs } from 'node:util';
import type { ReportScope } from '@delaylens/shared';
import { ValidationError } from '../errors/AppError.js';

export type OutputFormat = 'json' | 'md' | 'both';

export interface CliOptions {
  baseline: string;
  updated: string;
  criticalPath: string;
  /** Output file prefix; `.json` / `.md` are appended. */
  output: string;
  outputDir: string;
  format: OutputFormat;
  scope: ReportScope;
}

export type CliCommand = { kind: 'help' } | { kind: 'analyze'; options: CliOptions };

export const USAGE = `Usage: delaylens <baseline.json> <updated.json> <critical_path.json> -o <prefix> [options]

Compare a baseline schedule with an updated snapshot and report delayed activities,
their causes and the successors they push.

Options:
  -o, --output <prefix>      Output file prefix (required)
  -d, --output-dir <dir>     Output directory (default: .)
  -f, --format <format>      json, md or both (default: both)
  -s, --scope <scope>        critical or all (default: critical)
  -h, --help                 Show this help

Examples:
  delaylens baseline.json updated.json critical_path.json -o analysis
  delaylens baseline.json updated.json critical_path.json -o analysis -d output/ -f md
  delaylens baseline.json updated.json critical_path.json -o analysis --scope all
`;

const FORMATS: readonly OutputFormat[] = ['json', 'md', 'both'];
const SCOPES: readonly ReportScope[] = ['critical', 'all'];

/**
 * Parse CLI arguments (without the node executable and script path).
 *
 * @throws ValidationError listing every problem found
 */
export function parseCliArgs(argv: string[]): CliCommand {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    // parseArgs throws TypeError for unknown options and missing option values
    throw new ValidationError(err instanceof Error ? err.message : String(err));
  }

  const { values, positionals } = parsed;
  if (values.help) return { kind: 'help' };

  const errors: string[] = [];

  if (positionals.length !== 3) {
    errors.push(
      `expected 3 input files (baseline, updated, critical path), got ${positionals.length}`,
    );
  }

  const output = values.output ?? '';
  if (output === '') {
    errors.push('--output is required');
  }

  const formatStr = values.format ?? 'both';
  const format = FORMATS.find((f) => f === formatStr);
  if (!format) {
    errors.push(`--format must be one of ${FORMATS.join(', ')}, got: ${formatStr}`);
  }

  const scopeStr = values.scope ?? 'critical';
  const scope = SCOPES.find((s) => s === scopeStr);
  if (!scope) {
    errors.push(`--scope must be one of ${SCOPES.join(', ')}, got: ${scopeStr}`);
  }

  if (errors.length > 0 || !format || !scope) {
    throw new ValidationError(`Invalid arguments:\n  - ${errors.join('\n  - ')}`, { errors });
  }

  const [baseline, updated, criticalPath] = positionals;
  return {
    kind: 'analyze',
    options: {
      baseline,
      updated,
      criticalPath,
      output,
      outputDir: values['output-dir'] ?? '.',
      format,
      scope,
    },
  };
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      output: { type: 'string', short: 'o' },
      'output-dir': { type: 'string', short: 'd' },
      format: { type: 'string', short: 'f' },
      scope: { type: 'string', short: 's' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
