/**
 * Command-line argument parsing for cas-extract
 */

export interface CliArgs {
  filename: string;
  password?: string;
  format: string;
  output?: string;
  navFile?: string;
  metricsFile?: string;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage:
  cas-extract <statement.pdf> [options]

Options:
  --password <pw>         PDF password (default: $CAS_PDF_PASSWORD)
  --format <fmt>          csv | json | dicts | df (default: csv)
  --output <file.csv>     CSV file to write (default: CAMS_data_<timestamp>.csv)
  --nav-file <file>       Read the AMFI NAVopen.txt table from disk instead of downloading it
  --metrics-file <file>   Write run metrics in Prometheus text format
  --help                  Show this message

Value options also accept the --option=value form.`;

const VALUE_OPTIONS = {
  '--password': 'password',
  '--format': 'format',
  '--output': 'output',
  '--nav-file': 'navFile',
  '--metrics-file': 'metricsFile',
} as const;

function isValueOption(arg: string): arg is keyof typeof VALUE_OPTIONS {
  return Object.prototype.hasOwnProperty.call(VALUE_OPTIONS, arg);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { filename: '', format: 'csv', help: false };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
      continue;
    }

    // --option=value
    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq !== -1) {
      const name = arg.slice(0, eq);
      if (!isValueOption(name)) {
        throw new UsageError(`Unknown option: ${name}`);
      }
      args[VALUE_OPTIONS[name]] = arg.slice(eq + 1);
      continue;
    }

    if (isValueOption(arg)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`Option ${arg} requires a value`);
      }
      args[VALUE_OPTIONS[arg]] = value;
      i++;
      continue;
    }

    if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    positional.push(arg);
  }

  if (args.help) {
    return args;
  }
  if (positional.length !== 1) {
    throw new UsageError('Expected exactly one statement PDF path');
  }

  args.filename = positional[0];
  return args;
}
