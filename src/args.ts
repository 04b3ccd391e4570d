import type { DropMode } from './types.js';

export interface CliOptions {
  namespace: string | null;
  /** Tables to select; empty with `all` false means nothing is selected */
  tables: string[];
  all: boolean;
  mode: DropMode;
  help: boolean;
}

export const USAGE = `Usage: table-dropper <catalog.schema> [options]

Options:
  --select <a,b,...>  Select the listed tables (repeatable)
  --all               Select every table in the namespace
  --execute           Run the DROP statements (default is a dry run)
  -h, --help          Show this help`;

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    namespace: null,
    tables: [],
    all: false,
    mode: 'preview',
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg === '--all') {
      options.all = true;
    } else if (arg === '--execute') {
      options.mode = 'execute';
    } else if (arg === '--select') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ArgumentError('--select needs a comma-separated list of tables');
      }
      options.tables.push(...splitList(value));
      i++;
    } else if (arg.startsWith('--select=')) {
      options.tables.push(...splitList(arg.slice('--select='.length)));
    } else if (arg.startsWith('-')) {
      throw new ArgumentError(`Unknown option: ${arg}`);
    } else if (options.namespace === null) {
      options.namespace = arg;
    } else {
      throw new ArgumentError(`Unexpected argument: ${arg}`);
    }
  }

  return options;
}
