import { ExtractError } from './errors.js';

/**
 * Command-line options of the extractor
 */
export interface CliOptions {
  /** Input files; '-' is standard input */
  inputs: string[];
  /** Registry JSON replacing the configured one */
  registryPath?: string;
  /** Catalog destination (default: stdout) */
  outputPath?: string;
  /** Name used for standard input in locations */
  sourceName: string;
  /** Do not print warnings */
  quiet: boolean;
  help: boolean;
}

export class UsageError extends ExtractError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: sql-i18n-extract [options] [file.sql ...]

Reads SQL from the files given (or standard input) and writes a translation
template of the text found in translatable columns.

Options:
  --registry=<path>     translatable-column registry (JSON: table -> columns)
  --output=<path>       write the catalog to a file instead of stdout
  --source-name=<name>  name used for standard input in locations (default: stdin)
  --quiet               do not print warnings
  --help                show this help
`;

function optionValue(arg: string, name: string): string | undefined {
  const prefix = `--${name}=`;
  if (!arg.startsWith(prefix)) return undefined;
  const value = arg.slice(prefix.length);
  if (!value) {
    throw new UsageError(`Option --${name} needs a value`);
  }
  return value;
}

/**
 * Parse process arguments (without node and script path)
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    inputs: [],
    sourceName: 'stdin',
    quiet: false,
    help: false
  };

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }
    if (arg === '--quiet') {
      options.quiet = true;
      continue;
    }

    const registryPath = optionValue(arg, 'registry');
    if (registryPath !== undefined) {
      options.registryPath = registryPath;
      continue;
    }
    const outputPath = optionValue(arg, 'output');
    if (outputPath !== undefined) {
      options.outputPath = outputPath;
      continue;
    }
    const sourceName = optionValue(arg, 'source-name');
    if (sourceName !== undefined) {
      options.sourceName = sourceName;
      continue;
    }

    if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    options.inputs.push(arg);
  }

  if (options.inputs.length === 0) {
    options.inputs.push('-');
  }
  return options;
}
