import { createInterface } from 'node:readline';
import fs from 'fs-extra';
import { Catalog } from './catalog.js';
import { InputReadError, describeError } from './errors.js';
import { initialCursor, scanLine } from './scanner.js';
import { Registry, ScanCursor, ScanEffect, ScanWarning } from './types.js';

/**
 * Options shared by every scan of one run
 */
export interface ScanOptions {
  /** Translatable columns per table */
  registry: Registry;
  /** Catalog the recognised strings are added to (owned by the caller) */
  catalog: Catalog;
  /** Called for each warning as it is found */
  onWarning?: (warning: ScanWarning) => void;
}

/**
 * Result of scanning one input
 */
export interface ScanResult {
  /** Source identifier used in locations */
  source: string;
  /** Raw lines consumed */
  lines: number;
  /** Recoverable deviations, in input order */
  warnings: ScanWarning[];
}

/**
 * Scans one input line by line. Owns the cursor; the catalog belongs to the caller.
 */
export class SqlScanner {
  private cursor: ScanCursor = initialCursor();
  private readonly warnings: ScanWarning[] = [];

  constructor(
    private readonly source: string,
    private readonly options: ScanOptions
  ) {}

  get state(): ScanCursor['state'] {
    return this.cursor.state;
  }

  get line(): number {
    return this.cursor.line;
  }

  get pending(): string {
    return this.cursor.pending;
  }

  feedLine(raw: string): void {
    const { cursor, effects } = scanLine(this.cursor, raw, this.options.registry);
    this.cursor = cursor;
    this.apply(effects);
  }

  private apply(effects: ScanEffect[]): void {
    const { source } = this;
    const { line } = this.cursor;

    for (const effect of effects) {
      if (effect.kind === 'record') {
        this.options.catalog.record(effect.text, { source, line });
      } else {
        const warning: ScanWarning = { source, line, message: effect.message };
        this.warnings.push(warning);
        this.options.onWarning?.(warning);
      }
    }
  }

  result(): ScanResult {
    return { source: this.source, lines: this.cursor.line, warnings: [...this.warnings] };
  }
}

/**
 * Split text into lines. A final line terminator does not start another line.
 */
export function splitLines(content: string): string[] {
  const lines = content.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Scan SQL text held in memory
 */
export function scanText(content: string, source: string, options: ScanOptions): ScanResult {
  const scanner = new SqlScanner(source, options);
  for (const line of splitLines(content)) {
    scanner.feedLine(line);
  }
  return scanner.result();
}

/**
 * Scan a SQL file. Read failures abort with InputReadError.
 */
export async function scanFile(filePath: string, options: ScanOptions): Promise<ScanResult> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new InputReadError(`Failed to read ${filePath}: ${describeError(err)}`, filePath);
  }
  return scanText(content, filePath, options);
}

/**
 * Scan a readable stream such as standard input, one line at a time
 */
export async function scanStream(
  stream: NodeJS.ReadableStream,
  source: string,
  options: ScanOptions
): Promise<ScanResult> {
  const scanner = new SqlScanner(source, options);
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  const failed: { error?: unknown } = {};

  // readline ends the iteration on close; the input error is kept here
  stream.on('error', err => {
    failed.error ??= err;
    lines.close();
  });

  try {
    for await (const line of lines) {
      scanner.feedLine(line);
    }
  } catch (err) {
    failed.error ??= err;
  }

  if (failed.error !== undefined) {
    throw new InputReadError(`Failed to read ${source}: ${describeError(failed.error)}`, source);
  }
  return scanner.result();
}

/**
 * Format a warning for the diagnostic channel
 */
export function formatWarning(warning: ScanWarning): string {
  return `${warning.source}:${warning.line}: ${warning.message}`;
}

/**
 * Scan several inputs into one catalog, in order. '-' names standard input.
 */
export async function scanInputs(
  inputs: string[],
  options: ScanOptions & { stdin?: NodeJS.ReadableStream; stdinName?: string }
): Promise<ScanResult[]> {
  const results: ScanResult[] = [];
  for (const input of inputs) {
    if (input === '-') {
      results.push(await scanStream(options.stdin ?? process.stdin, options.stdinName ?? 'stdin', options));
    } else {
      results.push(await scanFile(input, options));
    }
  }
  return results;
}
