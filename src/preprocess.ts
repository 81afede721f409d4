import { ScanState } from './types.js';

/**
 * Lexical mode of the character scan used to find line comments
 */
export type LexMode = 'code' | 'quote' | 'ident' | 'block';

/**
 * Walk `text` from `start` mode.
 * Returns the mode at the end of the text, and the offset of the first
 * `--` seen in code mode (null when there is none).
 */
export function scanModes(text: string, start: LexMode): { mode: LexMode; cut: number | null } {
  let mode = start;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    switch (mode) {
      case 'code':
        if (ch === '-' && next === '-') {
          return { mode, cut: i };
        }
        if (ch === '/' && next === '*') {
          mode = 'block';
          i += 2;
          continue;
        }
        if (ch === "'") mode = 'quote';
        else if (ch === '"') mode = 'ident';
        break;
      // a doubled quote leaves and re-enters the literal, which nets out
      case 'quote':
        if (ch === "'") mode = 'code';
        break;
      case 'ident':
        if (ch === '"') mode = 'code';
        break;
      case 'block':
        if (ch === '*' && next === '/') {
          mode = 'code';
          i += 2;
          continue;
        }
        break;
    }
    i++;
  }

  return { mode, cut: null };
}

/**
 * Strip a trailing `--` comment, starting the scan in the given mode
 */
export function stripLineComment(line: string, start: LexMode = 'code'): string {
  const { cut } = scanModes(line, start);
  return cut === null ? line : line.slice(0, cut);
}

/**
 * Build the logical buffer for the next raw line: carry-over text, a newline,
 * then the line with its trailing comment removed.
 *
 * Rows of a COPY data block are not SQL and pass through untouched.
 */
export function preprocessLine(pending: string, raw: string, state: ScanState): string {
  const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;

  if (state.kind === 'in-data-block') {
    return line;
  }

  const start: LexMode = state.kind === 'in-block-comment'
    ? 'block'
    : scanModes(pending, 'code').mode;
  const text = stripLineComment(line, start);

  return pending ? `${pending}\n${text}` : text;
}
