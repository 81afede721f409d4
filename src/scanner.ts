import { Registry, ScanCursor, ScanEffect, ScanState, TableTarget } from './types.js';
import { isRegisteredTable, isTranslatable } from './registry.js';
import { preprocessLine } from './preprocess.js';

/**
 * Tokens recognised at the head of a buffer.
 * `end` is the offset just past the token.
 */
export type Token =
  | { kind: 'word'; text: string; start: number; end: number }
  | { kind: 'string'; value: string; start: number; end: number }
  | { kind: 'ident'; value: string; start: number; end: number }
  | { kind: 'punct'; text: '(' | ')' | ',' | ';'; start: number; end: number }
  | { kind: 'comment-open'; start: number; end: number }
  | { kind: 'line-comment'; start: number; end: number }
  | { kind: 'incomplete'; start: number }
  | { kind: 'end' };

/**
 * Tokens that take part in statement syntax
 */
export type SyntaxToken = Extract<Token, { kind: 'word' | 'string' | 'ident' | 'punct' }>;

type PunctText = '(' | ')' | ',' | ';';

/**
 * Result of a single transition
 */
export interface StepResult {
  state: ScanState;
  /** Text left after the transition (carry-over when needMore is set) */
  rest: string;
  effects: ScanEffect[];
  /** The buffer is exhausted, or the transition needs the next line */
  needMore: boolean;
}

export const IDLE: ScanState = { kind: 'idle' };

export const DEFAULT_DELIMITER = '\t';

/** COPY null marker */
const COPY_NULL = '\\N';

/** Line terminating a COPY data block */
const END_OF_DATA = '\\.';

const WORD_PATTERN = /[^\s(),;'"]+/y;

/**
 * Read a quoted run starting at `start` (a quote character).
 * The quote doubled inside the run stands for itself.
 */
function readQuoted(buffer: string, start: number, quote: string): { value: string; end: number } | null {
  let pos = start + 1;
  for (;;) {
    const close = buffer.indexOf(quote, pos);
    if (close < 0) return null;
    if (buffer[close + 1] === quote) {
      pos = close + 2;
      continue;
    }
    return {
      value: buffer.slice(start + 1, close).split(quote + quote).join(quote),
      end: close + 1
    };
  }
}

/**
 * Read the token at or after `pos`
 */
export function readToken(buffer: string, pos: number = 0): Token {
  let start = pos;
  while (start < buffer.length && /\s/.test(buffer[start])) start++;
  if (start >= buffer.length) return { kind: 'end' };

  const ch = buffer[start];
  const next = buffer[start + 1];

  if (ch === '/' && next === '*') {
    return { kind: 'comment-open', start, end: start + 2 };
  }
  if (ch === '-' && next === '-') {
    const newline = buffer.indexOf('\n', start);
    return { kind: 'line-comment', start, end: newline < 0 ? buffer.length : newline };
  }
  if (ch === "'" || ch === '"') {
    const quoted = readQuoted(buffer, start, ch);
    if (!quoted) return { kind: 'incomplete', start };
    return ch === "'"
      ? { kind: 'string', value: quoted.value, start, end: quoted.end }
      : { kind: 'ident', value: quoted.value, start, end: quoted.end };
  }
  if (ch === '(' || ch === ')' || ch === ',' || ch === ';') {
    return { kind: 'punct', text: ch, start, end: start + 1 };
  }

  WORD_PATTERN.lastIndex = start;
  const match = WORD_PATTERN.exec(buffer);
  // every character not handled above starts a word
  const text = match ? match[0] : ch;
  return { kind: 'word', text, start, end: start + text.length };
}

/**
 * Read the next significant token, skipping comments that close within the buffer
 */
export function peekToken(buffer: string, pos: number): Token {
  let cursor = pos;
  for (;;) {
    const token = readToken(buffer, cursor);
    if (token.kind === 'line-comment') {
      cursor = token.end;
      continue;
    }
    if (token.kind === 'comment-open') {
      const close = buffer.indexOf('*/', token.end);
      if (close < 0) return { kind: 'incomplete', start: token.start };
      cursor = close + 2;
      continue;
    }
    return token;
  }
}

function isKeyword(token: Token, keyword: string): boolean {
  return token.kind === 'word' && token.text.toUpperCase() === keyword;
}

function isPunct<P extends PunctText>(token: Token, text: P): token is Extract<Token, { kind: 'punct' }> & { text: P } {
  return token.kind === 'punct' && token.text === text;
}

function describeToken(token: Token): string {
  switch (token.kind) {
    case 'word': return `"${token.text}"`;
    case 'string': return 'a string literal';
    case 'ident': return `"${token.value}"`;
    case 'punct': return `"${token.text}"`;
    default: return 'end of input';
  }
}

/**
 * Table name of a word or quoted identifier, without any schema prefix
 */
function tableName(token: Token): string | null {
  if (token.kind === 'ident') return token.value;
  if (token.kind !== 'word') return null;
  const segments = token.text.split('.');
  return segments[segments.length - 1] || null;
}

function columnName(token: Token): string | null {
  if (token.kind === 'ident') return token.value;
  if (token.kind === 'word') return token.text;
  return null;
}

function advance(state: ScanState, buffer: string, end: number, effects: ScanEffect[] = []): StepResult {
  return { state, rest: buffer.slice(end), effects, needMore: false };
}

function carry(state: ScanState, buffer: string): StepResult {
  return { state, rest: buffer.trimStart(), effects: [], needMore: true };
}

/**
 * Recoverable deviation: back to idle, dropping the statement and the rest of the buffer
 */
function fail(message: string): StepResult {
  return { state: IDLE, rest: '', effects: [{ kind: 'warning', message }], needMore: false };
}

/**
 * Enter the data block. Whatever follows on the current line is not data.
 */
function startData(target: TableTarget, delimiter: string): StepResult {
  return { state: { kind: 'in-data-block', target, delimiter }, rest: '', effects: [], needMore: true };
}

/**
 * Offset just past the `)` matching the `(` that ends at `pos`, or null if it
 * is not in the buffer
 */
function skipBalanced(buffer: string, pos: number): number | null {
  let depth = 1;
  let cursor = pos;
  while (depth > 0) {
    const token = peekToken(buffer, cursor);
    if (token.kind === 'end' || token.kind === 'incomplete') return null;
    if (isPunct(token, '(')) depth++;
    if (isPunct(token, ')')) depth--;
    cursor = token.end;
  }
  return cursor;
}

/**
 * A value inside a VALUES tuple: its recordable text (null for opaque
 * expressions) and where it ends, or null when the buffer stops inside it.
 */
type ValueRead = { text: string | null; end: number } | 'invalid' | null;

function readValue(buffer: string, token: SyntaxToken): ValueRead {
  let text: string | null;
  let end: number;

  if (token.kind === 'string') {
    text = token.value;
    end = token.end;
  } else if (token.kind === 'word') {
    const next = peekToken(buffer, token.end);
    if (next.kind === 'end' || next.kind === 'incomplete') return null;
    if (isPunct(next, '(')) {
      const close = skipBalanced(buffer, next.end);
      if (close === null) return null;
      text = null;
      end = close;
    } else {
      const upper = token.text.toUpperCase();
      text = upper === 'NULL' || upper === 'DEFAULT' ? null : token.text;
      end = token.end;
    }
  } else if (isPunct(token, '(')) {
    const close = skipBalanced(buffer, token.end);
    if (close === null) return null;
    text = null;
    end = close;
  } else {
    return 'invalid';
  }

  const cast = peekToken(buffer, end);
  if (cast.kind === 'word' && cast.text.startsWith('::')) {
    end = cast.end;
  }
  return { text, end };
}

/**
 * Column list of INSERT or COPY: `( name, name, ... )`
 */
function stepColumnList(
  state: Extract<ScanState, { kind: 'in-column-list' | 'in-copy-column-list' }>,
  buffer: string,
  token: SyntaxToken
): StepResult {
  const { target } = state;
  const statement = state.kind === 'in-column-list' ? 'INSERT INTO' : 'COPY';

  if (!state.open) {
    if (isPunct(token, '(')) {
      return advance({ ...state, open: true }, buffer, token.end);
    }
    // COPY without a column list: the rows load every column, none of them known
    if (state.kind === 'in-copy-column-list' && isKeyword(token, 'FROM')) {
      return stepCopySource(state, buffer, token, target, `COPY ${target.table}`);
    }
    return fail(`${statement} ${target.table} not followed by a column list (found ${describeToken(token)})`);
  }

  const name = columnName(token);
  if (name === null) {
    return fail(`Malformed column list for ${target.table}: unexpected ${describeToken(token)}`);
  }

  const next = peekToken(buffer, token.end);
  if (next.kind === 'end' || next.kind === 'incomplete') {
    return carry(state, buffer);
  }

  const extended: TableTarget = { ...target, columns: [...target.columns, name] };
  if (isPunct(next, ',')) {
    return advance({ ...state, target: extended }, buffer, next.end);
  }
  if (isPunct(next, ')')) {
    const done: ScanState = state.kind === 'in-column-list'
      ? { kind: 'column-list-done', target: extended }
      : { kind: 'copy-column-list-done', target: extended };
    return advance(done, buffer, next.end);
  }
  return fail(`Malformed column list for ${target.table}: unexpected ${describeToken(next)} after "${name}"`);
}

/**
 * One value of a tuple, with the separator that follows it
 */
function stepValue(
  state: Extract<ScanState, { kind: 'in-value-tuple' }>,
  buffer: string,
  token: SyntaxToken,
  registry: Registry
): StepResult {
  const { target } = state;
  const value = readValue(buffer, token);

  if (value === null) return carry(state, buffer);
  if (value === 'invalid') {
    return fail(`Unexpected ${describeToken(token)} in VALUES for ${target.table}`);
  }

  const separator = peekToken(buffer, value.end);
  if (separator.kind === 'end' || separator.kind === 'incomplete') {
    return carry(state, buffer);
  }
  if (!isPunct(separator, ',') && !isPunct(separator, ')')) {
    return fail(`Unexpected ${describeToken(separator)} in VALUES for ${target.table}`);
  }

  const ordinal = state.ordinal + 1;
  const effects: ScanEffect[] = [];
  if (value.text && isTranslatable(registry, target, ordinal)) {
    effects.push({ kind: 'record', text: value.text });
  }

  const nextState: ScanState = isPunct(separator, ',')
    ? { kind: 'in-value-tuple', target, ordinal }
    : { kind: 'value-tuple-done', target };
  return advance(nextState, buffer, separator.end, effects);
}

/**
 * `FROM STDIN` after COPY's table or column list. Any other source has no inline data.
 */
function stepCopySource(
  state: ScanState,
  buffer: string,
  token: SyntaxToken,
  target: TableTarget,
  subject: string
): StepResult {
  const source = peekToken(buffer, token.end);
  if (source.kind === 'end' || source.kind === 'incomplete') {
    return carry(state, buffer);
  }
  if (isKeyword(source, 'STDIN')) {
    return advance({ kind: 'seen-from-stdin', target }, buffer, source.end);
  }
  return fail(`${subject} not followed by FROM STDIN`);
}

/**
 * `[WITH] DELIMITER [AS] '<c>'` after FROM STDIN
 */
function stepDelimiter(
  state: Extract<ScanState, { kind: 'seen-from-stdin' }>,
  buffer: string,
  pos: number
): StepResult {
  const { target } = state;
  let literal = peekToken(buffer, pos);
  if (literal.kind === 'word' && literal.text.toUpperCase() === 'AS') {
    literal = peekToken(buffer, literal.end);
  }
  if (literal.kind === 'end' || literal.kind === 'incomplete') {
    return carry(state, buffer);
  }
  if (literal.kind !== 'string' || literal.value.length !== 1) {
    return fail(`COPY ${target.table}: DELIMITER must be a single-character string`);
  }
  return advance({ kind: 'seen-custom-delimiter', target, delimiter: literal.value }, buffer, literal.end);
}

/**
 * Apply one transition to the text at the head of `buffer`.
 *
 * Pure: the caller owns the state and decides what to do with the effects.
 */
export function step(state: ScanState, buffer: string, registry: Registry): StepResult {
  if (state.kind === 'in-block-comment') {
    const close = buffer.indexOf('*/');
    if (close < 0) return { state, rest: '', effects: [], needMore: true };
    return advance(state.resume, buffer, close + 2);
  }

  // data rows are handled line by line in scanDataLine
  if (state.kind === 'in-data-block') {
    return { state, rest: '', effects: [], needMore: true };
  }

  const token = readToken(buffer);

  if (token.kind === 'end') {
    return { state, rest: '', effects: [], needMore: true };
  }
  if (token.kind === 'comment-open') {
    return advance({ kind: 'in-block-comment', resume: state }, buffer, token.end);
  }
  if (token.kind === 'line-comment') {
    return advance(state, buffer, token.end);
  }
  if (token.kind === 'incomplete') {
    // idle never carries text over: an unterminated literal there is not ours
    return state.kind === 'idle'
      ? { state, rest: '', effects: [], needMore: true }
      : carry(state, buffer);
  }

  switch (state.kind) {
    case 'idle': {
      if (isKeyword(token, 'INSERT')) {
        return advance({ kind: 'seen-insert' }, buffer, token.end);
      }
      if (token.kind === 'word' && /^\\?copy$/i.test(token.text)) {
        return advance({ kind: 'seen-copy' }, buffer, token.end);
      }
      return advance(state, buffer, token.end);
    }

    case 'seen-insert': {
      if (isKeyword(token, 'INTO')) {
        return advance({ kind: 'seen-into' }, buffer, token.end);
      }
      return fail('INSERT not followed by INTO');
    }

    case 'seen-into':
    case 'seen-copy': {
      const table = tableName(token);
      const statement = state.kind === 'seen-into' ? 'INSERT INTO' : 'COPY';
      if (table === null) {
        return fail(`${statement} not followed by a table name (found ${describeToken(token)})`);
      }
      if (!isRegisteredTable(registry, table)) {
        return advance(IDLE, buffer, token.end);
      }
      const target: TableTarget = { table: table.toLowerCase(), columns: [] };
      return advance(
        state.kind === 'seen-into'
          ? { kind: 'in-column-list', target, open: false }
          : { kind: 'in-copy-column-list', target, open: false },
        buffer,
        token.end
      );
    }

    case 'in-column-list':
    case 'in-copy-column-list':
      return stepColumnList(state, buffer, token);

    case 'column-list-done': {
      if (isKeyword(token, 'VALUES')) {
        return advance({ kind: 'seen-values-open', target: state.target }, buffer, token.end);
      }
      return fail(`Column list for ${state.target.table} not followed by VALUES`);
    }

    case 'seen-values-open': {
      if (isPunct(token, '(')) {
        return advance({ kind: 'in-value-tuple', target: state.target, ordinal: 0 }, buffer, token.end);
      }
      return fail(`VALUES for ${state.target.table} not followed by a value tuple`);
    }

    case 'in-value-tuple':
      return stepValue(state, buffer, token, registry);

    case 'value-tuple-done': {
      if (isPunct(token, ',')) {
        return advance({ kind: 'seen-values-open', target: state.target }, buffer, token.end);
      }
      if (isPunct(token, ';')) {
        return advance(IDLE, buffer, token.end);
      }
      // ON CONFLICT, RETURNING...: no more values; idle skips the tail
      return advance(IDLE, buffer, token.start);
    }

    case 'copy-column-list-done': {
      if (isKeyword(token, 'FROM')) {
        return stepCopySource(state, buffer, token, state.target, `COPY ${state.target.table} column list`);
      }
      return fail(`COPY ${state.target.table} column list not followed by FROM STDIN`);
    }

    case 'seen-from-stdin': {
      if (isPunct(token, ';')) {
        return startData(state.target, DEFAULT_DELIMITER);
      }
      if (isKeyword(token, 'WITH')) {
        return advance(state, buffer, token.end);
      }
      if (isKeyword(token, 'DELIMITER')) {
        return stepDelimiter(state, buffer, token.end);
      }
      return fail(`COPY ${state.target.table}: unexpected ${describeToken(token)} after FROM STDIN`);
    }

    case 'seen-custom-delimiter': {
      if (isPunct(token, ';')) {
        return startData(state.target, state.delimiter);
      }
      return fail(`COPY ${state.target.table}: unexpected ${describeToken(token)} after DELIMITER`);
    }
  }
}

/**
 * Run transitions until the buffer is used up or the next line is needed.
 * The returned `pending` text is always empty in the idle state.
 */
export function scanBuffer(
  state: ScanState,
  buffer: string,
  registry: Registry
): { state: ScanState; pending: string; effects: ScanEffect[] } {
  const effects: ScanEffect[] = [];
  let current = state;
  let rest = buffer;

  for (;;) {
    const result = step(current, rest, registry);
    effects.push(...result.effects);
    current = result.state;
    rest = result.rest;
    if (result.needMore) break;
  }

  return { state: current, pending: current.kind === 'idle' ? '' : rest, effects };
}

/**
 * End of a line with nothing carried over: a COPY header is complete
 */
export function endOfLine(state: ScanState): ScanState {
  switch (state.kind) {
    case 'seen-from-stdin':
      return { kind: 'in-data-block', target: state.target, delimiter: DEFAULT_DELIMITER };
    case 'seen-custom-delimiter':
      return { kind: 'in-data-block', target: state.target, delimiter: state.delimiter };
    default:
      return state;
  }
}

/**
 * One row of a COPY data block. Fields are numbered from 1.
 */
export function scanDataLine(
  state: Extract<ScanState, { kind: 'in-data-block' }>,
  line: string,
  registry: Registry
): { state: ScanState; effects: ScanEffect[] } {
  if (line.trimEnd() === END_OF_DATA) {
    return { state: IDLE, effects: [] };
  }

  const effects: ScanEffect[] = [];
  if (line === '') {
    return { state, effects };
  }

  line.split(state.delimiter).forEach((field, index) => {
    if (field === '' || field === COPY_NULL) return;
    if (isTranslatable(registry, state.target, index + 1)) {
      effects.push({ kind: 'record', text: field });
    }
  });

  return { state, effects };
}

/**
 * Consume one raw line: the cursor goes in, the advanced cursor comes out
 */
export function scanLine(
  cursor: ScanCursor,
  raw: string,
  registry: Registry
): { cursor: ScanCursor; effects: ScanEffect[] } {
  const line = cursor.line + 1;

  if (cursor.state.kind === 'in-data-block') {
    const text = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    const result = scanDataLine(cursor.state, text, registry);
    return { cursor: { state: result.state, line, pending: '' }, effects: result.effects };
  }

  const buffer = preprocessLine(cursor.pending, raw, cursor.state);
  const result = scanBuffer(cursor.state, buffer, registry);
  const state = result.pending ? result.state : endOfLine(result.state);

  return { cursor: { state, line, pending: result.pending }, effects: result.effects };
}

export function initialCursor(): ScanCursor {
  return { state: IDLE, line: 0, pending: '' };
}
