import type { Diagnostic, DiagnosticAccumulator } from './diagnostics';
import { lineAt } from './diagnostics';
import type { Result } from './result';
import { Ok, OK_VOID, andThen } from './result';
import type { Vec3 } from './vector_math';
import { hasNegativeCoordinate, isCounterClockwise } from './vector_math';

export const FACET_NORMAL = 'facet normal <float> <float> <float>';
export const VERTEX = 'vertex <unsigned float> <unsigned float> <unsigned float>';
export const END_OF_INPUT = 'end of input';

export type SourceLine = {
  /** 1-based line number in the original file. */
  readonly number: number;
  readonly text: string;
};

const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= '0' && ch <= '9';

/**
 * Numeric token grammar: `-? digits* ( . digits+ )? ( [eE] [+-]? digits+ )?`.
 * A token with no mantissa digits at all (`-`, `e5`) is still accepted.
 */
export function isFloatToken(token: string): boolean {
  let i = 0;
  if (token[i] === '-') i++;
  while (isDigit(token[i])) i++;
  if (token[i] === '.') {
    i++;
    if (!isDigit(token[i])) return false;
    while (isDigit(token[i])) i++;
  }
  if (token[i] === 'e' || token[i] === 'E') {
    i++;
    if (token[i] === '+' || token[i] === '-') i++;
    if (!isDigit(token[i])) return false;
    while (isDigit(token[i])) i++;
  }
  return i === token.length;
}

/** Reads a token accepted by `isFloatToken`. Without mantissa digits it is a signed zero. */
export function parseFloatToken(token: string): number {
  for (const ch of token) {
    if (ch === 'e' || ch === 'E') break;
    if (isDigit(ch)) return Number(token);
  }
  return token.startsWith('-') ? -0 : 0;
}

/**
 * Matches a normalized line made of `keywords` followed by three numbers.
 * Returns undefined when the keywords or any number token differ.
 */
export function matchVectorLine(text: string, keywords: readonly string[]): Vec3 | undefined {
  const tokens = text.split(' ');
  if (tokens.length !== keywords.length + 3) return undefined;
  if (keywords.some((keyword, i) => tokens[i] !== keyword)) return undefined;
  const fields = tokens.slice(keywords.length);
  if (!fields.every(isFloatToken)) return undefined;
  const [x = '', y = '', z = ''] = fields;
  return [parseFloatToken(x), parseFloatToken(y), parseFloatToken(z)];
}

export const normalizeLine = (line: string): string => line.replace(/\s+/g, ' ').trim();

export function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  // a terminating newline does not start another line
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Hands out normalized lines one at a time. Blank lines are skipped as the
 * cursor passes them, each with a warning; blank lines it never reaches are
 * never reported.
 */
export class LineCursor {
  private readonly lines: readonly SourceLine[];
  private index = 0;

  constructor(text: string, private readonly accumulator: DiagnosticAccumulator) {
    this.lines = splitLines(text).map((raw, i) => ({ number: i + 1, text: normalizeLine(raw) }));
  }

  /** The next line with content, without consuming anything. */
  peek(): SourceLine | undefined {
    return this.lines.slice(this.index).find((line) => line.text !== '');
  }

  next(expected: string): Result<SourceLine, Diagnostic> {
    let line = this.lines[this.index];
    while (line !== undefined && line.text === '') {
      this.accumulator.warn('empty-line', lineAt(line.number), 'line is empty', '');
      this.index++;
      line = this.lines[this.index];
    }
    if (line === undefined) {
      return this.accumulator.error('unexpected-end-of-input', lineAt(this.lines.length + 1), expected, END_OF_INPUT);
    }
    this.index++;
    return Ok(line);
  }
}

const expectExact = (cursor: LineCursor, keyword: string, accumulator: DiagnosticAccumulator): Result<void, Diagnostic> =>
  andThen(cursor.next(keyword), (line): Result<void, Diagnostic> =>
    line.text === keyword ? OK_VOID : accumulator.error('grammar', lineAt(line.number), keyword, line.text)
  );

function readHeader(cursor: LineCursor, accumulator: DiagnosticAccumulator): Result<string, Diagnostic> {
  return andThen(cursor.next('solid'), (line): Result<string, Diagnostic> => {
    if (!line.text.startsWith('solid')) {
      return accumulator.error('grammar', lineAt(line.number), 'solid', line.text);
    }
    if (!line.text.startsWith('solid ')) {
      accumulator.warn('unnamed-solid', lineAt(line.number), 'solid <string>', line.text);
      return Ok('');
    }
    return Ok(line.text.slice(6).trimStart());
  });
}

type VertexLine = { readonly vertex: Vec3; readonly line: SourceLine };

function readVertex(cursor: LineCursor, accumulator: DiagnosticAccumulator): Result<VertexLine, Diagnostic> {
  return andThen(cursor.next(VERTEX), (line): Result<VertexLine, Diagnostic> => {
    const vertex = matchVectorLine(line.text, ['vertex']);
    if (vertex === undefined) {
      return accumulator.error('grammar', lineAt(line.number), VERTEX, line.text);
    }
    if (hasNegativeCoordinate([vertex])) {
      const flagged = accumulator.raise(
        'negative-vertex',
        lineAt(line.number),
        'not all vertices have positive values',
        line.text
      );
      if (!flagged.ok) return flagged;
    }
    return Ok({ vertex, line });
  });
}

function readFacet(cursor: LineCursor, accumulator: DiagnosticAccumulator): Result<void, Diagnostic> {
  const normalLine = cursor.next(FACET_NORMAL);
  if (!normalLine.ok) return normalLine;
  const normal = matchVectorLine(normalLine.value.text, ['facet', 'normal']);
  if (normal === undefined) {
    return accumulator.error('grammar', lineAt(normalLine.value.number), FACET_NORMAL, normalLine.value.text);
  }

  const outer = expectExact(cursor, 'outer loop', accumulator);
  if (!outer.ok) return outer;

  const first = readVertex(cursor, accumulator);
  if (!first.ok) return first;
  const second = readVertex(cursor, accumulator);
  if (!second.ok) return second;
  const third = readVertex(cursor, accumulator);
  if (!third.ok) return third;

  const thirdLine = third.value.line;
  if (!isCounterClockwise(first.value.vertex, second.value.vertex, third.value.vertex, normal)) {
    const flagged = accumulator.raise(
      'winding-order',
      lineAt(thirdLine.number),
      'vertices of facet are not ordered counterclockwise',
      thirdLine.text
    );
    if (!flagged.ok) return flagged;
  }

  return andThen(expectExact(cursor, 'endloop', accumulator), () => expectExact(cursor, 'endfacet', accumulator));
}

/** Facets run until the `endsolid` line; running out of lines first is an error. */
function readFacets(cursor: LineCursor, accumulator: DiagnosticAccumulator): Result<void, Diagnostic> {
  for (let line = cursor.peek(); line !== undefined && !line.text.startsWith('endsolid'); line = cursor.peek()) {
    const facet = readFacet(cursor, accumulator);
    if (!facet.ok) return facet;
  }
  return OK_VOID;
}

function readFooter(cursor: LineCursor, name: string, accumulator: DiagnosticAccumulator): Result<void, Diagnostic> {
  return andThen(cursor.next('endsolid'), (line): Result<void, Diagnostic> => {
    if (!line.text.startsWith('endsolid')) {
      return accumulator.error('grammar', lineAt(line.number), 'endsolid', line.text);
    }
    if (name !== '' && line.text !== `endsolid ${name}`) {
      return accumulator.raise('solid-name-mismatch', lineAt(line.number), `endsolid ${name}`, line.text);
    }
    return OK_VOID;
  });
}

function expectEnd(cursor: LineCursor, accumulator: DiagnosticAccumulator): Result<void, Diagnostic> {
  if (cursor.peek() === undefined) return OK_VOID;
  return andThen(cursor.next(END_OF_INPUT), (line) =>
    accumulator.error('grammar', lineAt(line.number), END_OF_INPUT, line.text)
  );
}

/**
 * Walks a textual STL document:
 *
 *   solid <name>
 *     facet normal nx ny nz
 *       outer loop
 *         vertex x y z   (x3)
 *       endloop
 *     endfacet           (zero or more facets)
 *   endsolid <name>
 *
 * Nothing but blank lines may follow the `endsolid` line.
 */
export function validateAscii(text: string, accumulator: DiagnosticAccumulator): Result<void, Diagnostic> {
  const cursor = new LineCursor(text, accumulator);
  return andThen(readHeader(cursor, accumulator), (name) =>
    andThen(readFacets(cursor, accumulator), () =>
      andThen(readFooter(cursor, name, accumulator), () => expectEnd(cursor, accumulator))
    )
  );
}
