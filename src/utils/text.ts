import type { Sample } from '../stats';

const SPACE_PATTERN = /\s+/g;
const SEPARATOR_PATTERN = /[\s,]+/;
const COMMENT_PREFIX = '#';

export class SampleParseError extends Error {
  constructor(
    readonly token: string,
    readonly line: number
  ) {
    super(`Invalid sample value "${token}" on line ${line}`);
    this.name = 'SampleParseError';
  }
}

export function normalizeWhitespace(value: string): string {
  return value.replace(SPACE_PATTERN, ' ').trim();
}

function parseValue(token: string, line: number): number {
  const value = Number(token);
  if (!Number.isFinite(value)) {
    throw new SampleParseError(token, line);
  }
  return value;
}

/**
 * Reads whitespace- or comma-separated numbers. Lines starting with `#` are
 * skipped.
 */
export function parseSample(text: string): Sample {
  const values: number[] = [];

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = normalizeWhitespace(rawLine);
    if (!line || line.startsWith(COMMENT_PREFIX)) {
      return;
    }

    line
      .split(SEPARATOR_PATTERN)
      .filter((token) => token.length > 0)
      .forEach((token) => {
        values.push(parseValue(token, index + 1));
      });
  });

  return values;
}
