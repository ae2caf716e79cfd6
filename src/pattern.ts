import type { Configuration } from './config';
import { ConfigurationError } from './errors';

/**
 * A compiled marked-passage pattern.
 *
 * Capture groups: 1 = left delimiter, 2 = inner text, 3 = right delimiter.
 * The full match is the raw passage text.
 */
export interface Pattern {
  readonly delimiterLeft: string;
  readonly delimiterRight: string;
  readonly source: string;
  /** Fresh global RegExp; callers own its lastIndex */
  toRegExp(): RegExp;
}

export const GROUP_LEFT = 1;
export const GROUP_INNER = 2;
export const GROUP_RIGHT = 3;

/** Escape a string so it matches literally inside a RegExp */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\\/-]/g, '\\$&');
}

/**
 * Compile the passage pattern for a delimiter pair.
 *
 * The inner run excludes the first character of the right delimiter, so with
 * `>>` a passage cannot contain a lone `>`. Inner text may span lines.
 */
export function compilePattern(delimiterLeft: string, delimiterRight: string): Pattern {
  if (delimiterLeft.length === 0 || delimiterRight.length === 0) {
    throw new ConfigurationError('Delimiters must not be empty');
  }
  const left = escapeRegExp(delimiterLeft);
  const right = escapeRegExp(delimiterRight);
  const stop = escapeRegExp(delimiterRight[0]);
  const source = `(${left})([^${stop}]*?)(${right})`;
  return {
    delimiterLeft,
    delimiterRight,
    source,
    toRegExp: () => new RegExp(source, 'g'),
  };
}

export function compileConfiguration(config: Configuration): Pattern {
  return compilePattern(config.delimiterLeft, config.delimiterRight);
}
