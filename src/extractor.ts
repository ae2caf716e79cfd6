import type { Pattern } from './pattern';
import { spanFromMatch, type MarkedSpan } from './scanner';
import { goToPrevious } from './navigator';

/**
 * The passage enclosing `cursor`, or undefined when the cursor is outside
 * every passage or the nearest opening delimiter is never closed.
 *
 * The forward match starts one character before the opening delimiter found
 * by the backward search so that it cannot begin past the passage start.
 */
export function spanAt(text: string, cursor: number, pattern: Pattern): MarkedSpan | undefined {
  const open = goToPrevious(text, cursor, pattern.delimiterLeft);
  if (open === undefined) {
    return undefined;
  }

  const re = pattern.toRegExp();
  re.lastIndex = Math.max(0, open - 1);
  const match = re.exec(text);
  if (!match) {
    return undefined;
  }

  const end = match.index + match[0].length;
  if (match.index > cursor || cursor >= end) {
    return undefined;
  }
  return spanFromMatch(text, match);
}

/** Inner text of the passage enclosing `cursor` */
export function extractAt(text: string, cursor: number, pattern: Pattern): string | undefined {
  return spanAt(text, cursor, pattern)?.innerText;
}
