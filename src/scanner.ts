import { GROUP_INNER, type Pattern } from './pattern';

/** One marked passage found by a scan */
export interface MarkedSpan {
  /** Passage text including both delimiters */
  readonly rawText: string;
  readonly innerText: string;
  readonly startOffset: number;
  readonly endOffset: number;
  /** 1-based line of startOffset */
  readonly lineNumber: number;
}

/**
 * 1-based line number of an offset. `\r\n` counts as one break since only
 * `\n` is counted.
 */
export function lineNumberAt(text: string, offset: number): number {
  let line = 1;
  let pos = text.indexOf('\n');
  while (pos !== -1 && pos < offset) {
    line++;
    pos = text.indexOf('\n', pos + 1);
  }
  return line;
}

export function spanFromMatch(text: string, match: RegExpExecArray, lineNumber?: number): MarkedSpan {
  return {
    rawText: match[0],
    innerText: match[GROUP_INNER],
    startOffset: match.index,
    endOffset: match.index + match[0].length,
    lineNumber: lineNumber ?? lineNumberAt(text, match.index),
  };
}

/**
 * Find every marked passage in document order.
 *
 * Matching is leftmost-first and resumes at the end of each match, so
 * passages never overlap.
 */
export function scan(text: string, pattern: Pattern): MarkedSpan[] {
  const re = pattern.toRegExp();
  const spans: MarkedSpan[] = [];

  // Line numbers are counted incrementally from the previous match
  let line = 1;
  let counted = 0;

  let match: RegExpExecArray | null;
  while ((match = re.exec(text)) !== null) {
    for (let i = counted; i < match.index; i++) {
      if (text.charCodeAt(i) === 0x0A /* \n */) line++;
    }
    counted = match.index;
    spans.push(spanFromMatch(text, match, line));
  }
  return spans;
}

export function countPassages(text: string, pattern: Pattern): number {
  const re = pattern.toRegExp();
  let count = 0;
  while (re.exec(text) !== null) {
    count++;
  }
  return count;
}
