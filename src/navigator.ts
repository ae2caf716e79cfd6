// Navigation looks for the literal left delimiter only. It does not check
// that a passage is terminated, so it can stop inside a malformed one.

/**
 * Offset just past the next left delimiter at or after `cursor`,
 * or undefined when there is none.
 */
export function goToNext(text: string, cursor: number, delimiterLeft: string): number | undefined {
  if (delimiterLeft.length === 0) {
    return undefined;
  }
  const index = text.indexOf(delimiterLeft, Math.max(0, cursor));
  if (index === -1) {
    return undefined;
  }
  return index + delimiterLeft.length;
}

/**
 * Start of the last left delimiter that ends at or before `cursor`,
 * or undefined when there is none.
 */
export function goToPrevious(text: string, cursor: number, delimiterLeft: string): number | undefined {
  if (delimiterLeft.length === 0) {
    return undefined;
  }
  const from = Math.min(cursor, text.length) - delimiterLeft.length;
  if (from < 0) {
    return undefined;
  }
  const index = text.lastIndexOf(delimiterLeft, from);
  return index === -1 ? undefined : index;
}
