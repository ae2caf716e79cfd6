import type { Configuration } from './config';
import { compileConfiguration, GROUP_INNER, GROUP_LEFT, type Pattern } from './pattern';

/** Offset range painted by a highlight rule */
export interface HighlightRange {
  start: number;
  end: number;
}

/**
 * Rendering instruction registered with the host for one document.
 * The host removes rules by identity.
 */
export interface HighlightRule {
  readonly documentId: string;
  readonly pattern: Pattern;
}

export interface HighlightHost {
  addRule(rule: HighlightRule): void;
  removeRule(rule: HighlightRule): void;
  /** Recompute visible styling now rather than on the next redraw */
  rerender(documentId: string): void;
}

/**
 * Ranges covering the left delimiter, inner text and right delimiter of every
 * passage. An empty inner text contributes no range.
 */
export function highlightRanges(text: string, pattern: Pattern): HighlightRange[] {
  const re = pattern.toRegExp();
  const ranges: HighlightRange[] = [];
  let match: RegExpExecArray | null;
  while ((match = re.exec(text)) !== null) {
    const leftEnd = match.index + match[GROUP_LEFT].length;
    const innerEnd = leftEnd + match[GROUP_INNER].length;
    const end = match.index + match[0].length;
    ranges.push({ start: match.index, end: leftEnd });
    if (innerEnd > leftEnd) {
      ranges.push({ start: leftEnd, end: innerEnd });
    }
    ranges.push({ start: innerEnd, end });
  }
  return ranges;
}

/**
 * Per-document highlight state. A document is active while it has a
 * registered rule; there is never more than one rule per document.
 */
export class HighlightController {
  private readonly rules = new Map<string, HighlightRule>();

  constructor(
    private readonly host: HighlightHost,
    private readonly configurationFor: (documentId: string) => Configuration
  ) {}

  isActive(documentId: string): boolean {
    return this.rules.has(documentId);
  }

  activeDocuments(): string[] {
    return [...this.rules.keys()];
  }

  activate(documentId: string): void {
    if (this.rules.has(documentId)) {
      return;
    }
    const pattern = compileConfiguration(this.configurationFor(documentId));
    const rule: HighlightRule = { documentId, pattern };
    this.host.addRule(rule);
    this.rules.set(documentId, rule);
    this.host.rerender(documentId);
  }

  deactivate(documentId: string): void {
    const rule = this.rules.get(documentId);
    if (!rule) {
      return;
    }
    // Remove the rule captured at activation, not one built from today's settings
    this.host.removeRule(rule);
    this.rules.delete(documentId);
    this.host.rerender(documentId);
  }

  /** Returns the new active state */
  toggle(documentId: string): boolean {
    if (this.isActive(documentId)) {
      this.deactivate(documentId);
    } else {
      this.activate(documentId);
    }
    return this.isActive(documentId);
  }

  /**
   * Re-derive the rule of an active document after its configuration changed.
   * An invalid configuration leaves the document inactive and throws.
   */
  reconfigure(documentId: string): void {
    if (!this.isActive(documentId)) {
      return;
    }
    this.deactivate(documentId);
    this.activate(documentId);
  }

  dispose(): void {
    for (const documentId of this.activeDocuments()) {
      this.deactivate(documentId);
    }
  }
}
