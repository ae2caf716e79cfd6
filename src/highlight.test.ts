import { describe, it, expect, beforeEach } from 'vitest';
import fc from 'fast-check';
import { HighlightController, highlightRanges, type HighlightHost, type HighlightRule } from './highlight';
import { createConfiguration, type Configuration } from './config';
import { compilePattern } from './pattern';
import { ConfigurationError } from './errors';

/** Records rule registration the way an editor host would */
class RecordingHost implements HighlightHost {
  readonly rules: HighlightRule[] = [];
  readonly rerendered: string[] = [];
  readonly removed: HighlightRule[] = [];

  addRule(rule: HighlightRule): void {
    this.rules.push(rule);
  }

  removeRule(rule: HighlightRule): void {
    this.removed.push(rule);
    const index = this.rules.indexOf(rule);
    if (index !== -1) {
      this.rules.splice(index, 1);
    }
  }

  rerender(documentId: string): void {
    this.rerendered.push(documentId);
  }
}

describe('highlightRanges', () => {
  it('covers both delimiters and the inner text of every passage', () => {
    const ranges = highlightRanges('<<a>> b <<cd>>', compilePattern('<<', '>>'));
    expect(ranges).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 3 },
      { start: 3, end: 5 },
      { start: 8, end: 10 },
      { start: 10, end: 12 },
      { start: 12, end: 14 },
    ]);
  });

  it('skips the inner range of an empty passage', () => {
    expect(highlightRanges('<<>>', compilePattern('<<', '>>'))).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 4 },
    ]);
  });
});

describe('HighlightController', () => {
  let host: RecordingHost;
  let config: Configuration;
  let controller: HighlightController;

  beforeEach(() => {
    host = new RecordingHost();
    config = createConfiguration();
    controller = new HighlightController(host, () => config);
  });

  it('starts inactive', () => {
    expect(controller.isActive('doc')).toBe(false);
    expect(controller.activeDocuments()).toEqual([]);
  });

  it('registers one rule and re-renders on activation', () => {
    expect(controller.toggle('doc')).toBe(true);
    expect(host.rules).toHaveLength(1);
    expect(host.rules[0].documentId).toBe('doc');
    expect(host.rules[0].pattern.source).toBe('(<<)([^>]*?)(>>)');
    expect(host.rerendered).toEqual(['doc']);
  });

  it('removes exactly the registered rule on deactivation', () => {
    controller.toggle('doc');
    const rule = host.rules[0];
    expect(controller.toggle('doc')).toBe(false);
    expect(host.removed).toEqual([rule]);
    expect(host.removed[0]).toBe(rule);
    expect(host.rules).toEqual([]);
    expect(host.rerendered).toEqual(['doc', 'doc']);
  });

  it('never registers a second rule for an active document', () => {
    controller.activate('doc');
    controller.activate('doc');
    expect(host.rules).toHaveLength(1);
    expect(host.rerendered).toEqual(['doc']);
  });

  it('ignores deactivation of an inactive document', () => {
    controller.deactivate('doc');
    expect(host.removed).toEqual([]);
    expect(host.rerendered).toEqual([]);
  });

  it('keeps state per document', () => {
    controller.toggle('a');
    controller.toggle('b');
    controller.toggle('a');
    expect(controller.isActive('a')).toBe(false);
    expect(controller.isActive('b')).toBe(true);
    expect(host.rules.map(r => r.documentId)).toEqual(['b']);
  });

  it('removes the rule captured at activation after the delimiters change', () => {
    controller.toggle('doc');
    const original = host.rules[0];
    config = createConfiguration('[[', ']]');
    controller.toggle('doc');
    expect(host.removed).toEqual([original]);
    expect(host.removed[0].pattern.delimiterLeft).toBe('<<');
    expect(host.rules).toEqual([]);
  });

  it('re-derives the rule of an active document on reconfigure', () => {
    controller.toggle('doc');
    const original = host.rules[0];
    config = createConfiguration('[[', ']]');
    controller.reconfigure('doc');
    expect(host.removed).toEqual([original]);
    expect(host.rules).toHaveLength(1);
    expect(host.rules[0].pattern.delimiterLeft).toBe('[[');

    const replacement = host.rules[0];
    controller.toggle('doc');
    expect(host.removed).toEqual([original, replacement]);
    expect(host.removed[1]).toBe(replacement);
  });

  it('leaves an inactive document alone on reconfigure', () => {
    controller.reconfigure('doc');
    expect(host.rules).toEqual([]);
    expect(controller.isActive('doc')).toBe(false);
  });

  it('stays inactive when reconfigured with an invalid configuration', () => {
    let valid = true;
    controller = new HighlightController(host, () => {
      if (!valid) throw new ConfigurationError('Left delimiter must not be empty');
      return config;
    });
    controller.toggle('doc');
    valid = false;
    expect(() => controller.reconfigure('doc')).toThrow(ConfigurationError);
    expect(controller.isActive('doc')).toBe(false);
    expect(host.rules).toEqual([]);
  });

  it('removes every rule on dispose', () => {
    controller.toggle('a');
    controller.toggle('b');
    controller.dispose();
    expect(host.rules).toEqual([]);
    expect(controller.activeDocuments()).toEqual([]);
  });

  it('returns to the starting state after any even number of toggles', () => {
    fc.assert(
      fc.property(fc.boolean(), fc.integer({ min: 1, max: 5 }), (startActive, pairs) => {
        const recorder = new RecordingHost();
        const subject = new HighlightController(recorder, () => config);
        if (startActive) subject.activate('doc');
        const before = subject.isActive('doc');
        for (let i = 0; i < pairs * 2; i++) {
          subject.toggle('doc');
        }
        expect(subject.isActive('doc')).toBe(before);
        expect(recorder.rules).toHaveLength(before ? 1 : 0);
      }),
      { numRuns: 50 }
    );
  });
});
