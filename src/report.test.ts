import { describe, it, expect } from 'vitest';
import {
  buildReport,
  formatEntry,
  formatHeader,
  innerTextOf,
  singleLine,
  Report,
  searchEntry,
  visitEntry,
  type HostView,
  type ViewHost,
} from './report';
import { createConfiguration } from './config';
import { SEARCH_ENGINES, type UrlOpener } from './search-engines';
import { NoEntryError, NoQueryError } from './errors';

const source = { id: 'file:///notes/draft.md', label: 'draft.md' };
const angle = createConfiguration();

// Passages at offsets 5 (line 1) and 26 (line 3)
const text = 'Open <<first>> here\nx\nAnd <<second\nhalf>> end';

class FakeView implements HostView {
  cursor: number | undefined;
  recentered = 0;
  constructor(readonly documentId: string) {}
  setCursor(offset: number): void {
    this.cursor = offset;
  }
  recenter(): void {
    this.recentered++;
  }
}

class FakeViewHost implements ViewHost {
  readonly opened: FakeView[] = [];
  constructor(readonly visible: FakeView[] = []) {}
  visibleViews(): readonly HostView[] {
    return this.visible;
  }
  async openView(documentId: string): Promise<HostView> {
    const view = new FakeView(documentId);
    this.opened.push(view);
    return view;
  }
}

class RecordingOpener implements UrlOpener {
  readonly opened: string[] = [];
  openUrl(url: string): void {
    this.opened.push(url);
  }
}

function requireReport(report: Report | undefined): Report {
  if (!report) throw new Error('expected a report');
  return report;
}

describe('formatting', () => {
  it('pluralises the header', () => {
    expect(formatHeader(1, 'a.md')).toBe('1 marked passage in a.md');
    expect(formatHeader(3, 'a.md')).toBe('3 marked passages in a.md');
  });

  it('shows an entry on one line', () => {
    expect(formatEntry({ sourceDocumentId: 'd', sourceOffset: 0, lineNumber: 4, rawText: '<<a\r\nb>>' }))
      .toBe('4: <<a b>>');
  });

  it('folds a lone CR and Unicode line separators', () => {
    expect(singleLine('a\rb\u2028c\u2029d\ne')).toBe('a b c d e');
  });
});

describe('buildReport', () => {
  it('lists passages under a header', () => {
    const report = requireReport(buildReport(source, text, angle));
    expect(report.lines).toEqual([
      '2 marked passages in draft.md',
      '1: <<first>>',
      '3: <<second half>>',
    ]);
    expect(report.text).toBe('2 marked passages in draft.md\n1: <<first>>\n3: <<second half>>');
  });

  it('keeps a back-reference for every entry line', () => {
    const report = requireReport(buildReport(source, text, angle));
    expect(report.entryAt(0)).toBeUndefined();
    expect(report.entryAt(1)).toEqual({
      sourceDocumentId: 'file:///notes/draft.md',
      sourceOffset: 5,
      lineNumber: 1,
      rawText: '<<first>>',
    });
    expect(report.entryAt(2)?.sourceOffset).toBe(26);
    expect(report.entryAt(3)).toBeUndefined();
  });

  it('keeps one listing line per entry when a passage holds a lone CR', () => {
    const report = requireReport(buildReport(source, 'a <<x\ry>> b <<z>>', angle));
    expect(report.lines).toEqual(['2 marked passages in draft.md', '1: <<x y>>', '1: <<z>>']);
    expect(report.text.split(/\r\n|[\r\n\u2028\u2029]/)).toHaveLength(3);
    expect(report.entryAt(2)?.rawText).toBe('<<z>>');
  });

  it('returns undefined for a document without passages', () => {
    expect(buildReport(source, '', angle)).toBeUndefined();
    expect(buildReport(source, 'plain <<unclosed', angle)).toBeUndefined();
  });

  it('uses the configured delimiters', () => {
    const report = requireReport(buildReport(source, '<<no>> {{yes}}', createConfiguration('{{', '}}')));
    expect(report.entries.map(e => e.rawText)).toEqual(['{{yes}}']);
  });

  it('maps a source offset to the first entry at or after it', () => {
    const report = requireReport(buildReport(source, text, angle));
    expect(report.lineForOffset(0)).toBe(1);
    expect(report.lineForOffset(5)).toBe(1);
    expect(report.lineForOffset(6)).toBe(2);
    expect(report.lineForOffset(27)).toBeUndefined();
  });
});

describe('visitEntry', () => {
  it('moves and recenters a visible view on the source', async () => {
    const report = requireReport(buildReport(source, text, angle));
    const other = new FakeView('file:///notes/other.md');
    const target = new FakeView(source.id);
    const host = new FakeViewHost([other, target]);

    const moved = await visitEntry(report, 2, host);
    expect(moved).toBe(target);
    expect(target.cursor).toBe(26);
    expect(target.recentered).toBe(1);
    expect(other.cursor).toBeUndefined();
    expect(host.opened).toEqual([]);
  });

  it('opens a view when the source is not visible', async () => {
    const report = requireReport(buildReport(source, text, angle));
    const host = new FakeViewHost();

    await visitEntry(report, 1, host);
    expect(host.opened).toHaveLength(1);
    expect(host.opened[0].documentId).toBe(source.id);
    expect(host.opened[0].cursor).toBe(5);
  });

  it('rejects the header line', async () => {
    const report = requireReport(buildReport(source, text, angle));
    await expect(visitEntry(report, 0, new FakeViewHost())).rejects.toThrow(NoEntryError);
  });
});

describe('searchEntry', () => {
  it('searches for the text between the delimiters', async () => {
    const report = requireReport(buildReport(source, text, angle));
    const opener = new RecordingOpener();
    const url = await searchEntry(report, 1, SEARCH_ENGINES[0], opener);
    expect(url).toBe('https://www.google.com/search?q=first');
    expect(opener.opened).toEqual([url]);
  });

  it('strips the delimiters the report was built with', () => {
    const config = createConfiguration('[', ']]]');
    const report = requireReport(buildReport(source, 'x [term]]] y', config));
    const entry = report.entryAt(1);
    expect(entry && innerTextOf(entry, config)).toBe('term');
  });

  it('fails on an empty passage without opening anything', async () => {
    const report = requireReport(buildReport(source, '<<>>', angle));
    const opener = new RecordingOpener();
    await expect(searchEntry(report, 1, SEARCH_ENGINES[0], opener)).rejects.toThrow(NoQueryError);
    expect(opener.opened).toEqual([]);
  });

  it('rejects lines past the last entry', async () => {
    const report = requireReport(buildReport(source, text, angle));
    await expect(searchEntry(report, 5, SEARCH_ENGINES[0], new RecordingOpener())).rejects.toThrow(NoEntryError);
  });
});
