import type { Configuration } from './config';
import { NoEntryError } from './errors';
import { compileConfiguration } from './pattern';
import { scan } from './scanner';
import { search, type SearchEngine, type UrlOpener } from './search-engines';

/** Back-reference from a listing line to the passage it was built from */
export interface ReportEntry {
  readonly sourceDocumentId: string;
  readonly sourceOffset: number;
  readonly lineNumber: number;
  readonly rawText: string;
}

export interface ReportSource {
  /** Stable identity of the source document (a URI or a file path) */
  readonly id: string;
  /** Name shown in the listing header */
  readonly label: string;
}

/** A view the host has open on some document */
export interface HostView {
  readonly documentId: string;
  setCursor(offset: number): void;
  recenter(): void;
}

export interface ViewHost {
  visibleViews(): readonly HostView[];
  openView(documentId: string): Promise<HostView>;
}

export function formatHeader(count: number, label: string): string {
  return `${count} marked passage${count === 1 ? '' : 's'} in ${label}`;
}

/** Passage text on a single line; every line break, including a lone CR, renders as a space */
export function singleLine(rawText: string): string {
  return rawText.replace(/\r\n|[\r\n\u2028\u2029]/g, ' ');
}

export function formatEntry(entry: ReportEntry): string {
  return `${entry.lineNumber}: ${singleLine(entry.rawText)}`;
}

/**
 * Point-in-time listing of the passages in one document.
 *
 * Line 0 is the header; line i + 1 shows entry i. Entries are looked up by
 * line index in a side table, never parsed back out of the text, and are not
 * updated when the source changes.
 */
export class Report {
  readonly lines: readonly string[];
  private readonly entriesByLine: ReadonlyMap<number, ReportEntry>;

  constructor(
    readonly source: ReportSource,
    readonly configuration: Configuration,
    readonly entries: readonly ReportEntry[]
  ) {
    const byLine = new Map<number, ReportEntry>();
    const lines = [formatHeader(entries.length, source.label)];
    for (const entry of entries) {
      byLine.set(lines.length, entry);
      lines.push(formatEntry(entry));
    }
    this.lines = lines;
    this.entriesByLine = byLine;
  }

  get text(): string {
    return this.lines.join('\n');
  }

  entryAt(line: number): ReportEntry | undefined {
    return this.entriesByLine.get(line);
  }

  /** Line index of the first entry at or after a source offset */
  lineForOffset(offset: number): number | undefined {
    const index = this.entries.findIndex(entry => entry.sourceOffset >= offset);
    return index === -1 ? undefined : index + 1;
  }
}

/**
 * Scan a document and build its listing. Returns undefined when the document
 * has no marked passages, in which case no listing should be shown.
 */
export function buildReport(source: ReportSource, text: string, config: Configuration): Report | undefined {
  const spans = scan(text, compileConfiguration(config));
  if (spans.length === 0) {
    return undefined;
  }
  const entries = spans.map((span): ReportEntry => ({
    sourceDocumentId: source.id,
    sourceOffset: span.startOffset,
    lineNumber: span.lineNumber,
    rawText: span.rawText,
  }));
  return new Report(source, config, entries);
}

function requireEntry(report: Report, line: number): ReportEntry {
  const entry = report.entryAt(line);
  if (!entry) {
    throw new NoEntryError();
  }
  return entry;
}

/**
 * Move a view on the entry's source document to the recorded offset, reusing
 * a visible view when there is one. Returns the view that was moved.
 */
export async function visitEntry(report: Report, line: number, views: ViewHost): Promise<HostView> {
  const entry = requireEntry(report, line);
  const visible = views.visibleViews().find(view => view.documentId === entry.sourceDocumentId);
  if (visible) {
    visible.setCursor(entry.sourceOffset);
    visible.recenter();
    return visible;
  }
  const opened = await views.openView(entry.sourceDocumentId);
  opened.setCursor(entry.sourceOffset);
  return opened;
}

/** Strip the report's delimiters from an entry's raw text */
export function innerTextOf(entry: ReportEntry, config: Configuration): string {
  return entry.rawText.slice(
    config.delimiterLeft.length,
    entry.rawText.length - config.delimiterRight.length
  );
}

export async function searchEntry(
  report: Report,
  line: number,
  engine: SearchEngine,
  opener: UrlOpener
): Promise<string> {
  const entry = requireEntry(report, line);
  return search(innerTextOf(entry, report.configuration), engine, opener);
}
