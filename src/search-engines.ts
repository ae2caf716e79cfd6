import { NoEngineSelectedError, NoQueryError } from './errors';

export interface SearchEngine {
  /** Label shown in the chooser */
  readonly name: string;
  buildUrl(query: string): string;
}

/** Host capability for opening a URL in the user's browser */
export interface UrlOpener {
  openUrl(url: string): void | Promise<void>;
}

/** Host capability for picking one label from an ordered list */
export interface Chooser {
  chooseOne(labels: readonly string[]): Promise<string | undefined>;
}

function queryEngine(name: string, base: string): SearchEngine {
  return {
    name,
    buildUrl: (query) => base + encodeURIComponent(query),
  };
}

/** Engines in chooser order */
export const SEARCH_ENGINES: readonly SearchEngine[] = [
  queryEngine('Google', 'https://www.google.com/search?q='),
  queryEngine('Google Scholar', 'https://scholar.google.com/scholar?q='),
  queryEngine('DuckDuckGo', 'https://duckduckgo.com/?q='),
  queryEngine('Bing', 'https://www.bing.com/search?q='),
  queryEngine('Wikipedia', 'https://en.wikipedia.org/w/index.php?search='),
];

export const DEFAULT_SEARCH_ENGINE: SearchEngine = SEARCH_ENGINES[0];

export function findSearchEngine(
  name: string,
  engines: readonly SearchEngine[] = SEARCH_ENGINES
): SearchEngine | undefined {
  const wanted = name.trim().toLowerCase();
  return engines.find(engine => engine.name.toLowerCase() === wanted);
}

function requireQuery(query: string | undefined): string {
  if (query === undefined || query.trim() === '') {
    throw new NoQueryError();
  }
  return query;
}

/**
 * Open the engine's results page for `query`. Returns the URL that was opened.
 */
export async function search(
  query: string | undefined,
  engine: SearchEngine,
  opener: UrlOpener
): Promise<string> {
  const url = engine.buildUrl(requireQuery(query));
  await opener.openUrl(url);
  return url;
}

/**
 * Ask the user for an engine, then search. The query is checked before the
 * chooser is shown.
 */
export async function chooseAndSearch(
  query: string | undefined,
  engines: readonly SearchEngine[],
  chooser: Chooser,
  opener: UrlOpener
): Promise<string> {
  const text = requireQuery(query);
  const label = await chooser.chooseOne(engines.map(engine => engine.name));
  const engine = label === undefined ? undefined : engines.find(e => e.name === label);
  if (!engine) {
    throw new NoEngineSelectedError();
  }
  return search(text, engine, opener);
}
