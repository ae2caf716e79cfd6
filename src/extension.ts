import * as vscode from 'vscode';
import type MarkdownIt from 'markdown-it';
import * as path from 'path';
import {
	CONFIG_SECTION,
	DEFAULT_CONFIGURATION,
	readConfiguration,
	readDefaultSearchEngine,
	readHighlightColors,
	readShowPassageCount,
	type Configuration,
} from './config';
import { ConfigurationError, MarkedPassageError, NoEntryError, NoQueryError } from './errors';
import { extractAt } from './extractor';
import { HighlightController } from './highlight';
import { createLogger, type Logger } from './logger';
import { goToNext, goToPrevious } from './navigator';
import { PassageCountController } from './passage-count';
import { compileConfiguration } from './pattern';
import { markedPassagePlugin } from './preview/marked-passage-plugin';
import { buildReport, searchEntry, visitEntry, type Report } from './report';
import { REPORT_SCHEME, ReportDocumentProvider } from './report-provider';
import {
	chooseAndSearch,
	DEFAULT_SEARCH_ENGINE,
	findSearchEngine,
	SEARCH_ENGINES,
} from './search-engines';
import {
	DecorationHighlightHost,
	documentIdOf,
	editorViewHost,
	externalUrlOpener,
	quickPickChooser,
} from './vscode-host';

export interface MarkedPassagesApi {
	extendMarkdownIt(md: MarkdownIt): MarkdownIt;
}

function settings(scope?: vscode.Uri): vscode.WorkspaceConfiguration {
	return vscode.workspace.getConfiguration(CONFIG_SECTION, scope);
}

function configurationFor(documentId: string): Configuration {
	return readConfiguration(settings(vscode.Uri.parse(documentId)));
}

/**
 * Show a command failure. Marked-passage errors are expected outcomes and get
 * a plain message; anything else is logged with its stack.
 */
export function reportCommandError(err: unknown, log: Logger): void {
	if (err instanceof ConfigurationError) {
		log.warn(err.message);
		void vscode.window.showErrorMessage(`Marked passages: ${err.message}`);
	} else if (err instanceof MarkedPassageError) {
		void vscode.window.showInformationMessage(err.message);
	} else {
		log.error('Command failed', err);
		void vscode.window.showErrorMessage(`Marked passages: ${err instanceof Error ? err.message : String(err)}`);
	}
}

function moveCursor(editor: vscode.TextEditor, offset: number): void {
	const position = editor.document.positionAt(offset);
	editor.selection = new vscode.Selection(position, position);
	editor.revealRange(new vscode.Range(position, position));
}

export function activate(context: Pick<vscode.ExtensionContext, 'subscriptions'>): MarkedPassagesApi {
	const channel = vscode.window.createOutputChannel('Marked Passages');
	context.subscriptions.push(channel);
	const log = createLogger(channel);

	const highlightHost = new DecorationHighlightHost(readHighlightColors(settings()));
	const highlighter = new HighlightController(highlightHost, configurationFor);
	const reports = new ReportDocumentProvider();
	const passageCount = new PassageCountController(
		document => readConfiguration(settings(document.uri)),
		() => readShowPassageCount(settings())
	);
	context.subscriptions.push(
		highlightHost,
		{ dispose: () => { highlighter.dispose(); } },
		reports,
		passageCount,
		vscode.workspace.registerTextDocumentContentProvider(REPORT_SCHEME, reports)
	);

	function register(id: string, handler: () => unknown): vscode.Disposable {
		return vscode.commands.registerCommand(`marked-passages.${id}`, async () => {
			try {
				await handler();
			} catch (err: unknown) {
				reportCommandError(err, log);
			}
		});
	}

	function activeListing(): { editor: vscode.TextEditor; report: Report } {
		const editor = vscode.window.activeTextEditor;
		const report = editor ? reports.reportFor(editor.document.uri) : undefined;
		if (!editor || !report) {
			throw new NoEntryError('Not in a marked passage listing');
		}
		return { editor, report };
	}

	// Register highlight and navigation commands
	context.subscriptions.push(
		register('toggleHighlight', () => {
			const editor = vscode.window.activeTextEditor;
			if (!editor) { return; }
			const documentId = documentIdOf(editor.document);
			const active = highlighter.toggle(documentId);
			log.info(`Highlighting ${active ? 'on' : 'off'} for ${documentId}`);
			vscode.window.setStatusBarMessage(`Marked passage highlighting ${active ? 'on' : 'off'}`, 2000);
		}),
		register('nextPassage', () => {
			const editor = vscode.window.activeTextEditor;
			if (!editor) { return; }
			const config = configurationFor(documentIdOf(editor.document));
			const cursor = editor.document.offsetAt(editor.selection.active);
			const target = goToNext(editor.document.getText(), cursor, config.delimiterLeft);
			if (target === undefined) {
				void vscode.window.showInformationMessage('No more marked passages');
				return;
			}
			moveCursor(editor, target);
		}),
		register('prevPassage', () => {
			const editor = vscode.window.activeTextEditor;
			if (!editor) { return; }
			const config = configurationFor(documentIdOf(editor.document));
			const cursor = editor.document.offsetAt(editor.selection.active);
			const target = goToPrevious(editor.document.getText(), cursor, config.delimiterLeft);
			if (target === undefined) {
				void vscode.window.showInformationMessage('No more marked passages');
				return;
			}
			moveCursor(editor, target);
		})
	);

	// Register search and report commands
	context.subscriptions.push(
		register('searchAtPoint', async () => {
			const editor = vscode.window.activeTextEditor;
			if (!editor) { return; }
			const pattern = compileConfiguration(configurationFor(documentIdOf(editor.document)));
			const cursor = editor.document.offsetAt(editor.selection.active);
			const query = extractAt(editor.document.getText(), cursor, pattern);
			if (query === undefined) {
				throw new NoQueryError('No marked passage at the cursor');
			}
			const url = await chooseAndSearch(query, SEARCH_ENGINES, quickPickChooser, externalUrlOpener);
			log.info(`Opened ${url}`);
		}),
		register('buildReport', async () => {
			const editor = vscode.window.activeTextEditor;
			if (!editor) { return; }
			const source = editor.document;
			const report = buildReport(
				{ id: documentIdOf(source), label: path.basename(source.uri.path) || source.uri.toString() },
				source.getText(),
				configurationFor(documentIdOf(source))
			);
			if (!report) {
				void vscode.window.showInformationMessage('No marked passages found');
				return;
			}
			const uri = reports.register(report);
			log.info(`Built report of ${report.entries.length} passage(s) for ${report.source.id}`);
			const listing = await vscode.window.showTextDocument(
				await vscode.workspace.openTextDocument(uri),
				{ viewColumn: vscode.ViewColumn.Beside, preview: false }
			);
			const line = report.lineForOffset(source.offsetAt(editor.selection.active)) ?? report.entries.length;
			const position = new vscode.Position(line, 0);
			listing.selection = new vscode.Selection(position, position);
		}),
		register('visitEntry', async () => {
			const { editor, report } = activeListing();
			await visitEntry(report, editor.selection.active.line, editorViewHost);
		}),
		register('searchEntry', async () => {
			const { editor, report } = activeListing();
			const engineName = readDefaultSearchEngine(settings());
			const engine = findSearchEngine(engineName);
			if (!engine) {
				log.warn(`Unknown search engine "${engineName}", using ${DEFAULT_SEARCH_ENGINE.name}`);
			}
			const url = await searchEntry(
				report,
				editor.selection.active.line,
				engine ?? DEFAULT_SEARCH_ENGINE,
				externalUrlOpener
			);
			log.info(`Opened ${url}`);
		})
	);

	// Keep painted ranges in step with edits and visible editors
	context.subscriptions.push(
		vscode.workspace.onDidChangeTextDocument(event => {
			const documentId = documentIdOf(event.document);
			if (highlightHost.hasRule(documentId)) {
				highlightHost.rerender(documentId);
			}
		}),
		vscode.window.onDidChangeVisibleTextEditors(() => {
			highlightHost.rerenderVisible();
		}),
		vscode.workspace.onDidCloseTextDocument(document => {
			if (document.uri.scheme === REPORT_SCHEME) {
				reports.forget(document.uri);
			} else {
				highlighter.deactivate(documentIdOf(document));
			}
		}),
		vscode.workspace.onDidChangeConfiguration(e => {
			if (!e.affectsConfiguration(CONFIG_SECTION)) { return; }
			if (e.affectsConfiguration(`${CONFIG_SECTION}.highlightColor`)) {
				highlightHost.setColors(readHighlightColors(settings()));
			}
			for (const documentId of highlighter.activeDocuments()) {
				try {
					highlighter.reconfigure(documentId);
				} catch (err: unknown) {
					reportCommandError(err, log);
				}
			}
			passageCount.update();
		})
	);

	log.info('Marked Passages activated');

	return {
		extendMarkdownIt(md: MarkdownIt) {
			return md.use(markedPassagePlugin, {
				configuration: () => previewConfiguration(log),
			});
		},
	};
}

/** Workspace delimiters for the Markdown preview, falling back to the defaults */
function previewConfiguration(log: Logger): Configuration {
	try {
		return readConfiguration(settings());
	} catch (err: unknown) {
		if (!(err instanceof ConfigurationError)) {
			throw err;
		}
		log.warn(`Preview uses default delimiters: ${err.message}`);
		return DEFAULT_CONFIGURATION;
	}
}

export function deactivate(): void {}
