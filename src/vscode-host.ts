import * as vscode from 'vscode';
import type { HighlightColors } from './config';
import { highlightRanges, type HighlightHost, type HighlightRule } from './highlight';
import type { HostView, ViewHost } from './report';
import type { Chooser, UrlOpener } from './search-engines';

export function documentIdOf(document: vscode.TextDocument): string {
	return document.uri.toString();
}

function createDecorationType(colors: HighlightColors): vscode.TextEditorDecorationType {
	return vscode.window.createTextEditorDecorationType({
		light: { backgroundColor: colors.light },
		dark: { backgroundColor: colors.dark },
	});
}

/**
 * Paints registered highlight rules as editor decorations.
 *
 * One decoration type covers every rule; each visible editor on a highlighted
 * document gets the ranges of its own rule, every other editor gets none.
 */
export class DecorationHighlightHost implements HighlightHost, vscode.Disposable {
	private readonly rules = new Map<string, HighlightRule>();
	private decorationType: vscode.TextEditorDecorationType;

	constructor(colors: HighlightColors) {
		this.decorationType = createDecorationType(colors);
	}

	addRule(rule: HighlightRule): void {
		this.rules.set(rule.documentId, rule);
	}

	removeRule(rule: HighlightRule): void {
		if (this.rules.get(rule.documentId) === rule) {
			this.rules.delete(rule.documentId);
		}
	}

	hasRule(documentId: string): boolean {
		return this.rules.has(documentId);
	}

	rerender(documentId: string): void {
		for (const editor of vscode.window.visibleTextEditors) {
			if (documentIdOf(editor.document) === documentId) {
				this.paint(editor);
			}
		}
	}

	rerenderVisible(): void {
		for (const editor of vscode.window.visibleTextEditors) {
			this.paint(editor);
		}
	}

	setColors(colors: HighlightColors): void {
		this.decorationType.dispose();
		this.decorationType = createDecorationType(colors);
		this.rerenderVisible();
	}

	dispose(): void {
		this.rules.clear();
		this.decorationType.dispose();
	}

	private paint(editor: vscode.TextEditor): void {
		const rule = this.rules.get(documentIdOf(editor.document));
		if (!rule) {
			editor.setDecorations(this.decorationType, []);
			return;
		}
		const document = editor.document;
		const ranges = highlightRanges(document.getText(), rule.pattern).map(r => new vscode.Range(
			document.positionAt(r.start),
			document.positionAt(r.end)
		));
		editor.setDecorations(this.decorationType, ranges);
	}
}

/** A text editor seen through the report's view interface */
export class EditorView implements HostView {
	constructor(readonly editor: vscode.TextEditor) {}

	get documentId(): string {
		return documentIdOf(this.editor.document);
	}

	setCursor(offset: number): void {
		const position = this.editor.document.positionAt(offset);
		this.editor.selection = new vscode.Selection(position, position);
		this.editor.revealRange(new vscode.Range(position, position));
	}

	recenter(): void {
		this.editor.revealRange(this.editor.selection, vscode.TextEditorRevealType.InCenter);
	}
}

export const editorViewHost: ViewHost = {
	visibleViews: () => vscode.window.visibleTextEditors.map(editor => new EditorView(editor)),
	openView: async (documentId) => {
		const document = await vscode.workspace.openTextDocument(vscode.Uri.parse(documentId));
		const editor = await vscode.window.showTextDocument(document, {
			viewColumn: vscode.ViewColumn.One,
			preview: false,
		});
		return new EditorView(editor);
	},
};

export const quickPickChooser: Chooser = {
	chooseOne: async (labels) => vscode.window.showQuickPick([...labels], {
		placeHolder: 'Search the marked passage with',
	}),
};

export const externalUrlOpener: UrlOpener = {
	openUrl: async (url) => {
		const opened = await vscode.env.openExternal(vscode.Uri.parse(url, true));
		if (!opened) {
			throw new Error(`Failed to open ${url}`);
		}
	},
};
