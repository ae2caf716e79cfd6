import * as vscode from 'vscode';
import type { Report } from './report';

export const REPORT_SCHEME = 'marked-passages-report';

/**
 * Serves report listings as read-only virtual documents.
 *
 * The provider owns the reports, keyed by listing URI, so listing actions
 * read back-references from here rather than from the listing text.
 */
export class ReportDocumentProvider implements vscode.TextDocumentContentProvider, vscode.Disposable {
	private readonly reports = new Map<string, Report>();
	private nextId = 1;

	register(report: Report): vscode.Uri {
		const uri = vscode.Uri.from({
			scheme: REPORT_SCHEME,
			path: `/${report.source.label}`,
			query: String(this.nextId++),
		});
		this.reports.set(uri.toString(), report);
		return uri;
	}

	reportFor(uri: vscode.Uri): Report | undefined {
		return this.reports.get(uri.toString());
	}

	forget(uri: vscode.Uri): void {
		this.reports.delete(uri.toString());
	}

	provideTextDocumentContent(uri: vscode.Uri): string {
		return this.reportFor(uri)?.text ?? '';
	}

	dispose(): void {
		this.reports.clear();
	}
}
