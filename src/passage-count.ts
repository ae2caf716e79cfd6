import * as vscode from 'vscode';
import type { Configuration } from './config';
import { ConfigurationError } from './errors';
import { compileConfiguration } from './pattern';
import { countPassages } from './scanner';

/**
 * Status bar label for a passage count.
 *
 * @example
 * formatPassageCount(0) // "$(bookmark) 0 marked"
 */
export function formatPassageCount(count: number): string {
  return `$(bookmark) ${count} marked`;
}

/**
 * Controller class that manages the passage count status bar item.
 *
 * The item follows the active editor and is hidden when there is no editor,
 * when the count is disabled, or when the document's delimiters are invalid.
 */
export class PassageCountController {
  private statusBarItem: vscode.StatusBarItem;
  private disposables: vscode.Disposable[];

  constructor(
    private readonly configurationFor: (document: vscode.TextDocument) => Configuration,
    private readonly isEnabled: () => boolean
  ) {
    this.statusBarItem = vscode.window.createStatusBarItem(vscode.StatusBarAlignment.Left, 99);
    this.statusBarItem.command = 'marked-passages.buildReport';
    this.statusBarItem.tooltip = 'List marked passages';

    this.disposables = [
      vscode.window.onDidChangeActiveTextEditor(() => {
        this.update();
      }),
      vscode.workspace.onDidChangeTextDocument(event => {
        if (event.document === vscode.window.activeTextEditor?.document) {
          this.update();
        }
      }),
    ];

    this.update();
  }

  dispose(): void {
    this.statusBarItem.dispose();
    this.disposables.forEach(d => { d.dispose(); });
  }

  update(): void {
    const editor = vscode.window.activeTextEditor;
    if (!editor || !this.isEnabled()) {
      this.statusBarItem.hide();
      return;
    }

    let count: number;
    try {
      count = countPassages(editor.document.getText(), compileConfiguration(this.configurationFor(editor.document)));
    } catch (err: unknown) {
      // Invalid delimiters are reported by the commands that use them
      if (!(err instanceof ConfigurationError)) {
        throw err;
      }
      this.statusBarItem.hide();
      return;
    }

    this.statusBarItem.text = formatPassageCount(count);
    this.statusBarItem.show();
  }
}
