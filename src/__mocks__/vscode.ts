// Mock vscode module for testing. vitest.config.ts aliases 'vscode' to this file.

export interface Disposable {
  dispose(): void;
}

type Listener<T> = (event: T) => unknown;

export class EventEmitter<T> {
  private listeners: Listener<T>[] = [];

  readonly event = (listener: Listener<T>): Disposable => {
    this.listeners.push(listener);
    return { dispose: () => { this.listeners = this.listeners.filter(l => l !== listener); } };
  };

  fire(event: T): void {
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  dispose(): void {
    this.listeners = [];
  }
}

export class Uri {
  private constructor(
    readonly scheme: string,
    readonly authority: string,
    readonly path: string,
    readonly query: string
  ) {}

  static parse(value: string, _strict?: boolean): Uri {
    const colon = value.indexOf(':');
    const scheme = value.slice(0, colon);
    let rest = value.slice(colon + 1);
    let query = '';
    const q = rest.indexOf('?');
    if (q !== -1) {
      query = rest.slice(q + 1);
      rest = rest.slice(0, q);
    }
    let authority = '';
    if (rest.startsWith('//')) {
      const slash = rest.indexOf('/', 2);
      authority = slash === -1 ? rest.slice(2) : rest.slice(2, slash);
      rest = slash === -1 ? '' : rest.slice(slash);
    }
    return new Uri(scheme, authority, rest, query);
  }

  static file(path: string): Uri {
    return new Uri('file', '', path, '');
  }

  static from(components: { scheme: string; authority?: string; path?: string; query?: string }): Uri {
    return new Uri(components.scheme, components.authority ?? '', components.path ?? '', components.query ?? '');
  }

  get fsPath(): string {
    return this.path;
  }

  toString(): string {
    const authority = this.authority || this.scheme === 'file' ? `//${this.authority}` : '';
    return `${this.scheme}:${authority}${this.path}${this.query ? `?${this.query}` : ''}`;
  }
}

export class Position {
  constructor(readonly line: number, readonly character: number) {}

  isBefore(other: Position): boolean {
    return this.line < other.line || (this.line === other.line && this.character < other.character);
  }

  isAfter(other: Position): boolean {
    return other.isBefore(this);
  }

  isEqual(other: Position): boolean {
    return this.line === other.line && this.character === other.character;
  }
}

export class Range {
  constructor(readonly start: Position, readonly end: Position) {}

  get isEmpty(): boolean {
    return this.start.isEqual(this.end);
  }
}

export class Selection extends Range {
  constructor(readonly anchor: Position, readonly active: Position) {
    super(anchor.isBefore(active) ? anchor : active, anchor.isBefore(active) ? active : anchor);
  }
}

export const StatusBarAlignment = {
  Left: 1,
  Right: 2,
};

export const TextEditorRevealType = {
  Default: 0,
  InCenter: 1,
  InCenterIfOutsideViewport: 2,
  AtTop: 3,
};

export const ViewColumn = {
  Active: -1,
  Beside: -2,
  One: 1,
  Two: 2,
};

export class TextDocument {
  constructor(readonly uri: Uri, private text: string) {}

  getText(): string {
    return this.text;
  }

  setText(text: string): void {
    this.text = text;
  }

  get lineCount(): number {
    return this.text.split('\n').length;
  }

  positionAt(offset: number): Position {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    const before = this.text.slice(0, clamped);
    const line = before.split('\n').length - 1;
    return new Position(line, clamped - (before.lastIndexOf('\n') + 1));
  }

  offsetAt(position: Position): number {
    const lines = this.text.split('\n');
    let offset = 0;
    for (let i = 0; i < position.line && i < lines.length; i++) {
      offset += lines[i].length + 1;
    }
    const lineLength = lines[position.line]?.length ?? 0;
    return Math.min(offset + Math.min(position.character, lineLength), this.text.length);
  }
}

export class TextEditorDecorationType implements Disposable {
  disposed = false;

  constructor(readonly options: unknown) {}

  dispose(): void {
    this.disposed = true;
  }
}

export class TextEditor {
  selection = new Selection(new Position(0, 0), new Position(0, 0));
  readonly decorations = new Map<TextEditorDecorationType, Range[]>();
  readonly reveals: Array<{ range: Range; revealType?: number }> = [];

  constructor(readonly document: TextDocument) {}

  get selections(): Selection[] {
    return [this.selection];
  }

  setDecorations(decorationType: TextEditorDecorationType, ranges: Range[]): void {
    this.decorations.set(decorationType, ranges);
  }

  revealRange(range: Range, revealType?: number): void {
    this.reveals.push({ range, revealType });
  }
}

export class OutputChannel implements Disposable {
  readonly lines: string[] = [];

  constructor(readonly name: string) {}

  appendLine(value: string): void {
    this.lines.push(value);
  }

  dispose(): void {}
}

export class StatusBarItem implements Disposable {
  text = '';
  tooltip: string | undefined;
  command: string | undefined;
  visible = false;

  show(): void {
    this.visible = true;
  }

  hide(): void {
    this.visible = false;
  }

  dispose(): void {
    this.visible = false;
  }
}

export interface ShowTextDocumentOptions {
  viewColumn?: number;
  preview?: boolean;
}

class MockWindow {
  activeTextEditor: TextEditor | undefined;
  visibleTextEditors: TextEditor[] = [];
  readonly decorationTypes: TextEditorDecorationType[] = [];
  readonly outputChannels: OutputChannel[] = [];
  readonly statusBarItems: StatusBarItem[] = [];
  readonly messages: Array<{ level: 'info' | 'error'; message: string }> = [];
  readonly statusMessages: string[] = [];
  readonly shownDocuments: Array<{ document: TextDocument; options?: ShowTextDocumentOptions }> = [];
  quickPickAnswer: string | undefined;
  quickPickItems: string[] | undefined;

  private readonly activeEditorEmitter = new EventEmitter<TextEditor | undefined>();
  private readonly visibleEditorsEmitter = new EventEmitter<TextEditor[]>();
  readonly onDidChangeActiveTextEditor = this.activeEditorEmitter.event;
  readonly onDidChangeVisibleTextEditors = this.visibleEditorsEmitter.event;

  createTextEditorDecorationType(options: unknown): TextEditorDecorationType {
    const decorationType = new TextEditorDecorationType(options);
    this.decorationTypes.push(decorationType);
    return decorationType;
  }

  createOutputChannel(name: string): OutputChannel {
    const channel = new OutputChannel(name);
    this.outputChannels.push(channel);
    return channel;
  }

  createStatusBarItem(_alignment?: number, _priority?: number): StatusBarItem {
    const item = new StatusBarItem();
    this.statusBarItems.push(item);
    return item;
  }

  async showInformationMessage(message: string): Promise<string | undefined> {
    this.messages.push({ level: 'info', message });
    return undefined;
  }

  async showErrorMessage(message: string): Promise<string | undefined> {
    this.messages.push({ level: 'error', message });
    return undefined;
  }

  setStatusBarMessage(text: string, _timeout?: number): Disposable {
    this.statusMessages.push(text);
    return { dispose: () => {} };
  }

  async showQuickPick(items: readonly string[], _options?: unknown): Promise<string | undefined> {
    this.quickPickItems = [...items];
    return this.quickPickAnswer;
  }

  async showTextDocument(document: TextDocument, options?: ShowTextDocumentOptions): Promise<TextEditor> {
    this.shownDocuments.push({ document, options });
    const editor = new TextEditor(document);
    this.showEditor(editor);
    return editor;
  }

  /** Make an editor visible and active, as opening it in the UI would */
  showEditor(editor: TextEditor): void {
    if (!this.visibleTextEditors.includes(editor)) {
      this.visibleTextEditors.push(editor);
      this.visibleEditorsEmitter.fire(this.visibleTextEditors);
    }
    this.activeTextEditor = editor;
    this.activeEditorEmitter.fire(editor);
  }

  reset(): void {
    this.activeTextEditor = undefined;
    this.visibleTextEditors = [];
    this.decorationTypes.length = 0;
    this.outputChannels.length = 0;
    this.statusBarItems.length = 0;
    this.messages.length = 0;
    this.statusMessages.length = 0;
    this.shownDocuments.length = 0;
    this.quickPickAnswer = undefined;
    this.quickPickItems = undefined;
    this.activeEditorEmitter.dispose();
    this.visibleEditorsEmitter.dispose();
  }
}

function isSameType<T>(value: unknown, reference: T): value is T {
  return typeof value === typeof reference;
}

export interface TextDocumentContentProvider {
  provideTextDocumentContent(uri: Uri): string;
}

export interface ConfigurationChangeEvent {
  affectsConfiguration(section: string): boolean;
}

export interface TextDocumentChangeEvent {
  document: TextDocument;
}

class MockWorkspace {
  readonly settings = new Map<string, unknown>();
  readonly documents: TextDocument[] = [];
  readonly contentProviders = new Map<string, TextDocumentContentProvider>();

  private readonly changeDocumentEmitter = new EventEmitter<TextDocumentChangeEvent>();
  private readonly closeDocumentEmitter = new EventEmitter<TextDocument>();
  private readonly changeConfigurationEmitter = new EventEmitter<ConfigurationChangeEvent>();
  readonly onDidChangeTextDocument = this.changeDocumentEmitter.event;
  readonly onDidCloseTextDocument = this.closeDocumentEmitter.event;
  readonly onDidChangeConfiguration = this.changeConfigurationEmitter.event;

  getConfiguration(section: string, _scope?: Uri) {
    return {
      get: <T>(key: string, defaultValue: T): T => {
        const value = this.settings.get(`${section}.${key}`);
        return isSameType(value, defaultValue) ? value : defaultValue;
      },
    };
  }

  registerTextDocumentContentProvider(scheme: string, provider: TextDocumentContentProvider): Disposable {
    this.contentProviders.set(scheme, provider);
    return { dispose: () => { this.contentProviders.delete(scheme); } };
  }

  async openTextDocument(uri: Uri): Promise<TextDocument> {
    const existing = this.documents.find(d => d.uri.toString() === uri.toString());
    if (existing) {
      return existing;
    }
    const provider = this.contentProviders.get(uri.scheme);
    const document = new TextDocument(uri, provider ? provider.provideTextDocumentContent(uri) : '');
    this.documents.push(document);
    return document;
  }

  /** Register a document so openTextDocument can find it */
  addDocument(text: string, uri = 'file:///tmp/notes.md'): TextDocument {
    const document = new TextDocument(Uri.parse(uri), text);
    this.documents.push(document);
    return document;
  }

  editDocument(document: TextDocument, text: string): void {
    document.setText(text);
    this.changeDocumentEmitter.fire({ document });
  }

  closeDocument(document: TextDocument): void {
    this.closeDocumentEmitter.fire(document);
  }

  updateSettings(values: Record<string, unknown>): void {
    const keys = Object.keys(values);
    for (const key of keys) {
      this.settings.set(key, values[key]);
    }
    this.changeConfigurationEmitter.fire({
      affectsConfiguration: section => keys.some(key => key === section || key.startsWith(`${section}.`)),
    });
  }

  reset(): void {
    this.settings.clear();
    this.documents.length = 0;
    this.contentProviders.clear();
    this.changeDocumentEmitter.dispose();
    this.closeDocumentEmitter.dispose();
    this.changeConfigurationEmitter.dispose();
  }
}

type CommandHandler = (...args: unknown[]) => unknown;

class MockCommands {
  readonly registered = new Map<string, CommandHandler>();

  registerCommand(id: string, handler: CommandHandler): Disposable {
    this.registered.set(id, handler);
    return { dispose: () => { this.registered.delete(id); } };
  }

  async executeCommand(id: string, ...args: unknown[]): Promise<unknown> {
    const handler = this.registered.get(id);
    if (!handler) {
      throw new Error(`command '${id}' not found`);
    }
    return handler(...args);
  }

  reset(): void {
    this.registered.clear();
  }
}

class MockEnv {
  readonly openedUris: Uri[] = [];
  openResult = true;

  async openExternal(uri: Uri): Promise<boolean> {
    this.openedUris.push(uri);
    return this.openResult;
  }

  reset(): void {
    this.openedUris.length = 0;
    this.openResult = true;
  }
}

export const window = new MockWindow();
export const workspace = new MockWorkspace();
export const commands = new MockCommands();
export const env = new MockEnv();

export function resetMockVscode(): void {
  window.reset();
  workspace.reset();
  commands.reset();
  env.reset();
}
