import * as vscode from 'vscode';
import { renderHighlights } from './decorations';
import { ScopeMap } from './scopes';
import type { ScopedSpan } from './scopes';
import type { EditorPort, HostPort, PickItem } from './ports';
import type { Span } from './types';

const STATUS_TIMEOUT_MS = 8000;

// Scope maps are rebuilt only when the document version changes
const scopeCache = new WeakMap<vscode.TextDocument, { version: number; map: ScopeMap }>();

function scopeMapFor(document: vscode.TextDocument): ScopeMap {
  const cached = scopeCache.get(document);
  if (cached && cached.version === document.version) {
    return cached.map;
  }
  const map = new ScopeMap(document.getText(), document.languageId);
  scopeCache.set(document, { version: document.version, map });
  return map;
}

/** `EditorPort` over a VS Code text editor. Offsets are UTF-16 code units, as in the server's replies. */
export class VscodeEditor implements EditorPort {
  constructor(
    private readonly editor: vscode.TextEditor,
    private readonly highlightColor: string
  ) {}

  private get document(): vscode.TextDocument {
    return this.editor.document;
  }

  get documentKey(): string {
    return this.document.uri.toString();
  }

  get languageId(): string {
    return this.document.languageId;
  }

  get length(): number {
    const lastLine = this.document.lineAt(this.document.lineCount - 1);
    return this.document.offsetAt(lastLine.range.end);
  }

  private toRange(span: Span): vscode.Range {
    return new vscode.Range(this.document.positionAt(span.start), this.document.positionAt(span.end));
  }

  getText(range?: Span): string {
    return range ? this.document.getText(this.toRange(range)) : this.document.getText();
  }

  scopeNamesAt(offset: number): string[] {
    return scopeMapFor(this.document).scopeNamesAt(offset);
  }

  scopeSpans(): readonly ScopedSpan[] {
    return scopeMapFor(this.document).spans;
  }

  selections(): Span[] {
    return this.editor.selections.map((s) => ({
      start: this.document.offsetAt(s.start),
      end: this.document.offsetAt(s.end),
    }));
  }

  select(range: Span): void {
    this.editor.selection = new vscode.Selection(
      this.document.positionAt(range.start),
      this.document.positionAt(range.end)
    );
  }

  revealCenter(range: Span): void {
    this.editor.revealRange(this.toRange(range), vscode.TextEditorRevealType.InCenter);
  }

  async replace(range: Span, text: string): Promise<boolean> {
    const target = this.toRange(range);
    return this.editor.edit((editBuilder) => {
      editBuilder.replace(target, text);
    });
  }

  async touch(): Promise<void> {
    const end = this.document.positionAt(this.length);
    await this.editor.edit((editBuilder) => {
      editBuilder.insert(end, '');
    });
  }

  setHighlights(ranges: readonly Span[]): void {
    renderHighlights(
      this.editor,
      this.highlightColor,
      ranges.map((r) => this.toRange(r))
    );
  }
}

/** `HostPort` over the VS Code window; the panel is the `LanguageTool` output channel. */
export class VscodeHost implements HostPort {
  private statusMessage: vscode.Disposable | null = null;

  constructor(private readonly panel: vscode.OutputChannel) {}

  status(message: string): void {
    this.statusMessage?.dispose();
    this.statusMessage = vscode.window.setStatusBarMessage(message, STATUS_TIMEOUT_MS);
  }

  showPanel(text: string): void {
    this.panel.clear();
    this.panel.append(text);
    this.panel.show(true);
  }

  hidePanel(): void {
    this.panel.hide();
  }

  showError(message: string): void {
    void vscode.window.showErrorMessage(message, { modal: true });
  }

  async pick(items: readonly PickItem[], placeHolder?: string): Promise<number | undefined> {
    const picked = await vscode.window.showQuickPick(
      items.map((item, index) => ({ label: item.label, detail: item.detail, index })),
      { placeHolder, matchOnDetail: true }
    );
    return picked?.index;
  }

  async withBusy<T>(title: string, task: () => Promise<T>): Promise<T> {
    return vscode.window.withProgress({ location: vscode.ProgressLocation.Window, title }, task);
  }

  dispose(): void {
    this.statusMessage?.dispose();
    this.statusMessage = null;
  }
}
