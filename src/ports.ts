import type { ScopedSpan } from './scopes';
import type { Span } from './types';

/** Read access to a buffer's text. */
export interface TextBuffer {
  readonly length: number;
  getText(range?: Span): string;
}

/** Scope labels of a buffer position, most general first. */
export interface ScopeSource {
  scopeNamesAt(offset: number): string[];
  /** The whole buffer split into spans of constant scope. */
  scopeSpans(): readonly ScopedSpan[];
}

/** The document in the active editor, as the command logic sees it. */
export interface EditorPort extends TextBuffer, ScopeSource {
  /** Identifies the document; sessions and language choices are keyed by it. */
  readonly documentKey: string;
  readonly languageId: string;
  /** Current selections, primary first. Never empty. */
  selections(): Span[];
  select(range: Span): void;
  revealCenter(range: Span): void;
  replace(range: Span, text: string): Promise<boolean>;
  /** Make an edit that changes nothing, so the preceding action gets an undo stop. */
  touch(): Promise<void>;
  setHighlights(ranges: readonly Span[]): void;
}

export interface PickItem {
  label: string;
  detail?: string;
}

/** Window-level services of the host. */
export interface HostPort {
  /** Transient status-bar message. */
  status(message: string): void;
  /** Replace the text of the output panel and show it. */
  showPanel(text: string): void;
  hidePanel(): void;
  showError(message: string): void;
  /** Resolves to the index of the chosen item, `undefined` when dismissed. */
  pick(items: readonly PickItem[], placeHolder?: string): Promise<number | undefined>;
  withBusy<T>(title: string, task: () => Promise<T>): Promise<T>;
}
