import type { EditorPort, TextBuffer } from './ports';
import type { ProblemSession } from './session';
import type { Span } from './types';

/**
 * Regions to outline: every unsolved problem of the session. Computed from
 * scratch on each call, so redrawing after any edit is safe.
 */
export function planHighlights(session: ProblemSession | undefined, buffer: TextBuffer): Span[] {
  if (!session) {
    return [];
  }
  return session.unsolved(buffer).map((p) => session.region(p));
}

export class HighlightRenderer {
  render(editor: EditorPort, session: ProblemSession | undefined): void {
    editor.setHighlights(planHighlights(session, editor));
  }

  clear(editor: EditorPort): void {
    editor.setHighlights([]);
  }
}
