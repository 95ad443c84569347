import type { Span, TextEdit } from './types';

export function span(start: number, end: number): Span {
  return { start, end };
}

export function isEmpty(s: Span): boolean {
  return s.start === s.end;
}

export function contains(outer: Span, inner: Span): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

export function spansEqual(a: Span, b: Span): boolean {
  return a.start === b.start && a.end === b.end;
}

/**
 * Re-project a span across one edit.
 *
 * Text inserted at the start of the span pushes it right; text inserted at
 * its end is left outside. Points inside a deleted range move to the start
 * of the edit, so a span whose text is wholly deleted becomes empty.
 */
export function transformSpan(s: Span, edit: TextEdit): Span {
  const delta = edit.text.length - (edit.end - edit.start);

  let start: number;
  if (s.start < edit.start) {
    start = s.start;
  } else if (s.start >= edit.end) {
    start = s.start + delta;
  } else {
    start = edit.start;
  }

  let end: number;
  if (s.end <= edit.start) {
    end = s.end;
  } else if (s.end >= edit.end) {
    end = s.end + delta;
  } else {
    end = edit.start;
  }

  return { start, end: Math.max(start, end) };
}

/** Apply `edits` in order; each edit's offsets refer to the buffer left by the previous one. */
export function transformSpanThrough(s: Span, edits: readonly TextEdit[]): Span {
  return edits.reduce(transformSpan, s);
}

/**
 * Edits made to a buffer while a check request is in flight. Server offsets
 * refer to the buffer as it was when the request was sent; the journal
 * carries them over to the buffer as it is when the reply arrives.
 */
export class EditJournal {
  private readonly edits: TextEdit[] = [];
  private closed = false;

  record(edits: readonly TextEdit[]): void {
    if (!this.closed) {
      this.edits.push(...edits);
    }
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get entries(): readonly TextEdit[] {
    return this.edits;
  }

  transform(s: Span): Span {
    return transformSpanThrough(s, this.edits);
  }
}
