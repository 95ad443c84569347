import micromatch from 'micromatch';
import type { Span } from './types';

// The host does not expose grammar scopes, so prose documents are split into
// a few coarse TextMate-style scopes that the `ignored-scopes` globs can name.

export interface ScopedSpan extends Span {
  scopes: string[];
}

interface Mark extends Span {
  scope: string;
}

const PROSE_LANGUAGES = new Set(['plaintext', 'markdown', 'latex', 'tex', 'restructuredtext', 'asciidoc', 'git-commit']);

export function baseScope(languageId: string): string {
  if (languageId === 'plaintext') {
    return 'text.plain';
  }
  return PROSE_LANGUAGES.has(languageId) ? `text.${languageId}` : `source.${languageId}`;
}

function fencedBlocks(text: string): Span[] {
  const blocks: Span[] = [];
  const fenceRe = /^ {0,3}(`{3,}|~{3,})/;
  let offset = 0;
  let open: { start: number; fence: string } | null = null;

  for (const line of text.split('\n')) {
    const m = fenceRe.exec(line);
    if (open === null) {
      if (m) {
        open = { start: offset, fence: m[1] };
      }
    } else if (m && m[1][0] === open.fence[0] && m[1].length >= open.fence.length) {
      blocks.push({ start: open.start, end: offset + line.length });
      open = null;
    }
    offset += line.length + 1;
  }
  if (open !== null) {
    blocks.push({ start: open.start, end: text.length });
  }
  return blocks;
}

function regexMarks(text: string, re: RegExp, scope: string): Mark[] {
  const marks: Mark[] = [];
  for (const m of text.matchAll(re)) {
    const start = m.index ?? 0;
    if (m[0].length > 0) {
      marks.push({ start, end: start + m[0].length, scope });
    }
  }
  return marks;
}

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

/** Marks in priority order; later marks overlapping an accepted one are dropped. */
function candidateMarks(text: string, languageId: string): Mark[] {
  if (languageId === 'markdown') {
    return [
      ...fencedBlocks(text).map((b) => ({ ...b, scope: 'markup.fenced_code.block.markdown' })),
      ...regexMarks(text, /<!--[\s\S]*?-->/g, 'comment.block.html'),
      ...regexMarks(text, /`[^`\n]+`/g, 'markup.inline.raw.string.markdown'),
    ];
  }
  if (languageId === 'latex' || languageId === 'tex') {
    return [
      ...regexMarks(text, /(?<!\\)%[^\n]*/g, 'comment.line.percentage.latex'),
      ...regexMarks(text, /\\[a-zA-Z@]+\*?/g, 'support.function.latex'),
    ];
  }
  return [];
}

/** Split `text` into contiguous spans, each labelled with its scope names. */
export function scopeSpans(text: string, languageId: string): ScopedSpan[] {
  const base = baseScope(languageId);
  const accepted: Mark[] = [];
  for (const mark of candidateMarks(text, languageId)) {
    if (!accepted.some((a) => overlaps(a, mark))) {
      accepted.push(mark);
    }
  }
  accepted.sort((a, b) => a.start - b.start);

  const spans: ScopedSpan[] = [];
  let pos = 0;
  for (const mark of accepted) {
    if (mark.start > pos) {
      spans.push({ start: pos, end: mark.start, scopes: [base] });
    }
    spans.push({ start: mark.start, end: mark.end, scopes: [base, mark.scope] });
    pos = mark.end;
  }
  if (pos < text.length || spans.length === 0) {
    spans.push({ start: pos, end: text.length, scopes: [base] });
  }
  return spans;
}

export class ScopeMap {
  readonly spans: ScopedSpan[];

  constructor(text: string, languageId: string) {
    this.spans = scopeSpans(text, languageId);
  }

  scopeNamesAt(offset: number): string[] {
    const hit = this.spans.find((s) => s.start <= offset && offset < s.end);
    return [...(hit ?? this.spans[this.spans.length - 1]).scopes];
  }
}

/** True iff any scope name matches any glob. */
export function matchesAnyScope(scopes: readonly string[], patterns: readonly string[]): boolean {
  return scopes.some((scope) => micromatch.isMatch(scope, patterns));
}

type AnnotationChunk = { text: string } | { markup: string };

/**
 * Encode `range` of `text` as a LanguageTool annotation document. Spans whose
 * scopes match `markupScopes` are sent as markup, the rest as text.
 */
export function buildAnnotation(
  text: string,
  spans: readonly ScopedSpan[],
  range: Span,
  markupScopes: readonly string[]
): string {
  const chunks: AnnotationChunk[] = [];
  let current = '';
  let currentIsMarkup: boolean | null = null;

  const flush = () => {
    if (current) {
      chunks.push(currentIsMarkup ? { markup: current } : { text: current });
    }
  };

  for (const s of spans) {
    const start = Math.max(s.start, range.start);
    const end = Math.min(s.end, range.end);
    if (start >= end) {
      continue;
    }
    const isMarkup = matchesAnyScope(s.scopes, markupScopes);
    if (isMarkup !== currentIsMarkup) {
      flush();
      current = '';
      currentIsMarkup = isMarkup;
    }
    current += text.slice(start, end);
  }
  flush();

  return JSON.stringify({ annotation: chunks });
}
