// Wire types of the LanguageTool HTTP API and the records built from them.

/** Half-open character range `[start, end)` in a buffer. */
export interface Span {
  start: number;
  end: number;
}

/** Replacement of `[start, end)` (pre-edit offsets) with `text`. */
export interface TextEdit {
  start: number;
  end: number;
  text: string;
}

export interface ServerReplacement {
  value: string;
}

export interface ServerUrl {
  value: string;
}

export interface ServerRule {
  id: string;
  description?: string;
  category: {
    id?: string;
    name: string;
  };
  urls?: ServerUrl[];
}

/** One issue reported by the server for a span of the submitted text. */
export interface ServerMatch {
  message: string;
  shortMessage?: string;
  offset: number;
  length: number;
  replacements: ServerReplacement[];
  rule: ServerRule;
}

export interface Language {
  name: string;
  code?: string;
  longCode: string;
}

/**
 * A match mapped into editor coordinates. Records are never mutated; the
 * live position of a problem is tracked by its session under `regionKey`.
 */
export interface Problem {
  readonly category: string;
  readonly message: string;
  readonly replacements: readonly string[];
  readonly ruleId: string;
  readonly urls: readonly string[];
  readonly offset: number;
  readonly length: number;
  readonly regionKey: string;
  /** Buffer text of the region when the problem was detected. */
  readonly originalContent: string;
}

export interface IgnoredRule {
  id: string;
  description: string;
}

export interface Credentials {
  username: string;
  apiKey: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isValueList(value: unknown): value is { value: string }[] {
  return Array.isArray(value) && value.every((v) => isRecord(v) && typeof v.value === 'string');
}

function isNonNegativeInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

export function isServerMatch(value: unknown): value is ServerMatch {
  if (!isRecord(value)) {
    return false;
  }
  const rule = value.rule;
  if (!isRecord(rule) || typeof rule.id !== 'string') {
    return false;
  }
  if (!isRecord(rule.category) || typeof rule.category.name !== 'string') {
    return false;
  }
  if (rule.urls !== undefined && !isValueList(rule.urls)) {
    return false;
  }
  return (
    typeof value.message === 'string' &&
    isNonNegativeInt(value.offset) &&
    isNonNegativeInt(value.length) &&
    isValueList(value.replacements)
  );
}

/**
 * Extract the `matches` array of a check response.
 * Returns `null` when the body does not have the expected shape.
 */
export function readMatches(body: unknown): ServerMatch[] | null {
  if (!isRecord(body) || !Array.isArray(body.matches)) {
    return null;
  }
  const matches: ServerMatch[] = [];
  for (const m of body.matches) {
    if (!isServerMatch(m)) {
      return null;
    }
    matches.push(m);
  }
  return matches;
}

export function readLanguages(body: unknown): Language[] | null {
  if (!Array.isArray(body)) {
    return null;
  }
  const languages: Language[] = [];
  for (const entry of body) {
    if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.longCode !== 'string') {
      return null;
    }
    languages.push({
      name: entry.name,
      code: typeof entry.code === 'string' ? entry.code : undefined,
      longCode: entry.longCode,
    });
  }
  return languages;
}

export function readAdded(body: unknown): boolean | null {
  if (!isRecord(body) || typeof body.added !== 'boolean') {
    return null;
  }
  return body.added;
}

export function isIgnoredRule(value: unknown): value is IgnoredRule {
  return isRecord(value) && typeof value.id === 'string' && typeof value.description === 'string';
}
