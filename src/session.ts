import { getEqualProblems } from './problems';
import { EditJournal, contains, isEmpty, spansEqual, transformSpan } from './regions';
import { matchesAnyScope } from './scopes';
import type { ScopeSource, TextBuffer } from './ports';
import type { Problem, Span, TextEdit } from './types';

export interface CheckResult {
  /** Problems already shifted to buffer offsets, in server order. */
  candidates: readonly Problem[];
  /** The checked range, in buffer offsets at request time. */
  checkRange: Span;
  /** Edits made while the request was in flight. */
  journal: EditJournal;
  buffer: TextBuffer & ScopeSource;
  ignoredScopes: readonly string[];
}

/**
 * Problems found by one check of one document, with the live region of each.
 *
 * Problem records are immutable; only regions move as the buffer is edited.
 * Whether a problem is solved is derived from its region and the buffer on
 * every call.
 */
export class ProblemSession {
  private problemList: Problem[];
  private readonly regions: Map<string, Span>;

  private constructor(problems: Problem[], regions: Map<string, Span>) {
    this.problemList = problems;
    this.regions = regions;
  }

  static empty(): ProblemSession {
    return new ProblemSession([], new Map());
  }

  static fromCheck(result: CheckResult): ProblemSession {
    const { candidates, journal, buffer, ignoredScopes } = result;
    const checkRange = journal.transform(result.checkRange);

    const kept: Problem[] = [];
    const regions = new Map<string, Span>();
    for (const candidate of candidates) {
      const region = journal.transform({ start: candidate.offset, end: candidate.offset + candidate.length });
      if (!contains(checkRange, region)) {
        continue;
      }
      if (matchesAnyScope(buffer.scopeNamesAt(region.start), ignoredScopes)) {
        continue;
      }
      const regionKey = String(kept.length);
      kept.push({ ...candidate, regionKey, originalContent: buffer.getText(region) });
      regions.set(regionKey, region);
    }
    return new ProblemSession(kept, regions);
  }

  get problems(): readonly Problem[] {
    return this.problemList;
  }

  get size(): number {
    return this.problemList.length;
  }

  region(problem: Problem): Span {
    const region = this.regions.get(problem.regionKey);
    if (!region) {
      throw new Error(`No region tracked for problem ${problem.regionKey}`);
    }
    return region;
  }

  isSolved(problem: Problem, buffer: TextBuffer): boolean {
    const region = this.region(problem);
    return isEmpty(region) || buffer.getText(region) !== problem.originalContent;
  }

  unsolved(buffer: TextBuffer): Problem[] {
    return this.problemList.filter((p) => !this.isSolved(p, buffer));
  }

  /** First unsolved problem starting strictly after `position`. */
  next(position: number, buffer: TextBuffer): Problem | undefined {
    return this.problemList.find((p) => !this.isSolved(p, buffer) && position < this.region(p).start);
  }

  /** Last unsolved problem starting strictly before `position`. */
  previous(position: number, buffer: TextBuffer): Problem | undefined {
    for (let i = this.problemList.length - 1; i >= 0; i--) {
      const p = this.problemList[i];
      if (!this.isSolved(p, buffer) && this.region(p).start < position) {
        return p;
      }
    }
    return undefined;
  }

  /** Unsolved problem whose region strictly surrounds `position`. */
  atCursor(position: number, buffer: TextBuffer): Problem | undefined {
    return this.problemList.find((p) => {
      const r = this.region(p);
      return !this.isSolved(p, buffer) && r.start < position && position < r.end;
    });
  }

  /** The unsolved problem whose region is exactly `selection`. */
  selectedBy(selection: Span, buffer: TextBuffer): Problem | undefined {
    return this.problemList.find((p) => spansEqual(this.region(p), selection) && !this.isSolved(p, buffer));
  }

  containedIn(selection: Span): Problem[] {
    return this.problemList.filter((p) => contains(selection, this.region(p)));
  }

  equalProblems(problem: Problem): Problem[] {
    return getEqualProblems(this.problemList, problem);
  }

  withRule(ruleId: string): Problem[] {
    return this.problemList.filter((p) => p.ruleId === ruleId);
  }

  /** Shrink a region to its start. The marker stays, so the problem reads as solved. */
  collapse(problem: Problem): void {
    const region = this.region(problem);
    this.regions.set(problem.regionKey, { start: region.start, end: region.start });
  }

  remove(problems: readonly Problem[]): void {
    const keys = new Set(problems.map((p) => p.regionKey));
    this.problemList = this.problemList.filter((p) => !keys.has(p.regionKey));
    for (const key of keys) {
      this.regions.delete(key);
    }
  }

  applyEdits(edits: readonly TextEdit[]): void {
    for (const edit of edits) {
      for (const [key, region] of this.regions) {
        this.regions.set(key, transformSpan(region, edit));
      }
    }
  }
}

/** One session per document; a new check replaces the old one. */
export class SessionStore {
  private readonly sessions = new Map<string, ProblemSession>();
  private readonly journals = new Map<string, Set<EditJournal>>();

  get(documentKey: string): ProblemSession | undefined {
    return this.sessions.get(documentKey);
  }

  set(documentKey: string, session: ProblemSession): void {
    this.sessions.set(documentKey, session);
  }

  clear(documentKey: string): void {
    this.sessions.delete(documentKey);
  }

  /** Start recording edits for a check that is about to be sent. */
  openJournal(documentKey: string): EditJournal {
    const journal = new EditJournal();
    const open = this.journals.get(documentKey) ?? new Set<EditJournal>();
    open.add(journal);
    this.journals.set(documentKey, open);
    return journal;
  }

  closeJournal(documentKey: string, journal: EditJournal): void {
    journal.close();
    const open = this.journals.get(documentKey);
    if (open) {
      open.delete(journal);
      if (open.size === 0) {
        this.journals.delete(documentKey);
      }
    }
  }

  /** Route buffer edits to the document's session and in-flight journals. */
  applyEdits(documentKey: string, edits: readonly TextEdit[]): void {
    this.sessions.get(documentKey)?.applyEdits(edits);
    for (const journal of this.journals.get(documentKey) ?? []) {
      journal.record(edits);
    }
  }

  drop(documentKey: string): void {
    this.sessions.delete(documentKey);
    for (const journal of this.journals.get(documentKey) ?? []) {
      journal.close();
    }
    this.journals.delete(documentKey);
  }

  documentKeys(): string[] {
    return [...this.sessions.keys()];
  }
}
