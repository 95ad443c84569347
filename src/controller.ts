import { hasCredentials } from './client';
import type { CheckRequest } from './client';
import { debug } from './debug';
import { formatProblemPanel, formatProblemStatus } from './display';
import { HighlightRenderer } from './highlights';
import { shiftOffset, toProblem } from './problems';
import { isEmpty } from './regions';
import { buildAnnotation } from './scopes';
import { checkJarPath } from './server';
import type { ServerLauncher } from './server';
import { ProblemSession, SessionStore } from './session';
import { getServerUrl, serverSettingName } from './settings';
import type { ProoflineConfig, ServerKind } from './settings';
import type { EditorPort, HostPort } from './ports';
import type { Credentials, IgnoredRule, Language, Problem, ServerMatch, Span, TextEdit } from './types';

export const BUSY_TITLE = 'LanguageTool';
export const AUTO_LANGUAGE = 'auto';

/** The server calls the commands make. `LanguageToolClient` implements it. */
export interface GrammarService {
  check(request: CheckRequest): Promise<ServerMatch[] | null>;
  getLanguages(serverUrl: string): Promise<Language[] | null>;
  addWord(serverUrl: string, word: string, credentials: Credentials): Promise<boolean | null>;
}

/** Persistence of deactivated rules. `IgnoredRuleStore` implements it. */
export interface RuleStore {
  load(): IgnoredRule[];
  add(rule: IgnoredRule): IgnoredRule[];
  removeAt(index: number): IgnoredRule | undefined;
  ids(): string[];
}

export interface ControllerOptions {
  host: HostPort;
  service: GrammarService;
  rules: RuleStore;
  getConfig: () => ProoflineConfig;
  launchServer: ServerLauncher;
  serverLogPath?: string;
}

export interface LanguageChoice {
  name: string;
  code: string;
}

/** "Autodetect" first, then each distinct (name, code) pair in sorted order. */
export function languageChoices(languages: readonly Language[]): LanguageChoice[] {
  const seen = new Map<string, LanguageChoice>();
  for (const lang of languages) {
    seen.set(`${lang.name}\u0000${lang.longCode}`, { name: lang.name, code: lang.longCode });
  }
  const compare = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);
  const sorted = [...seen.values()].sort((a, b) => compare(a.name, b.name) || compare(a.code, b.code));
  return [{ name: 'Autodetect Language', code: AUTO_LANGUAGE }, ...sorted];
}

/**
 * The commands of the extension, written against the editor and host ports.
 * Holds one problem session and one language choice per document.
 */
export class ProoflineController {
  readonly sessions = new SessionStore();
  private readonly languages = new Map<string, string>();
  private readonly renderer = new HighlightRenderer();
  private readonly host: HostPort;
  private readonly service: GrammarService;
  private readonly rules: RuleStore;
  private readonly getConfig: () => ProoflineConfig;
  private readonly launchServer: ServerLauncher;
  private readonly serverLogPath: string | undefined;

  constructor(options: ControllerOptions) {
    this.host = options.host;
    this.service = options.service;
    this.rules = options.rules;
    this.getConfig = options.getConfig;
    this.launchServer = options.launchServer;
    this.serverLogPath = options.serverLogPath;
  }

  getLanguage(documentKey: string): string {
    return this.languages.get(documentKey) ?? AUTO_LANGUAGE;
  }

  // --- check -------------------------------------------------------------

  async check(editor: EditorPort, force?: ServerKind): Promise<void> {
    const config = this.getConfig();
    const serverUrl = getServerUrl(config, force);
    if (!serverUrl) {
      this.host.showPanel(`Setting ${serverSettingName(config, force)} is undefined`);
      return;
    }

    const key = editor.documentKey;
    const selection = editor.selections()[0];
    const checkRange: Span = isEmpty(selection) ? { start: 0, end: editor.length } : selection;
    const text =
      config.textField === 'data'
        ? buildAnnotation(editor.getText(), editor.scopeSpans(), checkRange, config.ignoredScopes)
        : editor.getText(checkRange);

    this.clear(editor);

    const request: CheckRequest = {
      serverUrl,
      text,
      language: this.getLanguage(key),
      disabledRuleIds: this.rules.ids(),
      credentials: { username: config.username, apiKey: config.apiKey },
      textField: config.textField,
    };
    debug(`check: ${key} [${checkRange.start}, ${checkRange.end}) language=${request.language}`);

    const journal = this.sessions.openJournal(key);
    let matches: ServerMatch[] | null;
    try {
      matches = await this.host.withBusy(BUSY_TITLE, () => this.service.check(request));
    } finally {
      this.sessions.closeJournal(key, journal);
    }
    if (matches === null) {
      return;
    }

    const candidates = matches.map((m) => shiftOffset(toProblem(m), checkRange.start));
    const session = ProblemSession.fromCheck({
      candidates,
      checkRange,
      journal,
      buffer: editor,
      ignoredScopes: config.ignoredScopes,
    });
    debug(`check: ${matches.length} matches, ${session.size} problems kept`);
    this.sessions.set(key, session);
    this.renderer.render(editor, session);

    const [first] = session.problems;
    if (first) {
      this.selectProblem(editor, session, first);
    } else {
      this.host.status('no language problems were found :-)');
    }
  }

  // --- navigation --------------------------------------------------------

  gotoProblem(editor: EditorPort, forward = true): void {
    const session = this.sessions.get(editor.documentKey);
    if (session && session.size > 0) {
      const position = editor.selections()[0].start;
      const problem = forward ? session.next(position, editor) : session.previous(position, editor);
      if (problem) {
        this.selectProblem(editor, session, problem);
        return;
      }
      this.host.status('no further language problems to fix');
    }
    this.host.hidePanel();
  }

  selectProblemAtCursor(editor: EditorPort): void {
    const session = this.sessions.get(editor.documentKey);
    if (!session) {
      return;
    }
    const problem = session.atCursor(editor.selections()[0].start, editor);
    if (problem) {
      this.selectProblem(editor, session, problem);
    }
  }

  clear(editor: EditorPort): void {
    const key = editor.documentKey;
    const session = this.sessions.get(key);
    if (!session) {
      return;
    }
    this.sessions.clear(key);
    this.renderer.clear(editor);
    const caret = editor.selections()[0].end;
    this.host.hidePanel();
    editor.select({ start: caret, end: caret });
  }

  // --- fix / ignore ------------------------------------------------------

  fixProblem(editor: EditorPort): Promise<void> {
    return this.markProblemSolved(editor, true);
  }

  ignoreProblem(editor: EditorPort): Promise<void> {
    return this.markProblemSolved(editor, false);
  }

  private async markProblemSolved(editor: EditorPort, applyFix: boolean): Promise<void> {
    const session = this.sessions.get(editor.documentKey);
    const problem = session?.selectedBy(editor.selections()[0], editor);
    if (!session || !problem) {
      this.host.status('no language problem selected');
      return;
    }

    if (applyFix && problem.replacements.length > 0) {
      await this.correctProblem(editor, session, problem);
      return;
    }

    const caret = session.region(problem).start;
    for (const equal of session.equalProblems(problem)) {
      session.collapse(equal);
    }
    await editor.touch();
    this.renderer.render(editor, session);
    editor.select({ start: caret, end: caret });
    this.gotoProblem(editor);
  }

  private async correctProblem(editor: EditorPort, session: ProblemSession, problem: Problem): Promise<void> {
    let choice = 0;
    if (problem.replacements.length > 1) {
      const picked = await this.host.pick(
        problem.replacements.map((r) => ({ label: r })),
        'Choose a replacement'
      );
      if (picked === undefined) {
        this.selectProblem(editor, session, problem);
        return;
      }
      choice = picked;
      // the buffer or the session may have changed while the pick was open
      if (this.sessions.get(editor.documentKey) !== session || session.isSolved(problem, editor)) {
        this.host.status('no language problem selected');
        return;
      }
    }

    const replacement = problem.replacements[choice];
    const start = session.region(problem).start;
    const applied = await editor.replace(session.region(problem), replacement);
    if (!applied) {
      this.host.status('could not apply the replacement');
      return;
    }
    session.collapse(problem);
    this.renderer.render(editor, session);
    const caret = start + replacement.length;
    editor.select({ start: caret, end: caret });
    this.gotoProblem(editor);
  }

  // --- rules -------------------------------------------------------------

  async deactivateRule(editor: EditorPort): Promise<void> {
    const session = this.sessions.get(editor.documentKey);
    const selected = session
      ? session.containedIn(editor.selections()[0]).filter((p) => !session.isSolved(p, editor))
      : [];
    if (!session || selected.length === 0) {
      this.host.status('select a problem to deactivate its rule');
      return;
    }
    if (selected.length > 1) {
      this.host.status('there are multiple selected problems; select only one to deactivate');
      return;
    }

    const [problem] = selected;
    const rule: IgnoredRule = { id: problem.ruleId, description: problem.message };
    this.rules.add(rule);

    const affected = session.withRule(rule.id);
    for (const p of affected) {
      session.collapse(p);
    }
    await editor.touch();
    session.remove(affected);
    this.renderer.render(editor, session);
    this.gotoProblem(editor);
    this.host.status(`deactivated rule ${rule.id}`);
  }

  async activateRule(): Promise<void> {
    const ignored = this.rules.load();
    if (ignored.length === 0) {
      this.host.status('there are no ignored rules');
      return;
    }
    const index = await this.host.pick(
      ignored.map((r) => ({ label: r.id, detail: r.description })),
      'Select a rule to activate'
    );
    if (index === undefined) {
      return;
    }
    const removed = this.rules.removeAt(index);
    if (removed) {
      this.host.status(`activated rule ${removed.id}`);
    }
  }

  // --- language / server / dictionary ------------------------------------

  async changeLanguage(editor: EditorPort): Promise<void> {
    const config = this.getConfig();
    const serverUrl = getServerUrl(config);
    if (!serverUrl) {
      this.host.showPanel(`Setting ${serverSettingName(config)} is undefined`);
      return;
    }
    const languages = await this.host.withBusy(BUSY_TITLE, () => this.service.getLanguages(serverUrl));
    if (languages === null) {
      return;
    }

    const choices = languageChoices(languages);
    const index = await this.host.pick(
      choices.map((c) => ({ label: c.name, detail: c.code })),
      'Select the language to check with'
    );
    if (index === undefined) {
      return;
    }
    const key = editor.documentKey;
    if (index === 0) {
      this.languages.delete(key);
    } else {
      this.languages.set(key, choices[index].code);
    }
    this.host.status(`language: ${choices[index].name}`);
  }

  async startServer(): Promise<void> {
    const config = this.getConfig();
    const jar = checkJarPath(config.jarPath);
    if (!jar.ok) {
      this.host.showPanel(jar.message);
      return;
    }
    this.host.status('Starting local LanguageTool server ...');
    await this.launchServer(config.jarPath, this.serverLogPath);
  }

  async addWord(editor: EditorPort): Promise<void> {
    const word = editor.getText(editor.selections()[0]).trim();
    if (!word || /\s/.test(word)) {
      this.host.status('select a single word to add to the dictionary');
      return;
    }
    const config = this.getConfig();
    const credentials: Credentials = { username: config.username, apiKey: config.apiKey };
    if (!hasCredentials(credentials)) {
      this.host.showPanel('Adding words to the dictionary needs the username and apikey settings');
      return;
    }
    const serverUrl = getServerUrl(config);
    if (!serverUrl) {
      this.host.showPanel(`Setting ${serverSettingName(config)} is undefined`);
      return;
    }
    const added = await this.host.withBusy(BUSY_TITLE, () => this.service.addWord(serverUrl, word, credentials));
    if (added === null) {
      return;
    }
    this.host.status(added ? `added "${word}" to the dictionary` : `"${word}" was not added to the dictionary`);
  }

  // --- buffer events -----------------------------------------------------

  onDocumentChanged(documentKey: string, edits: readonly TextEdit[]): void {
    this.sessions.applyEdits(documentKey, edits);
  }

  /** Redraw after the buffer changed: every problem is re-evaluated. */
  refresh(editor: EditorPort): void {
    const session = this.sessions.get(editor.documentKey);
    if (session) {
      this.renderer.render(editor, session);
    }
  }

  onDocumentClosed(documentKey: string): void {
    this.sessions.drop(documentKey);
    this.languages.delete(documentKey);
  }

  private selectProblem(editor: EditorPort, session: ProblemSession, problem: Problem): void {
    const region = session.region(problem);
    editor.select(region);
    editor.revealCenter(region);
    this.showProblem(problem);
  }

  private showProblem(problem: Problem): void {
    if (this.getConfig().displayMode === 'panel') {
      this.host.showPanel(formatProblemPanel(problem));
    } else {
      this.host.status(formatProblemStatus(problem));
    }
  }
}
