import * as assert from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProoflineController, languageChoices } from '../../src/controller';
import type { ProoflineConfig } from '../../src/settings';
import type { IgnoredRule } from '../../src/types';
import { FakeEditor, FakeHost, FakeService, MemoryRuleStore, makeConfig, makeMatch } from './fakes';

const SERVER_LOG = '/tmp/proofline/languagetool-server.log';

//                 0         1         2         3
//                 0123456789012345678901234567890123
const THREE_ISSUES = 'teh cat and teh dog are are here.';

function harness(text: string, options: { config?: Partial<ProoflineConfig>; rules?: IgnoredRule[]; languageId?: string } = {}) {
  const host = new FakeHost();
  const service = new FakeService();
  const rules = new MemoryRuleStore(options.rules);
  const config = makeConfig(options.config);
  const launches: { jarPath: string; logPath?: string }[] = [];
  const controller = new ProoflineController({
    host,
    service,
    rules,
    getConfig: () => config,
    launchServer: async (jarPath, logPath) => {
      launches.push({ jarPath, logPath });
    },
    serverLogPath: SERVER_LOG,
  });
  const editor = new FakeEditor(text, options.languageId);
  editor.onEdit((key, edits) => controller.onDocumentChanged(key, edits));
  return { host, service, rules, controller, editor, launches };
}

function threeIssues(options: { config?: Partial<ProoflineConfig>; rules?: IgnoredRule[] } = {}) {
  const h = harness(THREE_ISSUES, options);
  h.service.matches = [
    makeMatch(0, 3, { replacements: ['the'] }),
    makeMatch(12, 3, { replacements: ['the'] }),
    makeMatch(20, 7, {
      message: 'Possible typo: you repeated a word',
      category: 'Miscellaneous',
      ruleId: 'ENGLISH_WORD_REPEAT_RULE',
      replacements: ['are'],
    }),
  ];
  return h;
}

suite('ProoflineController', () => {
  suite('check', () => {
    test('sends the buffer and selects the first problem', async () => {
      const { controller, editor, host, service } = harness('Teh quick fox.');
      service.matches = [makeMatch(0, 3, { replacements: ['The'] })];

      await controller.check(editor);

      assert.deepStrictEqual(service.requests, [
        {
          serverUrl: 'https://api.languagetool.org/v2/check',
          text: 'Teh quick fox.',
          language: 'auto',
          disabledRuleIds: [],
          credentials: { username: '', apiKey: '' },
          textField: 'text',
        },
      ]);
      assert.deepStrictEqual(host.busyTitles, ['LanguageTool']);
      assert.deepStrictEqual(editor.selections(), [{ start: 0, end: 3 }]);
      assert.deepStrictEqual(editor.revealed, [{ start: 0, end: 3 }]);
      assert.deepStrictEqual(editor.highlights, [{ start: 0, end: 3 }]);
      assert.strictEqual(host.lastStatus, 'Possible spelling mistake found. (The)');
    });

    test('reports a clean document', async () => {
      const { controller, editor, host } = harness('The quick fox.');
      await controller.check(editor);
      assert.strictEqual(host.lastStatus, 'no language problems were found :-)');
      assert.deepStrictEqual(editor.highlights, []);
    });

    test('checks only the selection and shifts offsets', async () => {
      //                                              012345678901234
      const { controller, editor, service } = harness('Hello. Teh end.');
      service.matches = [makeMatch(0, 3)];
      editor.select({ start: 7, end: 15 });

      await controller.check(editor);

      assert.strictEqual(service.requests[0].text, 'Teh end.');
      assert.deepStrictEqual(editor.selections(), [{ start: 7, end: 10 }]);
      assert.deepStrictEqual(editor.highlights, [{ start: 7, end: 10 }]);
    });

    test('follows edits made while the request is in flight', async () => {
      const { controller, editor, service } = harness('Teh fox.');
      service.matches = [makeMatch(0, 3)];
      service.duringCheck = async () => {
        editor.edit({ start: 0, end: 0 }, 'Oh. ');
      };

      await controller.check(editor);

      assert.strictEqual(editor.text, 'Oh. Teh fox.');
      assert.deepStrictEqual(editor.selections(), [{ start: 4, end: 7 }]);
    });

    test('sends the deactivated rules', async () => {
      const { controller, editor, service } = harness('text', {
        rules: [
          { id: 'EN_QUOTES', description: 'Use smart quotes' },
          { id: 'WHITESPACE_RULE', description: 'Whitespace repetition' },
        ],
      });
      await controller.check(editor);
      assert.deepStrictEqual(service.requests[0].disabledRuleIds, ['EN_QUOTES', 'WHITESPACE_RULE']);
    });

    test('sends an annotation when the text field is data', async () => {
      const { controller, editor, service } = harness('Teh fox.', { config: { textField: 'data' } });
      await controller.check(editor);
      assert.strictEqual(service.requests[0].text, '{"annotation":[{"text":"Teh fox."}]}');
      assert.strictEqual(service.requests[0].textField, 'data');
    });

    test('drops problems in ignored scopes', async () => {
      //                                               012345678901234567
      const { controller, editor, service } = harness('Use `teh` and teh.', { languageId: 'markdown' });
      service.matches = [makeMatch(5, 3), makeMatch(14, 3)];
      await controller.check(editor);
      assert.deepStrictEqual(editor.highlights, [{ start: 14, end: 17 }]);
      assert.deepStrictEqual(editor.selections(), [{ start: 14, end: 17 }]);
    });

    test('shows the problem in the panel in panel mode', async () => {
      const { controller, editor, host, service } = harness('Teh fox.', { config: { displayMode: 'panel' } });
      service.matches = [makeMatch(0, 3, { replacements: ['The'] })];
      await controller.check(editor);
      assert.strictEqual(host.panel, 'Possible spelling mistake found.\n\nSuggestion(s): The');
      assert.strictEqual(host.panelVisible, true);
      assert.deepStrictEqual(host.statuses, []);
    });

    test('a blank server setting is reported in the panel', async () => {
      const { controller, editor, host, service } = harness('Teh fox.', { config: { remoteServer: ' ' } });
      await controller.check(editor);
      assert.strictEqual(host.panel, 'Setting languagetool_server_remote is undefined');
      assert.deepStrictEqual(service.requests, []);
    });

    test('the forced server is used', async () => {
      const { controller, editor, service } = harness('Teh fox.');
      await controller.check(editor, 'local');
      assert.strictEqual(service.requests[0].serverUrl, 'http://localhost:8081/v2/check');
    });

    test('a failed request leaves no session', async () => {
      const { controller, editor, host, service } = threeIssues();
      await controller.check(editor);
      service.matches = null;

      await controller.check(editor);

      assert.strictEqual(controller.sessions.get(editor.documentKey), undefined);
      assert.deepStrictEqual(editor.highlights, []);
      assert.strictEqual(host.statuses.length, 1);
    });
  });

  suite('fix', () => {
    test('applies the only replacement and moves on', async () => {
      const { controller, editor, host, service } = harness('Teh quick fox.');
      service.matches = [makeMatch(0, 3, { replacements: ['The'] })];
      await controller.check(editor);

      await controller.fixProblem(editor);

      assert.strictEqual(editor.text, 'The quick fox.');
      const session = controller.sessions.get(editor.documentKey);
      assert.ok(session);
      assert.deepStrictEqual(session.region(session.problems[0]), { start: 0, end: 0 });
      assert.deepStrictEqual(editor.highlights, []);
      assert.deepStrictEqual(editor.selections(), [{ start: 3, end: 3 }]);
      assert.strictEqual(host.lastStatus, 'no further language problems to fix');
      assert.strictEqual(host.panelVisible, false);
    });

    test('asks which replacement to apply', async () => {
      const { controller, editor, host, service } = harness('Teh quick fox.');
      service.matches = [makeMatch(0, 3, { replacements: ['The', 'Tea'] })];
      await controller.check(editor);
      host.pickAnswers = [1];

      await controller.fixProblem(editor);

      assert.strictEqual(editor.text, 'Tea quick fox.');
      assert.deepStrictEqual(host.picks[0].items, [{ label: 'The' }, { label: 'Tea' }]);
    });

    test('cancelling the choice keeps the problem selected', async () => {
      const { controller, editor, host, service } = harness('Teh quick fox.');
      service.matches = [makeMatch(0, 3, { replacements: ['The', 'Tea'] })];
      await controller.check(editor);
      host.pickAnswers = [undefined];

      await controller.fixProblem(editor);

      assert.strictEqual(editor.text, 'Teh quick fox.');
      assert.deepStrictEqual(editor.selections(), [{ start: 0, end: 3 }]);
      assert.deepStrictEqual(editor.highlights, [{ start: 0, end: 3 }]);
    });

    test('a problem without replacements is ignored instead', async () => {
      const { controller, editor, service } = harness('Teh quick fox.');
      service.matches = [makeMatch(0, 3)];
      await controller.check(editor);

      await controller.fixProblem(editor);

      assert.strictEqual(editor.text, 'Teh quick fox.');
      assert.deepStrictEqual(editor.highlights, []);
      assert.strictEqual(editor.touches, 1);
    });

    test('an edit while choosing leaves the buffer alone', async () => {
      const { controller, editor, host, service } = harness('Teh quick fox.');
      service.matches = [makeMatch(0, 3, { replacements: ['The', 'Tea'] })];
      await controller.check(editor);
      host.pickAnswers = [1];
      host.duringPick = () => editor.edit({ start: 0, end: 3 }, 'Ten');

      await controller.fixProblem(editor);

      assert.strictEqual(editor.text, 'Ten quick fox.');
      assert.strictEqual(host.lastStatus, 'no language problem selected');
    });

    test('a new check while choosing leaves the buffer alone', async () => {
      const { controller, editor, host, service } = harness('Teh quick fox.');
      service.matches = [makeMatch(0, 3, { replacements: ['The', 'Tea'] })];
      await controller.check(editor);
      host.pickAnswers = [1];
      host.duringPick = () => controller.clear(editor);

      await controller.fixProblem(editor);

      assert.strictEqual(editor.text, 'Teh quick fox.');
      assert.strictEqual(host.lastStatus, 'no language problem selected');
    });

    test('fixing after ignoring does nothing', async () => {
      const { controller, editor, host, service } = harness('Teh quick fox.');
      service.matches = [makeMatch(0, 3, { replacements: ['The'] })];
      await controller.check(editor);
      await controller.ignoreProblem(editor);
      assert.deepStrictEqual(editor.selections(), [{ start: 0, end: 0 }]);

      await controller.fixProblem(editor);

      assert.strictEqual(editor.text, 'Teh quick fox.');
      assert.strictEqual(host.lastStatus, 'no language problem selected');
    });

    test('fixing twice applies the replacement once', async () => {
      const { controller, editor, service } = harness('Teh quick fox.');
      service.matches = [makeMatch(0, 3, { replacements: ['The'] })];
      await controller.check(editor);
      await controller.fixProblem(editor);
      editor.select({ start: 0, end: 0 });

      await controller.fixProblem(editor);

      assert.strictEqual(editor.text, 'The quick fox.');
    });

    test('needs a selected problem', async () => {
      const { controller, editor, host } = harness('Teh quick fox.');
      await controller.fixProblem(editor);
      assert.strictEqual(host.lastStatus, 'no language problem selected');
    });

    test('reports a refused edit', async () => {
      const { controller, editor, host, service } = harness('Teh quick fox.');
      service.matches = [makeMatch(0, 3, { replacements: ['The'] })];
      await controller.check(editor);
      editor.replaceResult = false;

      await controller.fixProblem(editor);

      assert.strictEqual(editor.text, 'Teh quick fox.');
      assert.strictEqual(host.lastStatus, 'could not apply the replacement');
    });
  });

  test('ignoring a problem also ignores its equals', async () => {
    const { controller, editor, host } = threeIssues();
    await controller.check(editor);

    await controller.ignoreProblem(editor);

    assert.strictEqual(editor.text, THREE_ISSUES);
    assert.strictEqual(editor.touches, 1);
    assert.deepStrictEqual(editor.highlights, [{ start: 20, end: 27 }]);
    assert.deepStrictEqual(editor.selections(), [{ start: 20, end: 27 }]);
    assert.strictEqual(host.lastStatus, 'Possible typo: you repeated a word (are)');
  });

  suite('navigation', () => {
    test('next and previous walk the unsolved problems', async () => {
      const { controller, editor, host } = threeIssues();
      await controller.check(editor);

      controller.gotoProblem(editor);
      assert.deepStrictEqual(editor.selections(), [{ start: 12, end: 15 }]);
      controller.gotoProblem(editor);
      assert.deepStrictEqual(editor.selections(), [{ start: 20, end: 27 }]);
      controller.gotoProblem(editor);
      assert.deepStrictEqual(editor.selections(), [{ start: 20, end: 27 }]);
      assert.strictEqual(host.lastStatus, 'no further language problems to fix');

      controller.gotoProblem(editor, false);
      assert.deepStrictEqual(editor.selections(), [{ start: 12, end: 15 }]);
    });

    test('solved problems are skipped', async () => {
      const { controller, editor } = threeIssues();
      await controller.check(editor);
      editor.edit({ start: 12, end: 15 }, 'the');

      controller.gotoProblem(editor);

      assert.deepStrictEqual(editor.selections(), [{ start: 20, end: 27 }]);
    });

    test('without a session only the panel is hidden', () => {
      const { controller, editor, host } = harness('text');
      host.showPanel('old');
      controller.gotoProblem(editor);
      assert.strictEqual(host.panelVisible, false);
      assert.deepStrictEqual(host.statuses, []);
    });

    test('selectProblemAtCursor selects the surrounding problem', async () => {
      const { controller, editor } = threeIssues();
      await controller.check(editor);
      editor.select({ start: 13, end: 13 });

      controller.selectProblemAtCursor(editor);

      assert.deepStrictEqual(editor.selections(), [{ start: 12, end: 15 }]);
    });
  });

  test('clear drops the session and the highlights', async () => {
    const { controller, editor } = threeIssues();
    await controller.check(editor);

    controller.clear(editor);

    assert.strictEqual(controller.sessions.get(editor.documentKey), undefined);
    assert.deepStrictEqual(editor.highlights, []);
    assert.deepStrictEqual(editor.selections(), [{ start: 3, end: 3 }]);
  });

  test('refresh redraws after edits', async () => {
    const { controller, editor } = threeIssues();
    await controller.check(editor);
    editor.edit({ start: 12, end: 15 }, 'the');

    controller.refresh(editor);

    assert.deepStrictEqual(editor.highlights, [
      { start: 0, end: 3 },
      { start: 20, end: 27 },
    ]);
  });

  test('closing the document forgets its session', async () => {
    const { controller, editor } = threeIssues();
    await controller.check(editor);
    controller.onDocumentClosed(editor.documentKey);
    assert.strictEqual(controller.sessions.get(editor.documentKey), undefined);
  });

  suite('rules', () => {
    test('deactivateRule stores the rule and removes its problems', async () => {
      const { controller, editor, host, rules } = threeIssues();
      await controller.check(editor);

      await controller.deactivateRule(editor);

      assert.deepStrictEqual(rules.rules, [
        { id: 'MORFOLOGIK_RULE_EN_US', description: 'Possible spelling mistake found.' },
      ]);
      assert.strictEqual(controller.sessions.get(editor.documentKey)?.size, 1);
      assert.deepStrictEqual(editor.highlights, [{ start: 20, end: 27 }]);
      assert.deepStrictEqual(editor.selections(), [{ start: 20, end: 27 }]);
      assert.strictEqual(host.lastStatus, 'deactivated rule MORFOLOGIK_RULE_EN_US');
    });

    test('deactivateRule needs exactly one selected problem', async () => {
      const { controller, editor, host, rules } = threeIssues();
      await controller.check(editor);

      editor.select({ start: 4, end: 7 });
      await controller.deactivateRule(editor);
      assert.strictEqual(host.lastStatus, 'select a problem to deactivate its rule');

      editor.select({ start: 0, end: 27 });
      await controller.deactivateRule(editor);
      assert.strictEqual(host.lastStatus, 'there are multiple selected problems; select only one to deactivate');
      assert.deepStrictEqual(rules.rules, []);
    });

    test('activateRule removes the chosen rule', async () => {
      const { controller, host, rules } = harness('text', {
        rules: [
          { id: 'A', description: 'first' },
          { id: 'B', description: 'second' },
        ],
      });
      host.pickAnswers = [1];

      await controller.activateRule();

      assert.deepStrictEqual(host.picks, [
        {
          items: [
            { label: 'A', detail: 'first' },
            { label: 'B', detail: 'second' },
          ],
          placeHolder: 'Select a rule to activate',
        },
      ]);
      assert.deepStrictEqual(rules.rules, [{ id: 'A', description: 'first' }]);
      assert.strictEqual(host.lastStatus, 'activated rule B');
    });

    test('activateRule with nothing ignored', async () => {
      const { controller, host } = harness('text');
      await controller.activateRule();
      assert.strictEqual(host.lastStatus, 'there are no ignored rules');
      assert.deepStrictEqual(host.picks, []);
    });

    test('cancelling activateRule changes nothing', async () => {
      const { controller, host, rules } = harness('text', { rules: [{ id: 'A', description: 'first' }] });
      await controller.activateRule();
      assert.deepStrictEqual(rules.rules, [{ id: 'A', description: 'first' }]);
      assert.deepStrictEqual(host.statuses, []);
    });
  });

  suite('language', () => {
    test('languageChoices puts autodetect first and drops duplicates', () => {
      assert.deepStrictEqual(
        languageChoices([
          { name: 'Portuguese (Portugal)', code: 'pt', longCode: 'pt-PT' },
          { name: 'German', code: 'de', longCode: 'de-DE' },
          { name: 'Portuguese (Portugal)', code: 'pt', longCode: 'pt-PT' },
          { name: 'German', code: 'de', longCode: 'de' },
        ]),
        [
          { name: 'Autodetect Language', code: 'auto' },
          { name: 'German', code: 'de' },
          { name: 'German', code: 'de-DE' },
          { name: 'Portuguese (Portugal)', code: 'pt-PT' },
        ]
      );
    });

    test('changeLanguage applies to later checks of the document', async () => {
      const { controller, editor, host, service } = harness('Teh fox.');
      service.languages = [
        { name: 'English (US)', code: 'en', longCode: 'en-US' },
        { name: 'German', code: 'de', longCode: 'de-DE' },
      ];
      host.pickAnswers = [2];

      await controller.changeLanguage(editor);

      assert.deepStrictEqual(host.picks[0].items, [
        { label: 'Autodetect Language', detail: 'auto' },
        { label: 'English (US)', detail: 'en-US' },
        { label: 'German', detail: 'de-DE' },
      ]);
      assert.strictEqual(host.lastStatus, 'language: German');
      await controller.check(editor);
      assert.strictEqual(service.requests[0].language, 'de-DE');

      host.pickAnswers = [0];
      await controller.changeLanguage(editor);
      assert.strictEqual(controller.getLanguage(editor.documentKey), 'auto');
    });

    test('no pick when the language list fails', async () => {
      const { controller, editor, host, service } = harness('Teh fox.');
      service.languages = null;
      await controller.changeLanguage(editor);
      assert.deepStrictEqual(host.picks, []);
    });
  });

  suite('startServer', () => {
    test('an unset jar path is reported', async () => {
      const { controller, host, launches } = harness('text');
      await controller.startServer();
      assert.strictEqual(host.panel, 'Setting languagetool_jar is undefined');
      assert.deepStrictEqual(launches, []);
    });

    test('launches the jar with the log path', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'proofline-server-'));
      const jar = path.join(dir, 'languagetool-server.jar');
      fs.writeFileSync(jar, '');
      const { controller, host, launches } = harness('text', { config: { jarPath: jar } });

      await controller.startServer();

      assert.deepStrictEqual(launches, [{ jarPath: jar, logPath: SERVER_LOG }]);
      assert.strictEqual(host.lastStatus, 'Starting local LanguageTool server ...');
      fs.rmSync(dir, { recursive: true, force: true });
    });
  });

  suite('addWord', () => {
    const credentials = { username: 'user@example.com', apiKey: 'test-secret' };

    test('adds the selected word', async () => {
      const { controller, editor, host, service } = harness('The quick fox.', { config: credentials });
      editor.select({ start: 4, end: 9 });

      await controller.addWord(editor);

      assert.deepStrictEqual(service.addedWords, [
        { serverUrl: 'https://api.languagetool.org/v2/check', word: 'quick', credentials },
      ]);
      assert.strictEqual(host.lastStatus, 'added "quick" to the dictionary');
    });

    test('reports a word the server did not add', async () => {
      const { controller, editor, host, service } = harness('The quick fox.', { config: credentials });
      service.added = false;
      editor.select({ start: 4, end: 9 });
      await controller.addWord(editor);
      assert.strictEqual(host.lastStatus, '"quick" was not added to the dictionary');
    });

    test('needs a single word', async () => {
      const { controller, editor, host, service } = harness('The quick fox.', { config: credentials });
      editor.select({ start: 0, end: 9 });
      await controller.addWord(editor);
      assert.strictEqual(host.lastStatus, 'select a single word to add to the dictionary');
      assert.deepStrictEqual(service.addedWords, []);
    });

    test('needs credentials', async () => {
      const { controller, editor, host, service } = harness('The quick fox.');
      editor.select({ start: 4, end: 9 });
      await controller.addWord(editor);
      assert.strictEqual(host.panel, 'Adding words to the dictionary needs the username and apikey settings');
      assert.deepStrictEqual(service.addedWords, []);
    });
  });
});
