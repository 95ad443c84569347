import * as vscode from 'vscode';
import * as path from 'path';
import { LanguageToolClient } from './client';
import { registerCommands, wrapEditor } from './commands';
import { CONFIG_SECTION, getConfig } from './config';
import { ProoflineController } from './controller';
import { configureDebug, debug, disposeDebug } from './debug';
import { disposeDecorations } from './decorations';
import { VscodeHost } from './host';
import { IgnoredRuleStore } from './ignored';
import { launchLocalServer } from './server';
import type { TextEdit } from './types';

const SERVER_LOG_FILE = 'languagetool-server.log';

let controller: ProoflineController | null = null;

function toTextEdits(event: vscode.TextDocumentChangeEvent): TextEdit[] {
  return event.contentChanges.map((change) => ({
    start: change.rangeOffset,
    end: change.rangeOffset + change.rangeLength,
    text: change.text,
  }));
}

function refreshDocument(document: vscode.TextDocument): void {
  for (const editor of vscode.window.visibleTextEditors) {
    if (editor.document === document) {
      controller?.refresh(wrapEditor(editor));
    }
  }
}

export function activate(context: vscode.ExtensionContext): void {
  const storageDir = context.globalStorageUri.fsPath;
  const debugChannel = vscode.window.createOutputChannel('Proofline Debug');
  const panel = vscode.window.createOutputChannel('LanguageTool');
  context.subscriptions.push(debugChannel, panel);
  configureDebug({ level: getConfig().debug, sink: debugChannel, logDir: storageDir });
  debug('Proofline activating...');

  const host = new VscodeHost(panel);
  context.subscriptions.push(host);

  const active = new ProoflineController({
    host,
    service: new LanguageToolClient({ reportError: (message) => host.showError(message) }),
    rules: new IgnoredRuleStore(storageDir),
    getConfig,
    launchServer: launchLocalServer,
    serverLogPath: path.join(storageDir, SERVER_LOG_FILE),
  });
  controller = active;

  registerCommands(context, active);

  context.subscriptions.push(
    vscode.workspace.onDidChangeTextDocument((event) => {
      if (event.contentChanges.length === 0) {
        return;
      }
      active.onDocumentChanged(event.document.uri.toString(), toTextEdits(event));
      refreshDocument(event.document);
    }),
    vscode.workspace.onDidCloseTextDocument((document) => {
      active.onDocumentClosed(document.uri.toString());
    }),
    vscode.window.onDidChangeVisibleTextEditors((editors) => {
      for (const editor of editors) {
        active.refresh(wrapEditor(editor));
      }
    }),
    vscode.workspace.onDidChangeConfiguration((e) => {
      if (e.affectsConfiguration(CONFIG_SECTION)) {
        configureDebug({ level: getConfig().debug, sink: debugChannel, logDir: storageDir });
        for (const editor of vscode.window.visibleTextEditors) {
          active.refresh(wrapEditor(editor));
        }
      }
    })
  );

  debug('Proofline activated');
}

export function deactivate(): void {
  debug('Proofline deactivating...');
  controller = null;
  disposeDecorations();
  disposeDebug();
}
