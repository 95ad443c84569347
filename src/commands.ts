import * as vscode from 'vscode';
import { getConfig } from './config';
import { debug } from './debug';
import { VscodeEditor } from './host';
import type { ProoflineController } from './controller';

export function wrapEditor(editor: vscode.TextEditor): VscodeEditor {
  return new VscodeEditor(editor, getConfig().highlightColor);
}

type EditorAction = (editor: VscodeEditor) => void | Promise<void>;

// Commands that work on the active editor; failures are logged and shown instead of thrown
function editorCommand(name: string, action: EditorAction): () => Promise<void> {
  return async () => {
    const textEditor = vscode.window.activeTextEditor;
    if (!textEditor) {
      void vscode.window.showWarningMessage('No active editor');
      return;
    }
    try {
      await action(wrapEditor(textEditor));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      debug(`${name} failed: ${message}`);
      void vscode.window.showErrorMessage(`Proofline: ${message}`);
    }
  };
}

function windowCommand(name: string, action: () => Promise<void>): () => Promise<void> {
  return async () => {
    try {
      await action();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      debug(`${name} failed: ${message}`);
      void vscode.window.showErrorMessage(`Proofline: ${message}`);
    }
  };
}

export function registerCommands(context: vscode.ExtensionContext, controller: ProoflineController): void {
  const editorCommands: Record<string, EditorAction> = {
    'proofline.check': (editor) => controller.check(editor),
    'proofline.checkLocal': (editor) => controller.check(editor, 'local'),
    'proofline.checkRemote': (editor) => controller.check(editor, 'remote'),
    'proofline.nextProblem': (editor) => controller.gotoProblem(editor, true),
    'proofline.previousProblem': (editor) => controller.gotoProblem(editor, false),
    'proofline.selectProblemAtCursor': (editor) => controller.selectProblemAtCursor(editor),
    'proofline.clearProblems': (editor) => controller.clear(editor),
    'proofline.fixProblem': (editor) => controller.fixProblem(editor),
    'proofline.ignoreProblem': (editor) => controller.ignoreProblem(editor),
    'proofline.deactivateRule': (editor) => controller.deactivateRule(editor),
    'proofline.changeLanguage': (editor) => controller.changeLanguage(editor),
    'proofline.addWord': (editor) => controller.addWord(editor),
  };

  for (const [name, action] of Object.entries(editorCommands)) {
    context.subscriptions.push(vscode.commands.registerCommand(name, editorCommand(name, action)));
  }
  context.subscriptions.push(
    vscode.commands.registerCommand('proofline.activateRule', windowCommand('proofline.activateRule', () => controller.activateRule())),
    vscode.commands.registerCommand('proofline.startServer', windowCommand('proofline.startServer', () => controller.startServer()))
  );
}
