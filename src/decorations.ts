import * as vscode from 'vscode';
import { debug } from './debug';

// Outline around each unsolved problem; recreated when the color setting changes
let problemDecorationType: vscode.TextEditorDecorationType | null = null;
let problemColor = '';

function getDecorationType(color: string): vscode.TextEditorDecorationType {
  if (!problemDecorationType || color !== problemColor) {
    problemDecorationType?.dispose();
    const themeColor = new vscode.ThemeColor(color);
    problemDecorationType = vscode.window.createTextEditorDecorationType({
      borderWidth: '1px',
      borderStyle: 'solid',
      borderColor: themeColor,
      borderRadius: '2px',
      overviewRulerColor: themeColor,
      overviewRulerLane: vscode.OverviewRulerLane.Right,
      rangeBehavior: vscode.DecorationRangeBehavior.ClosedOpen,
    });
    problemColor = color;
  }
  return problemDecorationType;
}

export function renderHighlights(editor: vscode.TextEditor, color: string, ranges: vscode.Range[]): void {
  debug(`renderHighlights: ${ranges.length} regions for ${editor.document.fileName}`, 'verbose');
  editor.setDecorations(getDecorationType(color), ranges);
}

export function disposeDecorations(): void {
  problemDecorationType?.dispose();
  problemDecorationType = null;
  problemColor = '';
}
