import * as vscode from 'vscode';
import { expandHome, resolveConfig } from './settings';
import type { ProoflineConfig } from './settings';

export const CONFIG_SECTION = 'proofline';

export function getConfig(): ProoflineConfig {
  const config = vscode.workspace.getConfiguration(CONFIG_SECTION);
  const resolved = resolveConfig({ get: (key) => config.get(key) });
  return { ...resolved, jarPath: expandHome(resolved.jarPath) };
}
