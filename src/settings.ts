import * as os from 'os';
import * as path from 'path';

export type DebugLevel = 'off' | 'basic' | 'verbose';
export type ServerKind = 'local' | 'remote';
export type DisplayMode = 'statusbar' | 'panel';
export type TextField = 'text' | 'data';

export interface ProoflineConfig {
  jarPath: string;
  localServer: string;
  remoteServer: string;
  defaultServer: ServerKind;
  username: string;
  apiKey: string;
  ignoredScopes: string[];
  highlightColor: string;
  displayMode: DisplayMode;
  textField: TextField;
  debug: DebugLevel;
}

/** Anything that can answer `get(key)` for the `proofline` settings section. */
export interface SettingsReader {
  get(key: string): unknown;
}

export const DEFAULT_CONFIG: ProoflineConfig = {
  jarPath: '',
  localServer: 'http://localhost:8081/v2/check',
  remoteServer: 'https://api.languagetool.org/v2/check',
  defaultServer: 'remote',
  username: '',
  apiKey: '',
  ignoredScopes: ['markup.fenced_code.*', 'markup.inline.raw.*', 'comment.*', 'support.function.latex'],
  highlightColor: 'editorWarning.foreground',
  displayMode: 'statusbar',
  textField: 'text',
  debug: 'off',
};

function readString(reader: SettingsReader, key: string, fallback: string): string {
  const value = reader.get(key);
  return typeof value === 'string' ? value : fallback;
}

function readChoice<T extends string>(reader: SettingsReader, key: string, choices: readonly T[], fallback: T): T {
  const value = reader.get(key);
  return choices.find((c) => c === value) ?? fallback;
}

function readStringList(reader: SettingsReader, key: string, fallback: string[]): string[] {
  const value = reader.get(key);
  if (!Array.isArray(value)) {
    return fallback;
  }
  return value.filter((v): v is string => typeof v === 'string');
}

export function resolveConfig(reader: SettingsReader): ProoflineConfig {
  const d = DEFAULT_CONFIG;
  return {
    jarPath: readString(reader, 'languagetool_jar', d.jarPath),
    localServer: readString(reader, 'languagetool_server_local', d.localServer),
    remoteServer: readString(reader, 'languagetool_server_remote', d.remoteServer),
    defaultServer: readChoice(reader, 'default_server', ['local', 'remote'], d.defaultServer),
    username: readString(reader, 'username', d.username),
    apiKey: readString(reader, 'apikey', d.apiKey),
    ignoredScopes: readStringList(reader, 'ignored-scopes', d.ignoredScopes),
    highlightColor: readString(reader, 'highlight-scope', d.highlightColor) || d.highlightColor,
    displayMode: readChoice(reader, 'display_mode', ['statusbar', 'panel'], d.displayMode),
    textField: readChoice(reader, 'text_field', ['text', 'data'], d.textField),
    debug: readChoice(reader, 'debug', ['off', 'basic', 'verbose'], d.debug),
  };
}

/**
 * Server URL for a check: `force` overrides `default_server`.
 * Returns an empty string when the chosen setting is blank.
 */
export function getServerUrl(config: ProoflineConfig, force?: ServerKind): string {
  const kind = force ?? config.defaultServer;
  return (kind === 'local' ? config.localServer : config.remoteServer).trim();
}

export function serverSettingName(config: ProoflineConfig, force?: ServerKind): string {
  return `languagetool_server_${force ?? config.defaultServer}`;
}

/** Expand a leading `~` to the user's home directory. */
export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === '~') {
    return home;
  }
  if (p.startsWith('~/') || p.startsWith('~\\')) {
    return path.join(home, p.slice(2));
  }
  return p;
}
