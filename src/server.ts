import { spawn } from 'child_process';
import type { SpawnOptions } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { debug } from './debug';

export const LOCAL_SERVER_PORT = 8081;
export const SERVER_MAIN_CLASS = 'org.languagetool.server.HTTPServer';

export interface ServerCommand {
  command: string;
  args: string[];
  options: SpawnOptions;
}

export type JarCheck = { ok: true } | { ok: false; message: string };

/** Validate the `languagetool_jar` setting; failures carry the text for the panel. */
export function checkJarPath(jarPath: string): JarCheck {
  if (!jarPath) {
    return { ok: false, message: 'Setting languagetool_jar is undefined' };
  }
  if (!fs.existsSync(jarPath) || !fs.statSync(jarPath).isFile()) {
    return {
      ok: false,
      message:
        `Error, could not find LanguageTool's JAR file (${jarPath})\n\n` +
        'Please install LanguageTool in this directory or modify the `languagetool_jar` setting.',
    };
  }
  return { ok: true };
}

export function buildServerCommand(jarPath: string, platform: NodeJS.Platform = process.platform): ServerCommand {
  const args = ['-cp', jarPath, SERVER_MAIN_CLASS, '--port', String(LOCAL_SERVER_PORT)];
  if (platform === 'win32') {
    return {
      command: 'java',
      args,
      options: { windowsHide: true, detached: false, cwd: path.dirname(jarPath) },
    };
  }
  return {
    command: 'java',
    args,
    options: { detached: true, cwd: path.dirname(jarPath) },
  };
}

/** Starts the server process; resolves once it has been spawned. */
export type ServerLauncher = (jarPath: string, logPath?: string) => Promise<void>;

export const launchLocalServer: ServerLauncher = (jarPath, logPath) => {
  const { command, args, options } = buildServerCommand(jarPath);

  return new Promise((resolve, reject) => {
    if (logPath && !fs.existsSync(path.dirname(logPath))) {
      fs.mkdirSync(path.dirname(logPath), { recursive: true });
    }
    const logFd = logPath ? fs.openSync(logPath, 'a') : null;
    const stdio: SpawnOptions['stdio'] = logFd === null ? 'ignore' : ['ignore', logFd, logFd];
    const proc = spawn(command, args, { ...options, stdio });
    if (logFd !== null) {
      fs.closeSync(logFd);
    }

    proc.once('error', (err) => {
      debug(`Server: failed to start ${command}: ${err.message}`);
      reject(err);
    });
    proc.once('spawn', () => {
      debug(`Server: started ${command} ${args.join(' ')} (pid ${proc.pid})`);
      proc.unref();
      resolve();
    });
  });
};
