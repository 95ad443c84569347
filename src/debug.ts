import * as fs from 'fs';
import * as path from 'path';
import type { DebugLevel } from './settings';

/** Where debug lines go; an output channel satisfies this. */
export interface LogSink {
  appendLine(line: string): void;
}

interface DebugOptions {
  level: DebugLevel;
  sink?: LogSink;
  /** Directory of `proofline-debug.log`; no file logging when absent. */
  logDir?: string;
}

let level: DebugLevel = 'off';
let sink: LogSink | null = null;
let logDir: string | null = null;
let logStream: fs.WriteStream | null = null;

export function configureDebug(options: DebugOptions): void {
  level = options.level;
  sink = options.sink ?? sink;
  if (options.logDir !== undefined && options.logDir !== logDir) {
    closeLogStream();
    logDir = options.logDir;
  }
}

function getLogStream(): fs.WriteStream | null {
  if (!logDir) {
    return null;
  }
  if (!logStream) {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    logStream = fs.createWriteStream(path.join(logDir, 'proofline-debug.log'), { flags: 'a' });
  }
  return logStream;
}

export function getTimestamp(now: Date = new Date()): string {
  const pad = (n: number, w = 2) => n.toString().padStart(w, '0');
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;
}

function writeLog(line: string): void {
  sink?.appendLine(line);
  getLogStream()?.write(line + '\n');
}

export function debug(message: string, minLevel: DebugLevel = 'basic'): void {
  if (level === 'off') {
    return;
  }
  if (minLevel === 'verbose' && level !== 'verbose') {
    return;
  }

  writeLog(`[${getTimestamp()}] ${message}`);
}

export function debugVerbose(message: string, data?: unknown): void {
  if (level !== 'verbose') {
    return;
  }

  writeLog(`[${getTimestamp()}] ${message}`);
  if (data !== undefined) {
    writeLog(`  ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`);
  }
}

function closeLogStream(): void {
  if (logStream) {
    logStream.end();
    logStream = null;
  }
}

export function disposeDebug(): void {
  closeLogStream();
  sink = null;
  logDir = null;
  level = 'off';
}
