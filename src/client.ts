import fetch, { FetchError } from 'node-fetch';
import { debug, debugVerbose } from './debug';
import { readAdded, readLanguages, readMatches } from './types';
import type { Credentials, Language, ServerMatch } from './types';
import type { TextField } from './settings';

export const CLIENT_ID = 'proofline';
export const REQUEST_TIMEOUT_MS = 60_000;

export type TransportErrorKind = 'http' | 'url' | 'timeout' | 'io' | 'response';

export class TransportError extends Error {
  constructor(
    readonly kind: TransportErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/** Receives the text of every transport failure; the host shows it to the user. */
export type ErrorReporter = (message: string) => void;

export interface ClientOptions {
  reportError: ErrorReporter;
  timeoutMs?: number;
}

export interface CheckRequest {
  serverUrl: string;
  text: string;
  language: string;
  disabledRuleIds: readonly string[];
  credentials: Credentials;
  /** Form field carrying the text; `data` expects an annotation document. */
  textField?: TextField;
}

export function hasCredentials(credentials: Credentials): boolean {
  return credentials.username.length > 0 && credentials.apiKey.length > 0;
}

export function buildCheckPayload(request: CheckRequest): URLSearchParams {
  const payload = new URLSearchParams();
  payload.set('language', request.language);
  payload.set(request.textField ?? 'text', request.text);
  payload.set('User-Agent', CLIENT_ID);
  payload.set('disabledRules', request.disabledRuleIds.join(','));
  if (hasCredentials(request.credentials)) {
    payload.set('username', request.credentials.username);
    payload.set('apiKey', request.credentials.apiKey);
  }
  return payload;
}

/** Resolve `endpoint` against the server URL the way a browser resolves a relative link. */
export function resolveEndpoint(serverUrl: string, endpoint: string): string {
  return new URL(endpoint, serverUrl).toString();
}

function parseUrl(serverUrl: string, endpoint: string | null): string {
  try {
    return endpoint ? resolveEndpoint(serverUrl, endpoint) : new URL(serverUrl).toString();
  } catch (err) {
    debug(`Invalid URL ${serverUrl}: ${err instanceof Error ? err.message : String(err)}`);
    throw new TransportError('url', 'Invalid URL');
  }
}

export function classifyError(err: unknown): TransportError {
  if (err instanceof TransportError) {
    return err;
  }
  if (err instanceof FetchError) {
    if (err.type === 'request-timeout' || err.type === 'body-timeout' || err.code === 'ETIMEDOUT') {
      return new TransportError('timeout', 'Connection timeout');
    }
    return new TransportError('io', `Unknown error: ${err.message}`);
  }
  // node-fetch's own URL checks
  if (err instanceof TypeError && /Only absolute URLs|Only HTTP\(S\) protocols/.test(err.message)) {
    return new TransportError('url', 'Invalid URL');
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError('io', `Unknown error: ${message}`);
}

export function formatServerError(error: TransportError): string {
  return `LanguageTool Server Error:\n${error.message}`;
}

/**
 * HTTP client for a LanguageTool server.
 *
 * No method throws: a failed call reports its message through the
 * `reportError` callback and resolves to `null`. An empty response body also
 * resolves to `null`, without a report.
 */
export class LanguageToolClient {
  private readonly reportError: ErrorReporter;
  private readonly timeoutMs: number;

  constructor(options: ClientOptions) {
    this.reportError = options.reportError;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async check(request: CheckRequest): Promise<ServerMatch[] | null> {
    const payload = buildCheckPayload(request);
    const body = await this.request(request.serverUrl, null, payload);
    if (body === null) {
      return null;
    }
    const matches = readMatches(body.value);
    if (!matches) {
      return this.fail(new TransportError('response', 'Invalid response: no matches in server reply'));
    }
    debug(`check: ${matches.length} matches`);
    return matches;
  }

  async getLanguages(serverUrl: string): Promise<Language[] | null> {
    const body = await this.request(serverUrl, 'languages', null);
    if (body === null) {
      return null;
    }
    const languages = readLanguages(body.value);
    if (!languages) {
      return this.fail(new TransportError('response', 'Invalid response: malformed language list'));
    }
    return languages;
  }

  async addWord(serverUrl: string, word: string, credentials: Credentials): Promise<boolean | null> {
    const payload = new URLSearchParams();
    payload.set('word', word);
    payload.set('username', credentials.username);
    payload.set('apiKey', credentials.apiKey);
    const body = await this.request(serverUrl, 'words/add', payload);
    if (body === null) {
      return null;
    }
    const added = readAdded(body.value);
    if (added === null) {
      return this.fail(new TransportError('response', 'Invalid response: no "added" flag in server reply'));
    }
    return added;
  }

  private fail(error: TransportError): null {
    debug(`HTTP failure (${error.kind}): ${error.message}`);
    this.reportError(formatServerError(error));
    return null;
  }

  /** GET when `payload` is null, form POST otherwise. */
  private async request(
    serverUrl: string,
    endpoint: string | null,
    payload: URLSearchParams | null
  ): Promise<{ value: unknown } | null> {
    const method = payload ? 'POST' : 'GET';
    const startTime = Date.now();
    try {
      const url = parseUrl(serverUrl, endpoint);
      debug(`HTTP>> ${method} ${url}`);
      debugVerbose('  payload:', payload ? Object.fromEntries(payload) : null);

      const response = await fetch(url, {
        method,
        body: payload ?? undefined,
        timeout: this.timeoutMs,
        headers: { Accept: 'application/json' },
      });
      const text = await response.text();
      const elapsed = Date.now() - startTime;
      if (!response.ok) {
        throw new TransportError('http', `${response.status} ${response.statusText}\n\n${text}`);
      }
      debug(`HTTP<< ${method} ${url} ${response.status} (${elapsed}ms)`);
      if (!text) {
        return null;
      }
      try {
        return { value: JSON.parse(text) };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new TransportError('response', `Invalid response: ${message}`);
      }
    } catch (err) {
      return this.fail(classifyError(err));
    }
  }
}
