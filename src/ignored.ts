import * as fs from 'fs';
import * as path from 'path';
import { debug } from './debug';
import { isIgnoredRule } from './types';
import type { IgnoredRule } from './types';

export const IGNORED_RULES_FILE = 'ignored-rules.json';

/**
 * The user's list of deactivated rules, kept in one JSON file under the
 * extension's global storage: `{ "ignored": [{ "id", "description" }] }`.
 * Order is preserved and duplicates are allowed.
 */
export class IgnoredRuleStore {
  readonly filePath: string;

  constructor(storageDir: string) {
    this.filePath = path.join(storageDir, IGNORED_RULES_FILE);
  }

  load(): IgnoredRule[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }
    const content = fs.readFileSync(this.filePath, 'utf8');
    if (!content.trim()) {
      return [];
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Ignored rules file ${this.filePath} is not valid JSON: ${message}`);
    }
    const ignored = typeof parsed === 'object' && parsed !== null && 'ignored' in parsed ? parsed.ignored : [];
    if (!Array.isArray(ignored)) {
      throw new Error(`Ignored rules file ${this.filePath}: "ignored" must be a list`);
    }
    return ignored.filter(isIgnoredRule).map((r) => ({ id: r.id, description: r.description }));
  }

  save(ignored: readonly IgnoredRule[]): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.filePath, JSON.stringify({ ignored }, null, 2) + '\n', 'utf8');
    debug(`Ignored rules: saved ${ignored.length} entries`);
  }

  add(rule: IgnoredRule): IgnoredRule[] {
    const ignored = [...this.load(), rule];
    this.save(ignored);
    return ignored;
  }

  /** Remove the entry at `index`; returns it, or `undefined` when out of range. */
  removeAt(index: number): IgnoredRule | undefined {
    const ignored = this.load();
    if (index < 0 || index >= ignored.length) {
      return undefined;
    }
    const [removed] = ignored.splice(index, 1);
    this.save(ignored);
    return removed;
  }

  ids(): string[] {
    return this.load().map((r) => r.id);
  }
}
