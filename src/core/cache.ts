import { promises as fs } from 'fs';
import path from 'path';
import { errorCode, errorMessage } from '../errors.js';
import { writeFileAtomic } from '../helpers.js';
import { Logger, silentLogger } from '../logger.js';

type CacheRecord = { [key: string]: string };

const KEY_SEPARATOR = '|';

/**
 * Memo of engine results keyed by language pair and source text, persisted
 * as one flat JSON object.
 */
export class TranslationCache {
  private readonly entries: Map<string, string>;
  private dirty = false;

  constructor(readonly filePath?: string, entries: Iterable<[string, string]> = []) {
    this.entries = new Map(entries);
  }

  static cacheKey(text: string, sourceLang: string, targetLang: string): string {
    return [sourceLang, targetLang, text].join(KEY_SEPARATOR);
  }

  /**
   * A missing file gives an empty cache. So does an unreadable or malformed
   * one, with a warning.
   */
  static async load(filePath: string | undefined, logger: Logger = silentLogger): Promise<TranslationCache> {
    if (!filePath) {
      return new TranslationCache();
    }
    const resolved = path.resolve(filePath);

    let raw: string;
    try {
      raw = await fs.readFile(resolved, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        logger.debug(`No cache at ${resolved}, starting empty.`);
      } else {
        logger.warn(`Could not read cache ${resolved}: ${errorMessage(error)}. Starting with an empty cache.`);
      }
      return new TranslationCache(resolved);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.warn(`Cache ${resolved} is corrupt (${errorMessage(error)}). Starting with an empty cache.`);
      return new TranslationCache(resolved);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      logger.warn(`Cache ${resolved} does not hold a JSON object. Starting with an empty cache.`);
      return new TranslationCache(resolved);
    }

    const entries: [string, string][] = [];
    let dropped = 0;
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') {
        entries.push([key, value]);
      } else {
        dropped++;
      }
    }
    if (dropped > 0) {
      logger.warn(`Dropped ${dropped} non-string entries from cache ${resolved}.`);
    }

    logger.debug(`Loaded ${entries.length} cached translations from ${resolved}.`);
    return new TranslationCache(resolved, entries);
  }

  get size(): number {
    return this.entries.size;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get(text: string, sourceLang: string, targetLang: string): string | undefined {
    return this.entries.get(TranslationCache.cacheKey(text, sourceLang, targetLang));
  }

  /** First write wins: returns false and keeps the stored value if the key exists. */
  put(text: string, sourceLang: string, targetLang: string, translated: string): boolean {
    const key = TranslationCache.cacheKey(text, sourceLang, targetLang);
    if (this.entries.has(key)) {
      return false;
    }
    this.entries.set(key, translated);
    this.dirty = true;
    return true;
  }

  /** Writes the snapshot if anything changed since the last flush. */
  async flush(): Promise<boolean> {
    if (!this.filePath || !this.dirty) {
      return false;
    }
    const record: CacheRecord = Object.fromEntries(this.entries);
    await writeFileAtomic(this.filePath, `${JSON.stringify(record, null, 2)}\n`);
    this.dirty = false;
    return true;
  }
}
