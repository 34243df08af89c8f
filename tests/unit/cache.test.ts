import { promises as fs } from 'fs';
import path from 'path';
import { TranslationCache } from '../../src/core/cache';
import { createRecordingLogger, makeTempDir, readJson, removeDir } from '../helpers/fakes';

describe('TranslationCache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('keys entries by language pair and text', () => {
    expect(TranslationCache.cacheKey('Hello', 'en', 'fr')).toBe('en|fr|Hello');

    const cache = new TranslationCache();
    cache.put('Hello', 'en', 'fr', 'Bonjour');
    expect(cache.get('Hello', 'en', 'fr')).toBe('Bonjour');
    expect(cache.get('Hello', 'en', 'de')).toBeUndefined();
    expect(cache.get('hello', 'en', 'fr')).toBeUndefined();
  });

  it('keeps the first value stored for a key', () => {
    const cache = new TranslationCache();
    expect(cache.put('Hello', 'en', 'fr', 'Bonjour')).toBe(true);
    expect(cache.put('Hello', 'en', 'fr', 'Salut')).toBe(false);
    expect(cache.get('Hello', 'en', 'fr')).toBe('Bonjour');
    expect(cache.size).toBe(1);
  });

  it('starts empty when the file does not exist', async () => {
    const logger = createRecordingLogger();
    const cache = await TranslationCache.load(path.join(dir, 'missing.json'), logger);
    expect(cache.size).toBe(0);
    expect(cache.filePath).toBe(path.join(dir, 'missing.json'));
    expect(logger.warnings).toEqual([]);
    expect(logger.debugs).toEqual([`No cache at ${path.join(dir, 'missing.json')}, starting empty.`]);
  });

  it('starts empty with a warning when the file is corrupt', async () => {
    const file = path.join(dir, 'cache.json');
    await fs.writeFile(file, '{"en|fr|Hello": "Bonj');
    const logger = createRecordingLogger();

    const cache = await TranslationCache.load(file, logger);

    expect(cache.size).toBe(0);
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]).toContain('is corrupt');
  });

  it('rejects a root that is not an object', async () => {
    const file = path.join(dir, 'cache.json');
    await fs.writeFile(file, '["en|fr|Hello"]');
    const logger = createRecordingLogger();

    const cache = await TranslationCache.load(file, logger);

    expect(cache.size).toBe(0);
    expect(logger.warnings).toEqual([`Cache ${file} does not hold a JSON object. Starting with an empty cache.`]);
  });

  it('drops non-string values', async () => {
    const file = path.join(dir, 'cache.json');
    await fs.writeFile(file, JSON.stringify({ 'en|fr|Hello': 'Bonjour', 'en|fr|Count': 3 }));
    const logger = createRecordingLogger();

    const cache = await TranslationCache.load(file, logger);

    expect(cache.size).toBe(1);
    expect(cache.get('Hello', 'en', 'fr')).toBe('Bonjour');
    expect(logger.warnings).toEqual([`Dropped 1 non-string entries from cache ${file}.`]);
  });

  it('persists and reloads entries', async () => {
    const file = path.join(dir, 'nested', 'cache.json');
    const cache = await TranslationCache.load(file);
    cache.put('Hello {0}', 'en', 'fr', 'Bonjour {0}');
    cache.put('Bye', 'en', 'fr', 'Au revoir');

    expect(cache.isDirty).toBe(true);
    expect(await cache.flush()).toBe(true);
    expect(cache.isDirty).toBe(false);

    expect(await readJson(file)).toEqual({ 'en|fr|Hello {0}': 'Bonjour {0}', 'en|fr|Bye': 'Au revoir' });
    const reloaded = await TranslationCache.load(file);
    expect(reloaded.get('Bye', 'en', 'fr')).toBe('Au revoir');
    expect(await fs.readdir(path.dirname(file))).toEqual(['cache.json']);
  });

  it('skips the write when nothing changed or there is no file', async () => {
    const file = path.join(dir, 'cache.json');
    const cache = await TranslationCache.load(file);
    expect(await cache.flush()).toBe(false);
    await expect(fs.access(file)).rejects.toThrow();

    const memory = new TranslationCache();
    memory.put('Hello', 'en', 'fr', 'Bonjour');
    expect(await memory.flush()).toBe(false);
  });

  it('keeps a key containing the separator intact', async () => {
    const file = path.join(dir, 'cache.json');
    const cache = await TranslationCache.load(file);
    cache.put('A | B', 'en', 'fr', 'A | B fr');
    await cache.flush();

    const reloaded = await TranslationCache.load(file);
    expect(reloaded.get('A | B', 'en', 'fr')).toBe('A | B fr');
  });
});
