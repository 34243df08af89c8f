import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

const APP_DIR_NAME = 'catalog-translator';

// --- CACHE LOCATION ---
export function getCacheDirectory(): string {
  if (process.env.XDG_CACHE_HOME) {
    return path.join(process.env.XDG_CACHE_HOME, APP_DIR_NAME);
  }
  if (process.platform === 'win32') {
    const localAppData = process.env.LOCALAPPDATA || path.join(os.homedir(), 'AppData', 'Local');
    return path.join(localAppData, APP_DIR_NAME);
  }
  return path.join(os.homedir(), '.cache', APP_DIR_NAME);
}

export function getDefaultCacheFilePath(): string {
  return path.join(getCacheDirectory(), 'translation-cache.json');
}

// --- FILE I/O ---

/** Writes `<path>.tmp`, then renames it over `path`. */
export async function writeFileAtomic(filePath: string, content: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  try {
    await fs.writeFile(tmpPath, content);
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

// --- TEXT ---
export interface SurroundingWhitespace {
  leading: string;
  core: string;
  trailing: string;
}

export function splitSurroundingWhitespace(text: string): SurroundingWhitespace {
  const leading = /^\s*/.exec(text)?.[0] ?? '';
  if (leading.length === text.length) {
    return { leading, core: '', trailing: '' };
  }
  const trailing = /\s*$/.exec(text)?.[0] ?? '';
  return {
    leading,
    core: text.slice(leading.length, text.length - trailing.length),
    trailing,
  };
}

export function isBlank(text: string | undefined | null): boolean {
  return !text || text.trim() === '';
}

export function snippet(text: string, maxLength: number = 60): string {
  const flat = text.replace(/\r?\n/g, ' ');
  return flat.length > maxLength ? `${flat.slice(0, maxLength - 3)}...` : flat;
}

// --- OUTPUT PATHS ---

/**
 * Expands `{dir}`, `{name}`, `{ext}` and `{lang}` in an output pattern for
 * the given input file.
 */
export function expandOutputPattern(pattern: string, inputFile: string, lang: string): string {
  const ext = path.extname(inputFile);
  return pattern
    .replace(/\{dir\}/g, path.dirname(inputFile))
    .replace(/\{name\}/g, path.basename(inputFile, ext))
    .replace(/\{ext\}/g, ext)
    .replace(/\{lang\}/g, lang);
}
