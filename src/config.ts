import path from 'path';
import { glob } from 'glob';
import { DEFAULT_CHECKPOINT_EVERY } from './core/orchestrator.js';
import { ConfigError } from './errors.js';
import { DocumentFormat } from './formats/base.js';
import { isDocumentFormat } from './formats/factory.js';
import { DEFAULT_OLLAMA_MODEL, DEFAULT_OLLAMA_URL } from './translators/ollama.js';
import { TranslatorConfig, isTranslatorType } from './translators/factory.js';

export const DEFAULT_OUTPUT_PATTERN = '{dir}/{name}.{lang}{ext}';

/** Option values as commander hands them over. */
export type RawCliOptions = {
  lang: string;
  sourceLang: string;
  output?: string;
  format?: string;
  verbose?: boolean;
  dryRun?: boolean;
  skipTranslated?: boolean;
  resume?: boolean;
  cache: boolean;
  cacheFile: string;
  checkpointEvery: string;
  sortKeys?: boolean;
  provider?: string;
  geminiModel?: string;
  openaiModel?: string;
  ollamaUrl?: string;
  ollamaModel?: string;
  context?: string;
};

export interface CliConfig {
  inputs: string[];
  sourceLang: string;
  targetLangs: string[];
  outputPattern: string;
  format?: DocumentFormat;
  verbose: boolean;
  dryRun: boolean;
  skipTranslated: boolean;
  resume: boolean;
  /** Undefined when the durable cache is disabled. */
  cacheFile?: string;
  checkpointEvery: number;
  sortKeys: boolean;
  translator: TranslatorConfig;
}

export function parseCheckpointEvery(value: string | undefined): number {
  if (value === undefined || value === '') {
    return DEFAULT_CHECKPOINT_EVERY;
  }
  if (!/^\d+$/.test(value.trim()) || Number(value) < 1) {
    throw new ConfigError(`--checkpoint-every must be a positive integer, got "${value}"`);
  }
  return Number(value);
}

export function parseLanguageList(value: string): string[] {
  const langs = value.split(',').map(l => l.trim()).filter(l => l);
  if (langs.length === 0) {
    throw new ConfigError('No valid target languages specified');
  }
  return langs;
}

// dotenv turns `KEY=` into an empty string; treat that as unset.
function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function parseCliOptions(inputs: string[], raw: RawCliOptions, env: NodeJS.ProcessEnv = process.env): CliConfig {
  if (inputs.length === 0) {
    throw new ConfigError('Specify at least one input file');
  }

  const format = raw.format?.toLowerCase();
  if (format !== undefined && !isDocumentFormat(format)) {
    throw new ConfigError(`Unknown format "${raw.format}"; expected po or json`);
  }

  const provider = raw.provider || envValue(env, 'TRANSLATOR_PROVIDER');
  if (provider !== undefined && !isTranslatorType(provider)) {
    throw new ConfigError(`Unknown provider "${provider}"; expected google, gemini, openai or ollama`);
  }

  const sourceLang = raw.sourceLang.trim();
  if (!sourceLang) {
    throw new ConfigError('Source language must not be empty');
  }

  return {
    inputs,
    sourceLang,
    targetLangs: parseLanguageList(raw.lang),
    outputPattern: raw.output ?? DEFAULT_OUTPUT_PATTERN,
    format,
    verbose: raw.verbose ?? false,
    dryRun: raw.dryRun ?? false,
    skipTranslated: raw.skipTranslated ?? true,
    resume: raw.resume ?? false,
    cacheFile: raw.cache ? path.resolve(raw.cacheFile) : undefined,
    checkpointEvery: parseCheckpointEvery(raw.checkpointEvery),
    sortKeys: raw.sortKeys ?? false,
    translator: {
      type: provider,
      geminiModel: raw.geminiModel || envValue(env, 'GEMINI_MODEL'),
      openaiModel: raw.openaiModel || envValue(env, 'OPENAI_MODEL'),
      ollamaBaseUrl: raw.ollamaUrl || envValue(env, 'OLLAMA_URL') || DEFAULT_OLLAMA_URL,
      ollamaModel: raw.ollamaModel || envValue(env, 'OLLAMA_MODEL') || DEFAULT_OLLAMA_MODEL,
      context: raw.context,
      verbose: raw.verbose ?? false,
    },
  };
}

/** Expands glob patterns; plain paths are taken as given. Order is stable and duplicates are dropped. */
export async function resolveInputFiles(patterns: string[]): Promise<string[]> {
  const files: string[] = [];
  for (const pattern of patterns) {
    if (/[*?[]/.test(pattern)) {
      const matches = await glob(pattern, { absolute: true, nodir: true });
      files.push(...matches.sort());
    } else {
      files.push(path.resolve(pattern));
    }
  }
  return [...new Set(files)];
}
