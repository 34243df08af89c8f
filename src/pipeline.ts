import path from 'path';
import { TranslationCache } from './core/cache.js';
import { BatchOrchestrator, RunResult } from './core/orchestrator.js';
import { UnitTranslator } from './core/unitTranslator.js';
import { DocumentFormat } from './formats/base.js';
import { createDocument, detectFormat } from './formats/factory.js';
import { Logger, silentLogger } from './logger.js';
import { TranslationEngine } from './translators/base.js';

export interface TranslateFileOptions {
  inputPath: string;
  outputPath: string;
  sourceLang: string;
  targetLang: string;
  engine: TranslationEngine;
  /** Shared across files; loaded from `cacheFile` when omitted. */
  cache?: TranslationCache;
  cacheFile?: string;
  format?: DocumentFormat;
  skipTranslated?: boolean;
  resume?: boolean;
  dryRun?: boolean;
  checkpointEvery?: number;
  verbose?: boolean;
  sortKeys?: boolean;
  logger?: Logger;
}

/**
 * Load, translate and write one file. Load and final-write failures are
 * thrown (`DocumentLoadError`, `OutputWriteError`); per-unit engine
 * failures are counted in the result.
 */
export async function translateFile(options: TranslateFileOptions): Promise<RunResult> {
  const logger = options.logger ?? silentLogger;
  const inputPath = path.resolve(options.inputPath);
  const format = options.format ?? detectFormat(inputPath);

  const document = createDocument(format, { targetLang: options.targetLang, sortKeys: options.sortKeys });
  await document.load(inputPath);
  logger.debug(`Loaded ${document.units().length} units from ${inputPath}`);

  const cache = options.cache ?? await TranslationCache.load(options.cacheFile, logger);
  const translator = new UnitTranslator(options.engine, cache, logger);
  const orchestrator = new BatchOrchestrator({ translator, cache, logger });

  return orchestrator.run(document, {
    sourceLang: options.sourceLang,
    targetLang: options.targetLang,
    outputPath: options.outputPath,
    skipTranslated: options.skipTranslated,
    resume: options.resume,
    dryRun: options.dryRun,
    checkpointEvery: options.checkpointEvery,
    verbose: options.verbose,
  });
}

export { TranslationCache } from './core/cache.js';
export { BatchOrchestrator } from './core/orchestrator.js';
export type { RunConfig, RunPhase, RunResult } from './core/orchestrator.js';
export { UnitTranslator } from './core/unitTranslator.js';
export type { UnitTranslation } from './core/unitTranslator.js';
export { shield, unshield, PLACEHOLDER_MATCHERS } from './core/placeholders.js';
export type { PlaceholderMap, ShieldResult } from './core/placeholders.js';
export { JsonDocument } from './formats/json.js';
export { PoDocument } from './formats/po.js';
export type { TranslatableUnit, TranslationDocument } from './formats/base.js';
export { TranslatorFactory } from './translators/factory.js';
export type { TranslationEngine } from './translators/base.js';
export * from './errors.js';
