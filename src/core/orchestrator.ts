import path from 'path';
import { errorMessage } from '../errors.js';
import { isBlank, snippet } from '../helpers.js';
import { Logger, silentLogger } from '../logger.js';
import { TranslatableUnit, TranslationDocument } from '../formats/base.js';
import { TranslationCache } from './cache.js';
import { UnitTranslator } from './unitTranslator.js';

export interface RunConfig {
  sourceLang: string;
  targetLang: string;
  outputPath: string;
  /** Leave units that already carry a translation alone. */
  skipTranslated?: boolean;
  /** Take existing translations from `outputPath` before starting. */
  resume?: boolean;
  /** Translate and fill the cache, but never write the output document. */
  dryRun?: boolean;
  /** Flush the cache after every N units. */
  checkpointEvery?: number;
  verbose?: boolean;
}

export interface RunResult {
  total: number;
  translated: number;
  skipped: number;
  failed: number;
  cacheHits: number;
  engineCalls: number;
}

export type RunPhase = 'idle' | 'started' | 'processing' | 'completed';

export const DEFAULT_CHECKPOINT_EVERY = 50;

export interface OrchestratorDeps {
  translator: UnitTranslator;
  cache: TranslationCache;
  logger?: Logger;
}

/**
 * Walks a document's units in order, one at a time, and applies
 * translations in place. The cache is flushed at every checkpoint, so a
 * killed run loses at most `checkpointEvery` units of engine work. The output
 * document is written once, at the end.
 */
export class BatchOrchestrator {
  private readonly translator: UnitTranslator;
  private readonly cache: TranslationCache;
  private readonly logger: Logger;
  private currentPhase: RunPhase = 'idle';

  constructor(deps: OrchestratorDeps) {
    this.translator = deps.translator;
    this.cache = deps.cache;
    this.logger = deps.logger ?? silentLogger;
  }

  get phase(): RunPhase {
    return this.currentPhase;
  }

  async run<U extends TranslatableUnit>(document: TranslationDocument<U>, config: RunConfig): Promise<RunResult> {
    const skipTranslated = config.skipTranslated ?? true;
    const checkpointEvery = Math.max(1, config.checkpointEvery ?? DEFAULT_CHECKPOINT_EVERY);
    const outputPath = path.resolve(config.outputPath);

    this.currentPhase = 'started';
    if (config.resume) {
      if (await document.resumeFrom(outputPath)) {
        this.logger.info(`Resuming from existing output: ${outputPath}`);
      } else {
        this.logger.info(`No existing output at ${outputPath}; starting from scratch.`);
      }
    }

    const units = document.units();
    const callsBefore = this.translator.engineCalls;
    const hitsBefore = this.translator.cacheHits;
    const result: RunResult = { total: 0, translated: 0, skipped: 0, failed: 0, cacheHits: 0, engineCalls: 0 };

    this.currentPhase = 'processing';
    for (const [index, unit] of units.entries()) {
      const position = `${index + 1}/${units.length}`;
      result.total++;

      if (isBlank(unit.source)) {
        result.skipped++;
      } else if (skipTranslated && !isBlank(unit.translation)) {
        result.skipped++;
        this.logDebug(config, `[SKIP] ${position} ${unit.location ?? unit.id}: already translated`);
      } else {
        const outcome = await this.translator.translateUnit(unit.source, config.sourceLang, config.targetLang);
        if (outcome.failed) {
          result.failed++;
        } else {
          document.applyTranslation(unit, outcome.text);
          result.translated++;
          const origin = outcome.fromCache ? ' (cached)' : '';
          this.logDebug(config, `[OK] ${position} ${unit.location ?? unit.id}: '${snippet(unit.source)}' -> '${snippet(outcome.text)}'${origin}`);
        }
      }

      if ((index + 1) % checkpointEvery === 0) {
        this.logDebug(config, `[PROGRESS] ${result.translated}/${result.total} translated so far...`);
        await this.flushCache();
      }
    }

    await this.flushCache();
    if (config.dryRun) {
      this.logger.info(`[DRY-RUN] Would write to ${outputPath}`);
    } else {
      await document.save(outputPath);
      this.logger.succeed(`Wrote translated file to ${outputPath}`);
    }

    result.cacheHits = this.translator.cacheHits - hitsBefore;
    result.engineCalls = this.translator.engineCalls - callsBefore;
    this.currentPhase = 'completed';
    return result;
  }

  // Cache write failures are logged, not thrown.
  private async flushCache(): Promise<void> {
    try {
      if (await this.cache.flush()) {
        this.logger.debug(`Cache saved to ${this.cache.filePath} (${this.cache.size} entries).`);
      }
    } catch (error) {
      this.logger.warn(`Could not save cache to ${this.cache.filePath}: ${errorMessage(error)}`);
    }
  }

  private logDebug(config: RunConfig, message: string): void {
    if (config.verbose) {
      this.logger.debug(message);
    }
  }
}
