#!/usr/bin/env node

import { Command } from 'commander';
import dotenv from 'dotenv';
import path from 'path';
import { performance } from 'perf_hooks';
import { CliConfig, RawCliOptions, parseCliOptions, resolveInputFiles } from './config.js';
import { TranslationCache } from './core/cache.js';
import { RunResult } from './core/orchestrator.js';
import { ConfigError, errorMessage } from './errors.js';
import { expandOutputPattern, getDefaultCacheFilePath } from './helpers.js';
import { Logger, createLogger } from './logger.js';
import { translateFile } from './pipeline.js';
import { TranslationEngine } from './translators/base.js';
import { TranslatorFactory } from './translators/factory.js';

dotenv.config();

function printStats(result: RunResult, elapsedMs: number, logger: Logger): void {
  logger.info('--- Translation Statistics ---');
  console.log(`
  - Units:
    - Total:                  ${result.total}
    - Translated:             ${result.translated}
    - Skipped:                ${result.skipped}
    - Failed (kept source):   ${result.failed}
  - Engine:
    - Strings from Cache:     ${result.cacheHits}
    - Requests Sent:          ${result.engineCalls}

  - Total Execution Time:     ${elapsedMs.toFixed(2)}ms`);
}

async function processFile(
  inputFile: string,
  targetLang: string,
  config: CliConfig,
  engine: TranslationEngine,
  cache: TranslationCache,
  logger: Logger
): Promise<void> {
  const outputPath = path.resolve(expandOutputPattern(config.outputPattern, inputFile, targetLang));
  if (outputPath === path.resolve(inputFile)) {
    throw new ConfigError(`Output path ${outputPath} would overwrite the input file`);
  }

  const start = performance.now();
  logger.progress(`Translating ${path.basename(inputFile)} (${config.sourceLang} -> ${targetLang}) using ${engine.name}...`);

  const result = await translateFile({
    inputPath: inputFile,
    outputPath,
    sourceLang: config.sourceLang,
    targetLang,
    engine,
    cache,
    format: config.format,
    skipTranslated: config.skipTranslated,
    resume: config.resume,
    dryRun: config.dryRun,
    checkpointEvery: config.checkpointEvery,
    verbose: config.verbose,
    sortKeys: config.sortKeys,
    logger,
  });

  logger.succeed(`Completed: ${result.translated}/${result.total} entries translated`);
  if (result.failed > 0) {
    logger.warn(`${result.failed} entries could not be translated and kept their source text. Re-run with --resume to retry them.`);
  }
  if (config.verbose) {
    printStats(result, performance.now() - start, logger);
  }
}

// --- MAIN CLI LOGIC ---
async function main(): Promise<void> {
  const program = new Command();

  if (process.argv.includes('--list-providers')) {
    console.log('Checking available translation providers...\n');
    const providers = await TranslatorFactory.listAvailableProviders();
    console.log('Available providers:');
    providers.forEach(p => console.log(`  - ${p}`));
    return;
  }

  program
    .name('catalog-translator')
    .version('1.0.0')
    .description('Translate gettext (.po) catalogs and flat JSON dictionaries, keeping placeholders, whitespace and metadata intact.')
    .argument('<inputFiles...>', 'Path(s) to source .po/.json file(s) or glob patterns')
    .requiredOption('-l, --lang <langCodes>', 'Target language code(s), comma-separated for multiple')
    .option('-s, --source-lang <langCode>', 'Source language code', 'en')
    .option('-o, --output <pattern>', 'Output file path or pattern; supports {dir}, {name}, {ext}, {lang}')
    .option('--format <format>', 'Input format (po or json); detected from the file extension by default')
    .option('-v, --verbose', 'Print per-entry progress')
    .option('--dry-run', 'Translate and fill the cache, but do not write output files')
    .option('--skip-translated', 'Skip entries that already have a translation (default)')
    .option('--no-skip-translated', 'Re-translate entries that already have a translation')
    .option('--resume', 'Continue from an existing output file')
    .option('--no-cache', 'Do not read or write a translation cache file')
    .option('--cache-file <path>', 'Translation cache file', getDefaultCacheFilePath())
    .option('--checkpoint-every <n>', 'Save the translation cache every N entries', '50')
    .option('--sort-keys', 'Sort output JSON keys alphabetically')
    .option('--provider <type>', 'Translation provider: google, gemini, openai or ollama')
    .option('--gemini-model <model>', 'Gemini model to use')
    .option('--openai-model <model>', 'OpenAI model to use')
    .option('--ollama-url <url>', 'Ollama API URL')
    .option('--ollama-model <model>', 'Ollama model name')
    .option('--context <instructions>', 'Extra instructions for LLM providers (e.g. "Use formal tone")')
    .option('--list-providers', 'List available translation providers')
    .parse(process.argv);

  let config: CliConfig;
  try {
    config = parseCliOptions(program.args, program.opts<RawCliOptions>());
  } catch (error) {
    return program.error(`Error: ${errorMessage(error)}`);
  }

  const logger = createLogger({ verbose: config.verbose });

  let engine: TranslationEngine;
  try {
    engine = await TranslatorFactory.create(config.translator);
    logger.info(`Using translation provider: ${engine.name}`);
  } catch (error) {
    logger.error(`Error initializing translator: ${errorMessage(error)}`);
    process.exitCode = 1;
    return;
  }

  const inputFiles = await resolveInputFiles(config.inputs);
  if (inputFiles.length === 0) {
    logger.error('No files found matching the input patterns.');
    process.exitCode = 1;
    return;
  }

  const cache = await TranslationCache.load(config.cacheFile, logger);
  if (config.cacheFile) {
    logger.info(`Translation cache: ${config.cacheFile} (${cache.size} entries)`);
  }

  for (const targetLang of config.targetLangs) {
    if (config.targetLangs.length > 1) {
      logger.info(`=== Processing language: ${targetLang} ===`);
    }
    for (const inputFile of inputFiles) {
      await processFile(inputFile, targetLang, config, engine, cache, logger);
    }
  }
}

main().catch(error => {
  console.error(`\nError: ${errorMessage(error)}`);
  console.error('Cached translations are kept; use --resume to continue from the last checkpoint.');
  process.exit(1);
});
