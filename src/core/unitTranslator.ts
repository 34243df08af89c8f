import { TranslationServiceError, errorMessage } from '../errors.js';
import { isBlank, snippet, splitSurroundingWhitespace } from '../helpers.js';
import { Logger, silentLogger } from '../logger.js';
import { TranslationEngine } from '../translators/base.js';
import { TranslationCache } from './cache.js';
import { findMissingMarkers, shield, stripMarkers, unshield } from './placeholders.js';

export interface UnitTranslation {
  text: string;
  fromCache: boolean;
  /** The engine could not translate the unit; `text` is the source text. */
  failed: boolean;
}

const LETTER = /\p{L}/u;
const LINE_BREAK = /(\r?\n)/;

/**
 * Translates one piece of text: cache first, then the engine, with
 * placeholders shielded and whitespace/line structure kept out of the
 * engine's hands. Engine failures are contained here and never thrown.
 */
export class UnitTranslator {
  engineCalls = 0;
  cacheHits = 0;
  failures = 0;

  private readonly inFlight = new Map<string, Promise<UnitTranslation>>();

  constructor(
    private readonly engine: TranslationEngine,
    private readonly cache: TranslationCache,
    private readonly logger: Logger = silentLogger,
  ) {}

  async translateUnit(sourceText: string, sourceLang: string, targetLang: string): Promise<UnitTranslation> {
    if (isBlank(sourceText)) {
      return { text: sourceText, fromCache: false, failed: false };
    }

    const cached = this.cache.get(sourceText, sourceLang, targetLang);
    if (cached !== undefined) {
      this.cacheHits++;
      return { text: cached, fromCache: true, failed: false };
    }

    // Concurrent callers asking for the same key share one engine round trip.
    const key = TranslationCache.cacheKey(sourceText, sourceLang, targetLang);
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const request = this.translateUncached(sourceText, sourceLang, targetLang)
      .finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, request);
    return request;
  }

  private async translateUncached(sourceText: string, sourceLang: string, targetLang: string): Promise<UnitTranslation> {
    const { leading, core, trailing } = splitSurroundingWhitespace(sourceText);
    const { masked, placeholders } = shield(core);
    const callsBefore = this.engineCalls;

    try {
      // Odd indices hold the line breaks themselves.
      const segments = masked.split(LINE_BREAK);
      const translatedSegments: string[] = [];
      for (let i = 0; i < segments.length; i++) {
        translatedSegments.push(i % 2 === 1
          ? segments[i]
          : await this.translateLine(segments[i], sourceLang, targetLang));
      }
      const translatedMasked = translatedSegments.join('');

      const missing = findMissingMarkers(translatedMasked, placeholders);
      if (missing.length > 0) {
        const lost = missing.map(token => placeholders.get(token) ?? token).join(', ');
        throw new TranslationServiceError(this.engine.name, `Placeholders lost or duplicated in response: ${lost}`);
      }

      const text = `${leading}${unshield(translatedMasked, placeholders)}${trailing}`;
      if (this.engineCalls > callsBefore) {
        this.cache.put(sourceText, sourceLang, targetLang, text);
      }
      return { text, fromCache: false, failed: false };
    } catch (error) {
      this.failures++;
      this.logger.warn(`Translation failed for "${snippet(sourceText)}": ${errorMessage(error)}. Keeping source text.`);
      return { text: sourceText, fromCache: false, failed: true };
    }
  }

  private async translateLine(line: string, sourceLang: string, targetLang: string): Promise<string> {
    const { leading, core, trailing } = splitSurroundingWhitespace(line);
    if (!LETTER.test(stripMarkers(core))) {
      return line;
    }

    this.engineCalls++;
    const translated = await this.engine.translate(core, sourceLang, targetLang);
    if (isBlank(translated)) {
      throw new TranslationServiceError(this.engine.name, `Empty translation for "${snippet(core)}"`);
    }
    return `${leading}${translated.trim()}${trailing}`;
  }
}
