import fetch from 'node-fetch';
import { TranslationServiceError } from '../errors.js';
import { BaseTranslator } from './base.js';

export const DEFAULT_GOOGLE_URL = 'https://translate.googleapis.com/translate_a/single';

/**
 * Google Translate's public web endpoint. Needs no key but rate-limits
 * aggressively, answering 429 when too many requests arrive.
 *
 * The reply is a nested array whose first element lists the translated
 * sentences: `[[["Bonjour ","Hello ",...],["le monde","world",...]],...]`.
 */
export class GoogleTranslator extends BaseTranslator {
  name = 'Google Translate';
  private endpoint: string;

  constructor(endpoint: string = DEFAULT_GOOGLE_URL) {
    super();
    this.endpoint = endpoint;
  }

  async translate(text: string, sourceLang: string, targetLang: string): Promise<string> {
    const params = new URLSearchParams({
      client: 'gtx',
      sl: sourceLang,
      tl: targetLang,
      dt: 't',
      q: text,
    });

    return this.wrapErrors(async () => {
      const response = await fetch(`${this.endpoint}?${params.toString()}`);

      if (!response.ok) {
        const reason = response.status === 429 ? 'rate limit exceeded' : response.statusText;
        throw new TranslationServiceError(this.name, `API error: ${response.status} ${reason}`, { status: response.status });
      }

      const data: unknown = await response.json();
      return this.validateResponse(text, extractSentences(data));
    });
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

export function extractSentences(data: unknown): string {
  if (!Array.isArray(data) || !Array.isArray(data[0])) {
    throw new Error('Unexpected response structure');
  }
  const sentences: unknown[] = data[0];
  return sentences
    .map(sentence => (Array.isArray(sentence) && typeof sentence[0] === 'string' ? sentence[0] : ''))
    .join('');
}
