import { TranslationServiceError, errorMessage } from '../errors.js';

/**
 * A black-box translation service. `translate` receives one piece of text
 * whose placeholders are already masked and rejects with a
 * `TranslationServiceError` when it cannot produce a translation.
 */
export interface TranslationEngine {
  name: string;
  translate(text: string, sourceLang: string, targetLang: string): Promise<string>;
  isAvailable(): Promise<boolean>;
  setContext?(context: string): void;
}

export abstract class BaseTranslator implements TranslationEngine {
  abstract name: string;
  protected translationContext?: string;

  setContext(context: string): void {
    this.translationContext = context;
  }

  abstract translate(text: string, sourceLang: string, targetLang: string): Promise<string>;

  abstract isAvailable(): Promise<boolean>;

  protected contextInstructions(): string {
    return this.translationContext
      ? `\n\nAdditional translation context and instructions:\n${this.translationContext}\n`
      : '';
  }

  protected validateResponse(input: string, translation: unknown): string {
    if (typeof translation !== 'string') {
      throw new TranslationServiceError(this.name, `Unexpected response type for "${input}": ${typeof translation}`);
    }
    if (translation.trim() === '') {
      throw new TranslationServiceError(this.name, `Empty translation for "${input}"`);
    }
    return translation;
  }

  protected async wrapErrors<T>(action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof TranslationServiceError) {
        throw error;
      }
      throw new TranslationServiceError(this.name, errorMessage(error), { cause: error });
    }
  }
}

export function buildPrompt(text: string, sourceLang: string, targetLang: string, contextInstructions: string): string {
  return `Translate the following text from the language with code "${sourceLang}" to the language with code "${targetLang}".
Return ONLY a JSON object of the form {"translation": "..."}.
Markers of the form {0}, {1}, ... are placeholders: keep every one of them exactly once and unchanged.
Do not add any explanation or additional text.${contextInstructions}

Text to translate:
${JSON.stringify(text)}`;
}

/** Pulls the translation out of a `{"translation": "..."}` reply, tolerating surrounding chatter. */
export function parseTranslationReply(reply: string): unknown {
  const candidates = [reply.trim()];
  const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/.exec(reply);
  if (fenced) {
    candidates.push(fenced[1]);
  }
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidates.push(reply.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (typeof parsed === 'string') {
        return parsed;
      }
      if (typeof parsed === 'object' && parsed !== null && 'translation' in parsed) {
        return parsed.translation;
      }
    } catch {
      continue;
    }
  }
  throw new Error(`Could not find a translation in the response: ${reply.slice(0, 200)}`);
}
