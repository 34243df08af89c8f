import { TranslationEngine } from './base.js';
import { GeminiTranslator } from './gemini.js';
import { GoogleTranslator } from './google.js';
import { OllamaTranslator } from './ollama.js';
import { OpenAITranslator } from './openai.js';

export const TRANSLATOR_TYPES = ['google', 'gemini', 'openai', 'ollama'] as const;

export type TranslatorType = typeof TRANSLATOR_TYPES[number];

export function isTranslatorType(value: string): value is TranslatorType {
  return TRANSLATOR_TYPES.some(type => type === value);
}

export interface TranslatorConfig {
  type?: TranslatorType;
  geminiApiKey?: string;
  geminiModel?: string;
  ollamaBaseUrl?: string;
  ollamaModel?: string;
  ollamaTimeout?: number;
  openaiApiKey?: string;
  openaiModel?: string;
  context?: string;
  verbose?: boolean;
}

export class TranslatorFactory {
  static async create(config: TranslatorConfig = {}): Promise<TranslationEngine> {
    const engine = await this.instantiate(config);
    if (config.context && engine.setContext) {
      engine.setContext(config.context);
    }
    return engine;
  }

  private static async instantiate(config: TranslatorConfig): Promise<TranslationEngine> {
    const type = config.type || this.detectType(config);

    switch (type) {
      case 'ollama': {
        const ollama = new OllamaTranslator({
          baseUrl: config.ollamaBaseUrl,
          model: config.ollamaModel,
          timeout: config.ollamaTimeout,
          verbose: config.verbose,
        });

        if (await ollama.isAvailable()) {
          return ollama;
        }
        throw new Error(
          `Ollama is not available. Make sure Ollama is running and the model is installed.\n` +
          `Run: ollama pull ${ollama.model}`
        );
      }

      case 'openai': {
        const openaiKey = config.openaiApiKey || process.env.OPENAI_API_KEY;
        if (!openaiKey) {
          throw new Error(
            'OpenAI API key not found. Either:\n' +
            '1. Set OPENAI_API_KEY environment variable\n' +
            '2. Use a different provider (google, gemini or ollama)'
          );
        }
        return new OpenAITranslator(openaiKey, config.openaiModel);
      }

      case 'gemini': {
        const apiKey = config.geminiApiKey || process.env.GEMINI_API_KEY;
        if (!apiKey) {
          throw new Error(
            'Gemini API key not found. Either:\n' +
            '1. Set GEMINI_API_KEY environment variable\n' +
            '2. Use a different provider (google, openai or ollama)'
          );
        }
        return new GeminiTranslator(apiKey, config.geminiModel);
      }

      case 'google':
      default:
        return new GoogleTranslator();
    }
  }

  private static detectType(config: TranslatorConfig): TranslatorType {
    if (config.geminiApiKey || process.env.GEMINI_API_KEY) {
      return 'gemini';
    }
    if (config.openaiApiKey || process.env.OPENAI_API_KEY) {
      return 'openai';
    }
    return 'google';
  }

  static async listAvailableProviders(): Promise<string[]> {
    const available: string[] = ['google (no key required)'];

    if (process.env.GEMINI_API_KEY) {
      available.push('gemini (API key found)');
    }
    if (process.env.OPENAI_API_KEY) {
      available.push('openai (API key found)');
    }

    const ollama = new OllamaTranslator({ baseUrl: process.env.OLLAMA_URL, model: process.env.OLLAMA_MODEL });
    if (await ollama.isAvailable()) {
      available.push('ollama (local)');
    }

    return available;
  }
}
