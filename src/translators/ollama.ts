import fetch from 'node-fetch';
import { TranslationServiceError, errorMessage } from '../errors.js';
import { BaseTranslator, buildPrompt, parseTranslationReply } from './base.js';

export interface OllamaConfig {
  baseUrl?: string;
  model?: string;
  timeout?: number;
  maxRetries?: number;
  /** First backoff step; doubles per attempt, capped at 10s, plus jitter. */
  retryDelayMs?: number;
  verbose?: boolean;
}

interface OllamaGenerateResponse {
  response?: string;
}

interface OllamaTagsResponse {
  models?: Array<{ name: string }>;
}

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'llama3.1:latest';
const LIST_MODELS_TIMEOUT_MS = 5000;

export class OllamaTranslator extends BaseTranslator {
  name = 'Ollama (Local)';
  readonly model: string;
  private baseUrl: string;
  private timeout: number;
  private maxRetries: number;
  private retryDelayMs: number;
  private verbose: boolean;

  constructor(config: OllamaConfig = {}) {
    super();
    this.baseUrl = config.baseUrl || DEFAULT_OLLAMA_URL;
    this.model = config.model || DEFAULT_OLLAMA_MODEL;
    this.timeout = config.timeout || 60000;
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.verbose = config.verbose ?? false;
  }

  async translate(text: string, sourceLang: string, targetLang: string): Promise<string> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.attemptTranslation(text, sourceLang, targetLang);
      } catch (error) {
        lastError = error;
        this.log(`Attempt ${attempt}/${this.maxRetries} failed: ${errorMessage(error)}`);

        if (attempt < this.maxRetries) {
          const baseWaitTime = Math.min(this.retryDelayMs * Math.pow(2, attempt - 1), 10000);
          const waitTime = baseWaitTime + Math.random() * (this.retryDelayMs / 2);
          this.log(`Waiting ${Math.round(waitTime)}ms before retry...`);
          await new Promise(resolve => setTimeout(resolve, waitTime));
        }
      }
    }

    const status = lastError instanceof TranslationServiceError ? lastError.status : undefined;
    throw new TranslationServiceError(
      this.name,
      `Translation failed after ${this.maxRetries} attempts: ${errorMessage(lastError)}`,
      { status, cause: lastError },
    );
  }

  private async attemptTranslation(text: string, sourceLang: string, targetLang: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          prompt: buildPrompt(text, sourceLang, targetLang, this.contextInstructions()),
          stream: false,
          format: 'json',
          options: {
            temperature: 0.1,
          },
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new TranslationServiceError(this.name, `API error: ${response.status} ${response.statusText}`, { status: response.status });
      }

      const data = await response.json() as OllamaGenerateResponse;
      // Reasoning models prepend their chain of thought.
      const responseText = (data.response ?? '').replace(/<think>[\s\S]*?<\/think>/g, '').trim();
      this.log(`Raw response: ${responseText}`);

      return this.validateResponse(text, parseTranslationReply(responseText));
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TranslationServiceError(this.name, `Request timed out after ${this.timeout}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      const models = await this.listModels();
      return models.includes(this.model);
    } catch {
      return false;
    }
  }

  async listModels(): Promise<string[]> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), LIST_MODELS_TIMEOUT_MS);

    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, { signal: controller.signal });
      if (!response.ok) {
        throw new TranslationServiceError(this.name, `Failed to list models: ${response.status}`, { status: response.status });
      }
      const data = await response.json() as OllamaTagsResponse;
      return (data.models || []).map(m => m.name);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private log(message: string): void {
    if (this.verbose) {
      console.error(`[Ollama] ${message}`);
    }
  }
}
