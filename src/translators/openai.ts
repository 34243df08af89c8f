import fetch from 'node-fetch';
import { TranslationServiceError } from '../errors.js';
import { BaseTranslator, buildPrompt, parseTranslationReply } from './base.js';

interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

interface OpenAIResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

export class OpenAITranslator extends BaseTranslator {
  name = 'OpenAI';
  readonly modelName: string;
  private apiKey: string;
  private baseUrl: string;

  constructor(apiKey: string, modelName: string = DEFAULT_OPENAI_MODEL, baseUrl: string = 'https://api.openai.com/v1') {
    super();
    this.apiKey = apiKey;
    this.modelName = modelName;
    this.baseUrl = baseUrl;
  }

  async translate(text: string, sourceLang: string, targetLang: string): Promise<string> {
    const messages: OpenAIMessage[] = [
      {
        role: 'system',
        content: 'You are a professional software localization translator.',
      },
      {
        role: 'user',
        content: buildPrompt(text, sourceLang, targetLang, this.contextInstructions()),
      },
    ];

    return this.wrapErrors(async () => {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.modelName,
          messages,
          temperature: 0.1,
          top_p: 0.8,
          response_format: { type: 'json_object' },
        }),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new TranslationServiceError(this.name, `API error: ${response.status} - ${body}`, { status: response.status });
      }

      const data = await response.json() as OpenAIResponse;
      const content = data.choices?.[0]?.message?.content;
      if (!content) {
        throw new TranslationServiceError(this.name, 'Response contained no message content');
      }

      return this.validateResponse(text, parseTranslationReply(content));
    });
  }

  async isAvailable(): Promise<boolean> {
    return !!process.env.OPENAI_API_KEY;
  }
}
