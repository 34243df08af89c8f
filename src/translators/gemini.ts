import { GoogleGenerativeAI, HarmCategory, HarmBlockThreshold } from '@google/generative-ai';
import { TranslationServiceError, errorMessage } from '../errors.js';
import { BaseTranslator, buildPrompt, parseTranslationReply } from './base.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-1.5-flash';

export class GeminiTranslator extends BaseTranslator {
  name = 'Google Gemini';
  readonly modelName: string;
  private genAI: GoogleGenerativeAI;

  constructor(apiKey: string, modelName: string = DEFAULT_GEMINI_MODEL) {
    super();
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.modelName = modelName;
  }

  async translate(text: string, sourceLang: string, targetLang: string): Promise<string> {
    const model = this.genAI.getGenerativeModel({
      model: this.modelName,
      generationConfig: {
        temperature: 0.1,
        topK: 1,
        topP: 0.8,
        maxOutputTokens: 4096,
        responseMimeType: 'application/json',
      },
      safetySettings: [
        {
          category: HarmCategory.HARM_CATEGORY_HARASSMENT,
          threshold: HarmBlockThreshold.BLOCK_NONE,
        },
        {
          category: HarmCategory.HARM_CATEGORY_HATE_SPEECH,
          threshold: HarmBlockThreshold.BLOCK_NONE,
        },
        {
          category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
          threshold: HarmBlockThreshold.BLOCK_NONE,
        },
        {
          category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
          threshold: HarmBlockThreshold.BLOCK_NONE,
        },
      ],
    });

    const prompt = buildPrompt(text, sourceLang, targetLang, this.contextInstructions());

    let responseText: string;
    try {
      const result = await model.generateContent({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
      });
      responseText = result.response.text();
    } catch (error) {
      // The SDK's fetch errors carry the HTTP status (429 on quota exhaustion).
      const status = typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
        ? error.status
        : undefined;
      throw new TranslationServiceError(this.name, errorMessage(error), { status, cause: error });
    }

    return this.wrapErrors(async () => this.validateResponse(text, parseTranslationReply(responseText)));
  }

  async isAvailable(): Promise<boolean> {
    return !!process.env.GEMINI_API_KEY;
  }
}
