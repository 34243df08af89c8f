import fetch from 'node-fetch';
import { TranslationServiceError } from '../../src/errors';
import { parseTranslationReply } from '../../src/translators/base';
import { TranslatorFactory } from '../../src/translators/factory';
import { GoogleTranslator, extractSentences } from '../../src/translators/google';
import { OllamaTranslator } from '../../src/translators/ollama';
import { OpenAITranslator } from '../../src/translators/openai';

jest.mock('node-fetch', () => ({ __esModule: true, default: jest.fn() }));

const { Response } = jest.requireActual<typeof import('node-fetch')>('node-fetch');
const mockFetch = jest.mocked(fetch);

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function requestBody(call: number): unknown {
  return JSON.parse(String(mockFetch.mock.calls[call][1]?.body));
}

beforeEach(() => {
  mockFetch.mockReset();
});

describe('GoogleTranslator', () => {
  it('joins the translated sentences', async () => {
    mockFetch.mockResolvedValue(jsonResponse([[['Bonjour ', 'Hello ', null], ['le monde', 'world']], null, 'en']));
    const translator = new GoogleTranslator();

    expect(await translator.translate('Hello world', 'en', 'fr')).toBe('Bonjour le monde');
    expect(mockFetch.mock.calls[0][0]).toBe(
      'https://translate.googleapis.com/translate_a/single?client=gtx&sl=en&tl=fr&dt=t&q=Hello+world',
    );
  });

  it('flags rate limiting', async () => {
    mockFetch.mockResolvedValue(jsonResponse({}, 429));

    const error = await new GoogleTranslator().translate('Hello', 'en', 'fr').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranslationServiceError);
    expect(error).toMatchObject({ status: 429, isRateLimited: true, message: 'Google Translate: API error: 429 rate limit exceeded' });
  });

  it('wraps network failures', async () => {
    mockFetch.mockRejectedValue(new Error('socket hang up'));

    await expect(new GoogleTranslator().translate('Hello', 'en', 'fr')).rejects.toThrow('Google Translate: socket hang up');
  });

  it('rejects an unexpected reply', () => {
    expect(() => extractSentences({ sentences: [] })).toThrow('Unexpected response structure');
    expect(extractSentences([[['a'], [42], ['b']]])).toBe('ab');
  });
});

describe('OpenAITranslator', () => {
  it('sends a chat completion request and reads the JSON reply', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ choices: [{ message: { content: '{"translation": "Bonjour {0}"}' } }] }));
    const translator = new OpenAITranslator('test-key');

    expect(await translator.translate('Hello {0}', 'en', 'fr')).toBe('Bonjour {0}');
    expect(mockFetch.mock.calls[0][0]).toBe('https://api.openai.com/v1/chat/completions');
    expect(mockFetch.mock.calls[0][1]).toMatchObject({ method: 'POST', headers: { Authorization: 'Bearer test-key' } });
    expect(requestBody(0)).toMatchObject({ model: 'gpt-4o-mini', response_format: { type: 'json_object' } });
  });

  it('puts extra context into the prompt', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ choices: [{ message: { content: '{"translation": "Bonjour"}' } }] }));
    const translator = new OpenAITranslator('test-key', 'gpt-4o');
    translator.setContext('Use formal tone');

    await translator.translate('Hello', 'en', 'fr');

    expect(JSON.stringify(requestBody(0))).toContain('Use formal tone');
  });

  it('reports API errors with their status', async () => {
    mockFetch.mockResolvedValue(new Response('bad key', { status: 401 }));

    await expect(new OpenAITranslator('test-key').translate('Hello', 'en', 'fr')).rejects.toMatchObject({
      status: 401,
      message: 'OpenAI: API error: 401 - bad key',
    });
  });

  it('rejects an empty reply', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ choices: [] }));

    await expect(new OpenAITranslator('test-key').translate('Hello', 'en', 'fr')).rejects.toThrow(
      'OpenAI: Response contained no message content',
    );
  });
});

describe('OllamaTranslator', () => {
  it('retries and strips reasoning output', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ error: 'busy' }, 500))
      .mockResolvedValueOnce(jsonResponse({ response: '<think>greeting</think>{"translation": "Hallo"}' }));
    const translator = new OllamaTranslator({ model: 'test-model', maxRetries: 2, retryDelayMs: 0 });

    expect(await translator.translate('Hello', 'en', 'de')).toBe('Hallo');
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(mockFetch.mock.calls[1][0]).toBe('http://localhost:11434/api/generate');
    expect(requestBody(1)).toMatchObject({ model: 'test-model', stream: false, format: 'json' });
  });

  it('gives up after the last attempt', async () => {
    mockFetch.mockResolvedValue(jsonResponse({}, 500));
    const translator = new OllamaTranslator({ maxRetries: 2, retryDelayMs: 0 });

    const error = await translator.translate('Hello', 'en', 'de').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranslationServiceError);
    expect(error).toMatchObject({ status: 500 });
    expect(String(error)).toContain('Translation failed after 2 attempts');
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('is available when the model is installed', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ models: [{ name: 'llama3.1:latest' }] }));
    expect(await new OllamaTranslator().isAvailable()).toBe(true);
    expect(mockFetch.mock.calls[0][0]).toBe('http://localhost:11434/api/tags');
    expect(mockFetch.mock.calls[0][1]?.signal).toBeDefined();

    mockFetch.mockRejectedValue(new Error('ECONNREFUSED'));
    expect(await new OllamaTranslator().isAvailable()).toBe(false);
  });
});

describe('parseTranslationReply', () => {
  it('reads the translation field', () => {
    expect(parseTranslationReply('{"translation": "Hola"}')).toBe('Hola');
  });

  it('accepts a bare JSON string', () => {
    expect(parseTranslationReply('"Hola"')).toBe('Hola');
  });

  it('finds JSON inside a fenced block or surrounding chatter', () => {
    expect(parseTranslationReply('Sure!\n```json\n{"translation": "Hola {0}"}\n```')).toBe('Hola {0}');
    expect(parseTranslationReply('Here you go: {"translation": "Hola"} Enjoy.')).toBe('Hola');
  });

  it('throws when there is no translation', () => {
    expect(() => parseTranslationReply('I cannot help with that.')).toThrow('Could not find a translation in the response');
  });
});

describe('TranslatorFactory', () => {
  const savedEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.GEMINI_API_KEY;
    delete process.env.OPENAI_API_KEY;
  });

  afterAll(() => {
    process.env = savedEnv;
  });

  it('defaults to Google Translate without keys', async () => {
    expect(await TranslatorFactory.create()).toBeInstanceOf(GoogleTranslator);
  });

  it('picks OpenAI when only its key is set', async () => {
    process.env.OPENAI_API_KEY = 'test-key';
    const engine = await TranslatorFactory.create({ openaiModel: 'gpt-4o' });

    expect(engine).toBeInstanceOf(OpenAITranslator);
    expect(engine).toMatchObject({ modelName: 'gpt-4o' });
  });

  it('requires a key for OpenAI', async () => {
    await expect(TranslatorFactory.create({ type: 'openai' })).rejects.toThrow('OpenAI API key not found');
  });

  it('applies the context to the engine', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ choices: [{ message: { content: '{"translation": "Hallo"}' } }] }));
    const engine = await TranslatorFactory.create({ type: 'openai', openaiApiKey: 'test-key', context: 'Gaming UI' });

    await engine.translate('Hello', 'en', 'de');

    expect(JSON.stringify(requestBody(0))).toContain('Gaming UI');
  });

  it('fails when Ollama is not running', async () => {
    mockFetch.mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(TranslatorFactory.create({ type: 'ollama' })).rejects.toThrow('Ollama is not available');
  });

  it('lists the providers that can be used', async () => {
    process.env.GEMINI_API_KEY = 'test-key';
    mockFetch.mockRejectedValue(new Error('ECONNREFUSED'));

    expect(await TranslatorFactory.listAvailableProviders()).toEqual(['google (no key required)', 'gemini (API key found)']);
  });
});
