import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  type GenerationConfig,
  type GenerativeModel,
} from '@google/generative-ai';
import { ProviderError } from '@taskpilot/shared-types';

/**
 * Options for a single completion
 */
export interface GenerateOptions {
  /** Ask the model for a JSON document */
  json?: boolean;
  /** System instruction sent alongside the prompt */
  systemInstruction?: string;
  /** Aborts the request (turn budget) */
  signal?: AbortSignal;
}

/**
 * Completion endpoint used by the parser, the intelligence helpers and the
 * agent loop. Implementations throw ProviderError on failure.
 */
export interface LLMClient {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

/**
 * Gemini AI Client Configuration
 */
export interface GeminiClientConfig {
  /** Google AI API key */
  apiKey: string;
  /** Model to use (default: gemini-2.0-flash) */
  model?: string;
  /** Per-request timeout in milliseconds (default: 20000) */
  timeoutMs?: number;
}

const TRANSIENT_MESSAGE = /timeout|timed out|abort|fetch failed|ECONNRESET|ETIMEDOUT|socket hang up|network/i;

/**
 * Map anything the SDK throws to a ProviderError. Rate limits, 5xx and
 * network/timeout failures are transient.
 */
export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  if (error instanceof GoogleGenerativeAIFetchError) {
    const status = error.status;
    const transient = status === undefined || status === 429 || status >= 500;
    return new ProviderError(`Gemini request failed: ${error.message}`, {
      transient,
      status,
      cause: error,
    });
  }
  if (error instanceof Error) {
    return new ProviderError(`Gemini request failed: ${error.message}`, {
      transient: TRANSIENT_MESSAGE.test(error.message) || error.name === 'AbortError',
      cause: error,
    });
  }
  return new ProviderError('Gemini request failed', { transient: false, cause: error });
}

/**
 * Gemini AI Client
 *
 * Wrapper around Google's Generative AI SDK. One attempt per call; retries
 * belong to the caller (see retry.ts).
 */
export class GeminiClient implements LLMClient {
  private client: GoogleGenerativeAI;
  private model: GenerativeModel;
  private modelName: string;
  private timeoutMs: number;
  private generationConfig: GenerationConfig = {
    temperature: 0.2,
    topP: 0.9,
    topK: 40,
    maxOutputTokens: 2048,
  };

  constructor(config: GeminiClientConfig) {
    this.client = new GoogleGenerativeAI(config.apiKey);
    this.modelName = config.model ?? 'gemini-2.0-flash';
    this.timeoutMs = config.timeoutMs ?? 20_000;

    this.model = this.client.getGenerativeModel({
      model: this.modelName,
      generationConfig: this.generationConfig,
    });
  }

  /**
   * Generate content with the configured model
   *
   * @throws ProviderError
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    try {
      const result = await this.model.generateContent(
        {
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          ...(options.systemInstruction ? { systemInstruction: options.systemInstruction } : {}),
          generationConfig: {
            ...this.generationConfig,
            responseMimeType: options.json ? 'application/json' : 'text/plain',
          },
        },
        { timeout: this.timeoutMs, signal: options.signal }
      );
      return result.response.text();
    } catch (error) {
      throw toProviderError(error);
    }
  }

  /**
   * Get the model name being used
   */
  getModelName(): string {
    return this.modelName;
  }
}

/**
 * Create Gemini client from environment variables
 */
export function createGeminiClient(overrides: Partial<GeminiClientConfig> = {}): GeminiClient {
  const apiKey = overrides.apiKey ?? process.env['GOOGLE_AI_API_KEY'];

  if (!apiKey) {
    throw new Error('Missing GOOGLE_AI_API_KEY environment variable');
  }

  return new GeminiClient({ ...overrides, apiKey });
}

/**
 * Strip markdown code fences and parse JSON
 */
export function parseJsonText(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  const cleaned = text
    .trim()
    .replace(/^```json\s*/i, '')
    .replace(/^```\s*/i, '')
    .replace(/\s*```$/i, '')
    .trim();

  try {
    const value: unknown = JSON.parse(cleaned);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : 'Invalid JSON' };
  }
}
