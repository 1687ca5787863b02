/**
 * Gemini AI Service
 * Google Generative AI integration for advisory text, structured insights and image analysis
 */

import { GoogleGenerativeAI, GenerativeModel, Part } from '@google/generative-ai';
import { z } from 'zod';
import { CircuitBreaker } from './circuit-breaker/circuit-breaker.manager';
import { CircuitBreakerConfig, CircuitBreakerStats } from './circuit-breaker/circuit-breaker.types';
import { UpstreamError, UpstreamErrorType, classifyUpstreamError, describeError } from './upstream/upstream.errors';

const PROVIDER = 'Gemini';

export interface GeminiConfig {
  apiKey?: string;
  models: string[];
  timeoutMs: number;
  circuitBreaker?: CircuitBreakerConfig;
}

export interface InlineImage {
  data: string; // base64
  mimeType: string;
}

interface GenerateRequest {
  parts: Array<string | Part>;
  json: boolean;
}

/**
 * Text and JSON generation used by snapshot producers and the chat module
 */
export interface ITextGenerator {
  generateText(prompt: string): Promise<string>;
  generateJson<T>(prompt: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T>;
}

/**
 * Vision analysis used by the detect module
 */
export interface IImageAnalyzer {
  analyzeImage(prompt: string, image: InlineImage): Promise<string>;
}

/**
 * Pull the JSON document out of a model reply that may carry markdown fences
 * or surrounding prose
 */
export function extractJson(text: string): unknown {
  const clean = text
    .trim()
    .replace(/```json\s*/gi, '')
    .replace(/```/g, '')
    .trim();

  const start = clean.search(/[[{]/);
  const end = Math.max(clean.lastIndexOf('}'), clean.lastIndexOf(']'));
  if (start === -1 || end < start) {
    throw new UpstreamError(PROVIDER, UpstreamErrorType.PARSE_ERROR, 'No JSON found in response');
  }

  try {
    return JSON.parse(clean.slice(start, end + 1));
  } catch (error: unknown) {
    throw new UpstreamError(PROVIDER, UpstreamErrorType.PARSE_ERROR, `Invalid JSON in response: ${describeError(error)}`);
  }
}

export class GeminiService implements ITextGenerator, IImageAnalyzer {
  private genAI: GoogleGenerativeAI | null = null;
  private config: GeminiConfig;
  private breaker: CircuitBreaker<[GenerateRequest], string>;

  constructor(config: GeminiConfig) {
    this.config = config;
    if (config.apiKey) {
      this.genAI = new GoogleGenerativeAI(config.apiKey);
    }
    this.breaker = new CircuitBreaker((request: GenerateRequest) => this.executeWithModelFallback(request), {
      name: PROVIDER,
      // Each model attempt carries its own request timeout
      timeout: false,
      ...config.circuitBreaker,
    });
  }

  /**
   * Check if Gemini is available
   */
  isAvailable(): boolean {
    return this.genAI !== null;
  }

  async generateText(prompt: string): Promise<string> {
    const text = await this.generate({ parts: [prompt], json: false });
    return text.trim();
  }

  /**
   * Generate a JSON reply and validate it against a schema
   */
  async generateJson<T>(prompt: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const text = await this.generate({ parts: [prompt], json: true });
    const parsed = schema.safeParse(extractJson(text));
    if (!parsed.success) {
      throw new UpstreamError(PROVIDER, UpstreamErrorType.PARSE_ERROR, `Reply did not match schema: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  /**
   * Ask a vision-capable model about an inline image
   */
  async analyzeImage(prompt: string, image: InlineImage): Promise<string> {
    const text = await this.generate({
      parts: [prompt, { inlineData: { data: image.data, mimeType: image.mimeType } }],
      json: false,
    });
    return text.trim();
  }

  getBreakerStats(): CircuitBreakerStats {
    return this.breaker.getStats();
  }

  shutdown(): void {
    this.breaker.shutdown();
  }

  private async generate(request: GenerateRequest): Promise<string> {
    if (!this.genAI) {
      throw new UpstreamError(PROVIDER, UpstreamErrorType.NOT_CONFIGURED, 'GEMINI_API_KEY not configured');
    }

    let text: string;
    try {
      text = await this.breaker.execute(request);
    } catch (error: unknown) {
      throw classifyUpstreamError(PROVIDER, error);
    }

    if (!text.trim()) {
      throw new UpstreamError(PROVIDER, UpstreamErrorType.EMPTY_RESPONSE, 'Model returned an empty response');
    }
    return text;
  }

  /**
   * Try configured models in order. Only a missing model moves on to the next one;
   * other failures surface immediately and are retried by the next refresh pass.
   */
  private async executeWithModelFallback(request: GenerateRequest): Promise<string> {
    if (!this.genAI) {
      throw new UpstreamError(PROVIDER, UpstreamErrorType.NOT_CONFIGURED, 'Gemini API not initialized');
    }

    let lastError: unknown = null;

    for (const modelName of this.config.models) {
      const cleanModelName = modelName.replace(/^models\//, '');
      const model: GenerativeModel = this.genAI.getGenerativeModel(
        {
          model: cleanModelName,
          generationConfig: request.json ? { responseMimeType: 'application/json' } : undefined,
        },
        { timeout: this.config.timeoutMs }
      );

      try {
        const result = await model.generateContent(request.parts);
        return result.response.text();
      } catch (error: unknown) {
        lastError = error;
        const message = describeError(error);

        if (message.includes('404') || message.includes('not found')) {
          console.log(`❌ Model ${cleanModelName} not available, trying next...`);
          continue;
        }

        throw error;
      }
    }

    throw new UpstreamError(
      PROVIDER,
      UpstreamErrorType.HTTP_ERROR,
      `No configured model answered (tried ${this.config.models.join(', ')}). Last error: ${describeError(lastError)}`
    );
  }
}
