/**
 * Google Gemini client
 *
 * Calls the Gemini REST API (`models/<model>:generateContent`) through a
 * pooled axios instance.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { GenerateOptions, GenerativeTextClient } from './GenerativeTextClient.js';
import { createChildLogger } from '../../utils/logger.js';
import { createHttpClient } from '../../config/httpClient.js';
import { ExternalServiceError } from '../../types/errors.js';
import {
  ServiceConfigurationError,
  ServiceConnectionError,
  ServiceRateLimitError,
} from '../../utils/serviceErrors.js';
import { getEnv } from '../../config/env.js';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com';

export interface GeminiClientConfig {
  apiKey?: string;
  timeout?: number;
  defaultTemperature?: number;
}

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
});

const apiErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

const log = createChildLogger({ component: 'GeminiClient' });

function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  const seconds = parseInt(value, 10);
  return isNaN(seconds) || seconds <= 0 ? undefined : seconds;
}

export class GeminiClient implements GenerativeTextClient {
  private readonly config: Required<Omit<GeminiClientConfig, 'apiKey'>> & { apiKey?: string };
  private client: AxiosInstance | null = null;

  constructor(config: GeminiClientConfig = {}) {
    const env = getEnv();

    this.config = {
      apiKey: 'apiKey' in config ? config.apiKey : env.GEMINI_API_KEY,
      timeout: config.timeout ?? env.GEMINI_TIMEOUT,
      defaultTemperature: config.defaultTemperature ?? env.GEMINI_TEMPERATURE,
    };
  }

  isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  private getClient(): AxiosInstance {
    if (!this.client) {
      this.client = createHttpClient({
        baseURL: GEMINI_BASE_URL,
        timeout: this.config.timeout,
        headers: {
          'Content-Type': 'application/json',
        },
      });
    }
    return this.client;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new ServiceConfigurationError('Gemini', ['GEMINI_API_KEY']);
    }

    const { model } = options;
    const temperature = options.temperature ?? this.config.defaultTemperature;

    const requestBody = {
      contents: [{ parts: [{ text: prompt }] }],
      generationConfig: { temperature },
    };

    let data: unknown;
    try {
      const response = await this.getClient().post<unknown>(
        `/v1beta/models/${encodeURIComponent(model)}:generateContent`,
        requestBody,
        { params: { key: apiKey } }
      );
      data = response.data;
    } catch (error) {
      throw this.toServiceError(error, model);
    }

    const parsed = generateContentResponseSchema.safeParse(data);
    const text = parsed.success
      ? (parsed.data.candidates?.[0]?.content?.parts ?? [])
          .map((part) => part.text ?? '')
          .join('')
          .trim()
      : '';

    if (!text) {
      throw new ExternalServiceError('Gemini', 'Empty response from Gemini', {
        reason: 'empty_response',
        model,
        finishReason: parsed.success ? parsed.data.candidates?.[0]?.finishReason : undefined,
      });
    }

    return text;
  }

  private toServiceError(error: unknown, model: string): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      log.error({ model, timeout: this.config.timeout }, 'Gemini API timeout');
      return new ExternalServiceError(
        'Gemini',
        `Gemini API call timed out after ${this.config.timeout}ms. Consider increasing GEMINI_TIMEOUT.`,
        { reason: 'timeout', model, timeout: this.config.timeout }
      );
    }

    const status = error.response?.status;
    if (status === 429) {
      log.warn({ model }, 'Gemini rate limit exceeded');
      return new ServiceRateLimitError('Gemini', parseRetryAfter(error.response?.headers['retry-after']));
    }

    const apiError = apiErrorSchema.safeParse(error.response?.data);
    const detail = apiError.success
      ? [apiError.data.error.status, apiError.data.error.message].filter(Boolean).join(': ')
      : error.message;

    log.error({ model, status, detail }, 'Error calling Gemini API');
    return new ServiceConnectionError('Gemini', status, detail || error.message);
  }

  /**
   * Set HTTP client (for testing)
   */
  setClient(client: AxiosInstance): void {
    this.client = client;
  }
}
