import { describe, it, expect } from 'vitest';
import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { GeminiClient } from './GeminiClient.js';
import { ExternalServiceError } from '../../types/errors.js';
import {
  ServiceConfigurationError,
  ServiceConnectionError,
  ServiceRateLimitError,
} from '../../utils/serviceErrors.js';

interface StubReply {
  status: number;
  data: unknown;
  headers?: Record<string, string>;
}

function stubClient(reply: StubReply, seen: InternalAxiosRequestConfig[] = []) {
  return axios.create({
    baseURL: 'https://gemini.test',
    adapter: async (config) => {
      seen.push(config);
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: reply.headers ?? {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_REQUEST', config, null, response);
      }
      return response;
    },
  });
}

function okBody(...texts: string[]) {
  return { candidates: [{ content: { parts: texts.map((text) => ({ text })) }, finishReason: 'STOP' }] };
}

describe('GeminiClient', () => {
  it('posts the prompt to the model endpoint and joins the reply parts', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = new GeminiClient({ apiKey: 'test-secret', defaultTemperature: 0.5 });
    client.setClient(stubClient({ status: 200, data: okBody('Hola. ', 'Adiós.  ') }, seen));

    const text = await client.generate('Explain fever', { model: 'gemini-flash-latest' });

    expect(text).toBe('Hola. Adiós.');
    expect(seen[0].url).toBe('/v1beta/models/gemini-flash-latest:generateContent');
    expect(seen[0].params).toEqual({ key: 'test-secret' });
    expect(typeof seen[0].data === 'string' ? JSON.parse(seen[0].data) : seen[0].data).toEqual({
      contents: [{ parts: [{ text: 'Explain fever' }] }],
      generationConfig: { temperature: 0.5 },
    });
  });

  it('prefers the temperature passed with the call', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = new GeminiClient({ apiKey: 'test-secret', defaultTemperature: 0.5 });
    client.setClient(stubClient({ status: 200, data: okBody('ok') }, seen));

    await client.generate('p', { model: 'm', temperature: 0.75 });

    const body: unknown = typeof seen[0].data === 'string' ? JSON.parse(seen[0].data) : seen[0].data;
    expect(body).toMatchObject({ generationConfig: { temperature: 0.75 } });
  });

  it('maps 429 to a rate limit error with the retry hint', async () => {
    const client = new GeminiClient({ apiKey: 'test-secret' });
    client.setClient(stubClient({ status: 429, data: {}, headers: { 'retry-after': '7' } }));

    const error = await client.generate('p', { model: 'm' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceRateLimitError);
    expect(error).toMatchObject({ retryAfterSeconds: 7, statusCode: 429 });
  });

  it('carries the API status text for other HTTP failures', async () => {
    const client = new GeminiClient({ apiKey: 'test-secret' });
    client.setClient(
      stubClient({
        status: 404,
        data: { error: { code: 404, message: 'models/m is not found', status: 'NOT_FOUND' } },
      })
    );

    const error = await client.generate('p', { model: 'm' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceConnectionError);
    expect(error).toMatchObject({
      statusCode: 404,
      message: 'Gemini connection failed (HTTP 404): NOT_FOUND: models/m is not found',
    });
  });

  it('rejects a reply without text', async () => {
    const client = new GeminiClient({ apiKey: 'test-secret' });
    client.setClient(stubClient({ status: 200, data: { candidates: [{ finishReason: 'SAFETY' }] } }));

    await expect(client.generate('p', { model: 'm' })).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it('refuses to call without a key', async () => {
    const client = new GeminiClient({ apiKey: undefined });

    expect(client.isConfigured()).toBe(false);
    await expect(client.generate('p', { model: 'm' })).rejects.toBeInstanceOf(ServiceConfigurationError);
  });
});
