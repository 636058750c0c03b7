import { describe, it, expect } from 'vitest';
import type { GenerateOptions, GenerativeTextClient } from './GenerativeTextClient.js';
import { CLIENT_NOT_ACTIVE_MESSAGE, ExplanationGateway, type StateTransition } from './ExplanationGateway.js';
import { CONTEXT_EXCERPT_LENGTH, buildExplanationPrompt } from './explanationPrompt.js';
import { ServiceConnectionError, ServiceRateLimitError } from '../../utils/serviceErrors.js';
import type { Sleeper } from '../../utils/retry.js';

type Reply = string | Error;

class ScriptedClient implements GenerativeTextClient {
  readonly calls: Array<{ prompt: string; options: GenerateOptions }> = [];

  constructor(private readonly replies: Reply[], private readonly configured = true) {}

  isConfigured(): boolean {
    return this.configured;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    this.calls.push({ prompt, options });
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('no scripted reply');
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

class RecordingSleeper implements Sleeper {
  readonly slept: number[] = [];

  async sleep(ms: number): Promise<void> {
    this.slept.push(ms);
  }
}

const request = {
  term: 'Hypertension',
  localDefinition: 'High blood pressure',
  documentContext: 'Patient has hypertension.',
  targetLanguage: 'Spanish',
};

function createGateway(client: ScriptedClient, transitions: StateTransition[] = []) {
  const sleeper = new RecordingSleeper();
  const gateway = new ExplanationGateway(client, {
    primaryModel: 'primary-model',
    fallbackModel: 'fallback-model',
    temperature: 0.75,
    backoff: { delayFor: (attempt) => 2 ** attempt * 1000 + 250 },
    sleeper,
    onTransition: (transition) => transitions.push(transition),
  });
  return { gateway, sleeper };
}

describe('ExplanationGateway', () => {
  it('returns the primary answer on the first try', async () => {
    const client = new ScriptedClient(['Es presión alta.']);
    const transitions: StateTransition[] = [];
    const { gateway, sleeper } = createGateway(client, transitions);

    const outcome = await gateway.explainDetailed(request);

    expect(outcome).toEqual({ state: 'Succeeded', text: 'Es presión alta.', attempts: 1, waits: [], usedFallback: false });
    expect(client.calls[0].options).toEqual({ model: 'primary-model', temperature: 0.75 });
    expect(sleeper.slept).toEqual([]);
    expect(transitions.map((t) => t.to)).toEqual(['Requesting', 'Succeeded']);
  });

  it('retries transient failures with growing waits', async () => {
    const client = new ScriptedClient([new ServiceRateLimitError('Gemini'), 'Second time lucky']);
    const { gateway, sleeper } = createGateway(client);

    const outcome = await gateway.explainDetailed(request);

    expect(outcome.state).toBe('Succeeded');
    expect(outcome.text).toBe('Second time lucky');
    expect(outcome.attempts).toBe(2);
    expect(sleeper.slept).toEqual([1250]);
  });

  it('waits twice and skips the fallback when the third try succeeds', async () => {
    const client = new ScriptedClient([new Error('503 UNAVAILABLE'), new ServiceRateLimitError('Gemini'), 'Third time']);
    const { gateway, sleeper } = createGateway(client);

    const outcome = await gateway.explainDetailed(request);

    expect(outcome).toEqual({
      state: 'Succeeded',
      text: 'Third time',
      attempts: 3,
      waits: [1250, 2250],
      usedFallback: false,
    });
    expect(sleeper.slept).toEqual([1250, 2250]);
    expect(client.calls.map((call) => call.options.model)).toEqual(['primary-model', 'primary-model', 'primary-model']);
  });

  it('waits after every transient failure and then asks the fallback model', async () => {
    const busy = () => new Error('503 UNAVAILABLE');
    const client = new ScriptedClient([busy(), busy(), busy(), 'Fallback answer']);
    const transitions: StateTransition[] = [];
    const { gateway, sleeper } = createGateway(client, transitions);

    const outcome = await gateway.explainDetailed(request);

    expect(outcome).toEqual({
      state: 'Succeeded',
      text: 'Fallback answer',
      attempts: 4,
      waits: [1250, 2250, 4250],
      usedFallback: true,
    });
    expect(sleeper.slept).toEqual([1250, 2250, 4250]);
    expect(client.calls.map((call) => call.options.model)).toEqual([
      'primary-model',
      'primary-model',
      'primary-model',
      'fallback-model',
    ]);
    expect(transitions.map((t) => t.to)).toEqual([
      'Requesting',
      'RetryWait',
      'Requesting',
      'RetryWait',
      'Requesting',
      'RetryWait',
      'Fallback',
      'Succeeded',
    ]);
  });

  it('reports a system error when the fallback model also fails', async () => {
    const busy = () => new Error('429 RESOURCE_EXHAUSTED');
    const client = new ScriptedClient([busy(), busy(), busy(), new Error('quota gone')]);
    const { gateway } = createGateway(client);

    expect(await gateway.explain('Fever', 'High temperature', '', 'Hindi')).toBe(
      'System Error: All AI models failed. quota gone'
    );
  });

  it('goes straight to the fallback model when the primary model is not found', async () => {
    const client = new ScriptedClient([new ServiceConnectionError('Gemini', 404, 'NOT_FOUND: no such model'), 'From fallback']);
    const transitions: StateTransition[] = [];
    const { gateway, sleeper } = createGateway(client, transitions);

    const outcome = await gateway.explainDetailed(request);

    expect(outcome).toEqual({ state: 'Succeeded', text: 'From fallback', attempts: 2, waits: [], usedFallback: true });
    expect(sleeper.slept).toEqual([]);
    expect(transitions).toEqual([
      { from: 'Idle', to: 'Requesting', attempt: 0 },
      { from: 'Requesting', to: 'Fallback', attempt: 0 },
      { from: 'Fallback', to: 'Succeeded', attempt: 0 },
    ]);
  });

  it('gives up immediately on other errors', async () => {
    const client = new ScriptedClient([new Error('API key not valid')]);
    const { gateway, sleeper } = createGateway(client);

    const outcome = await gateway.explainDetailed(request);

    expect(outcome).toEqual({
      state: 'Failed',
      text: 'Error connecting to AI: API key not valid',
      attempts: 1,
      waits: [],
      usedFallback: false,
    });
    expect(sleeper.slept).toEqual([]);
  });

  it('does not call the service when no key is configured', async () => {
    const client = new ScriptedClient(['unused'], false);
    const { gateway } = createGateway(client);

    expect(await gateway.explain('Fever', 'High temperature', 'ctx', 'Spanish')).toBe(CLIENT_NOT_ACTIVE_MESSAGE);
    expect(client.calls).toEqual([]);
  });

  it('resolves to a failure when waiting between tries fails', async () => {
    const client = new ScriptedClient([new ServiceRateLimitError('Gemini'), 'unused']);
    const gateway = new ExplanationGateway(client, {
      primaryModel: 'primary-model',
      fallbackModel: 'fallback-model',
      backoff: { delayFor: () => 1250 },
      sleeper: { sleep: () => Promise.reject(new Error('timer unavailable')) },
    });

    const outcome = await gateway.explainDetailed(request);

    expect(outcome).toEqual({
      state: 'Failed',
      text: 'Error connecting to AI: timer unavailable',
      attempts: 1,
      waits: [1250],
      usedFallback: false,
    });
    expect(client.calls).toHaveLength(1);
  });

  it('resolves to a failure when the client check throws', async () => {
    const client: GenerativeTextClient = {
      isConfigured: () => {
        throw new Error('key store locked');
      },
      generate: async () => 'unused',
    };
    const gateway = new ExplanationGateway(client, { primaryModel: 'primary-model', fallbackModel: 'fallback-model' });

    await expect(gateway.explain('Fever', 'def', 'ctx', 'Spanish')).resolves.toBe('Error connecting to AI: key store locked');
  });

  it('keeps working when a transition listener throws', async () => {
    const client = new ScriptedClient(['ok']);
    const gateway = new ExplanationGateway(client, {
      primaryModel: 'primary-model',
      onTransition: () => {
        throw new Error('listener broke');
      },
    });

    expect(await gateway.explain('Fever', 'def', 'ctx', 'Spanish')).toBe('ok');
  });
});

describe('buildExplanationPrompt', () => {
  it('includes the term, definition and language sections', () => {
    const prompt = buildExplanationPrompt(request);

    expect(prompt).toContain('TASK: Explain the term "Hypertension" to the patient.');
    expect(prompt).toContain('- Technical Definition: "High blood pressure"');
    expect(prompt).toContain('### Spanish Explanation');
    expect(prompt).toContain('### English Explanation');
  });

  it('cuts the document excerpt to the context length', () => {
    const context = 'a'.repeat(CONTEXT_EXCERPT_LENGTH) + 'TAIL';
    const prompt = buildExplanationPrompt({ ...request, documentContext: context });

    expect(prompt).toContain(`- Document Excerpt: "${'a'.repeat(CONTEXT_EXCERPT_LENGTH)}"`);
    expect(prompt).not.toContain('TAIL');
  });
});
