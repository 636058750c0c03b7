import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { LanguageDefinition } from '../../config/languages.js';
import { BadRequestError, ModelMissingError } from '../../types/errors.js';
import { TranslationGateway, type TranslationModel, type TranslationModelLoader } from './TranslationGateway.js';

class FakeLoader implements TranslationModelLoader {
  readonly loaded: string[] = [];

  constructor(private readonly model: TranslationModel = { translate: async (texts) => texts.map((t) => `<${t}>`) }) {}

  async load(language: LanguageDefinition, modelPath: string): Promise<TranslationModel> {
    this.loaded.push(`${language.name}:${path.basename(modelPath)}`);
    await new Promise((resolve) => setTimeout(resolve, 5));
    return this.model;
  }
}

describe('TranslationGateway', () => {
  let modelRoot: string;

  beforeAll(async () => {
    modelRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'models-'));
    await fs.mkdir(path.join(modelRoot, 'Xenova', 'opus-mt-en-es'), { recursive: true });
  });

  afterAll(async () => {
    await fs.rm(modelRoot, { recursive: true, force: true });
  });

  it('returns an empty string for blank input without loading a model', async () => {
    const loader = new FakeLoader();
    const gateway = new TranslationGateway({ modelRoot, loader });

    expect(await gateway.translate('', 'Spanish')).toBe('');
    expect(await gateway.translate('   \n ', 'Spanish')).toBe('');
    expect(gateway.getLoadCount()).toBe(0);
    expect(loader.loaded).toEqual([]);
  });

  it('translates line by line and keeps blank lines', async () => {
    const gateway = new TranslationGateway({ modelRoot, loader: new FakeLoader() });

    expect(await gateway.translate('Take one tablet\n\n  daily  ', 'Spanish')).toBe('<Take one tablet>\n\n<daily>');
  });

  it('loads each language once and shares concurrent first loads', async () => {
    const loader = new FakeLoader();
    const gateway = new TranslationGateway({ modelRoot, loader });

    await Promise.all([
      gateway.translate('one', 'Spanish'),
      gateway.translate('two', 'Spanish'),
      gateway.translate('three', 'Spanish'),
    ]);
    await gateway.translate('four', 'Spanish');

    expect(gateway.getLoadCount()).toBe(1);
    expect(loader.loaded).toEqual(['Spanish:opus-mt-en-es']);
    expect(await gateway.isLoaded('Spanish')).toBe(true);
    expect(await gateway.isLoaded('Hindi')).toBe(false);
  });

  it('raises ModelMissingError when the model directory is absent', async () => {
    const gateway = new TranslationGateway({ modelRoot, loader: new FakeLoader() });

    await expect(gateway.translate('hello', 'Hindi')).rejects.toBeInstanceOf(ModelMissingError);
    await expect(gateway.translate('hello', 'Hindi')).rejects.toThrow('Model missing for Hindi');
    expect(gateway.getLoadCount()).toBe(0);
  });

  it('rejects unsupported languages', async () => {
    const gateway = new TranslationGateway({ modelRoot, loader: new FakeLoader() });
    await expect(gateway.translate('hello', 'Klingon')).rejects.toBeInstanceOf(BadRequestError);
  });

  it('evicts a failed load so the next call tries again', async () => {
    const loader = new FakeLoader();
    const load = vi
      .spyOn(loader, 'load')
      .mockRejectedValueOnce(new Error('corrupt weights'));
    const gateway = new TranslationGateway({ modelRoot, loader });

    await expect(gateway.translate('hello', 'Spanish')).rejects.toThrow('corrupt weights');
    expect(await gateway.translate('hello', 'Spanish')).toBe('<hello>');
    expect(load).toHaveBeenCalledTimes(2);
    expect(gateway.getLoadCount()).toBe(2);
  });

  describe('translateOrError', () => {
    it('labels a missing model as a system error', async () => {
      const gateway = new TranslationGateway({ modelRoot, loader: new FakeLoader() });

      expect(await gateway.translateOrError('hello', 'Hindi')).toBe(
        '[System Error]: Translator not active.\nReason: Model missing for Hindi'
      );
    });

    it('labels runtime failures as errors', async () => {
      const gateway = new TranslationGateway({
        modelRoot,
        loader: new FakeLoader({ translate: async () => Promise.reject(new Error('out of memory')) }),
      });

      expect(await gateway.translateOrError('hello', 'Spanish')).toBe('[Error]: out of memory');
    });
  });
});
