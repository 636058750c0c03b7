/**
 * Supported target languages.
 *
 * Every source document is English; each target language maps to a local
 * MarianMT model directory. Adding a language means adding an entry here and
 * placing the model files under TRANSLATION_MODEL_DIR.
 */

export interface LanguageDefinition {
  name: string;
  isoCode: string;
  /** Model id, also the directory path below the model root */
  modelId: string;
  /** Needs a non-Latin font when rendering reports */
  script: 'latin' | 'devanagari';
}

export const SUPPORTED_LANGUAGES = {
  Spanish: {
    name: 'Spanish',
    isoCode: 'es',
    modelId: 'Xenova/opus-mt-en-es',
    script: 'latin',
  },
  Hindi: {
    name: 'Hindi',
    isoCode: 'hi',
    modelId: 'Xenova/opus-mt-en-hi',
    script: 'devanagari',
  },
} as const satisfies Record<string, LanguageDefinition>;

export type TargetLanguage = keyof typeof SUPPORTED_LANGUAGES;

export function isSupportedLanguage(value: string): value is TargetLanguage {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_LANGUAGES, value);
}

export function getLanguage(value: string): LanguageDefinition | undefined {
  return isSupportedLanguage(value) ? SUPPORTED_LANGUAGES[value] : undefined;
}

export function listLanguages(): LanguageDefinition[] {
  return Object.values(SUPPORTED_LANGUAGES);
}
