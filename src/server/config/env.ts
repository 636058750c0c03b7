/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables with defaults.
 * Values are validated once and cached; call resetEnv() after changing
 * process.env in tests.
 */

// Load dotenv early to ensure environment variables are available before validation
import * as dotenv from 'dotenv';
dotenv.config();

import { logger } from '../utils/logger.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return (NODE_ENVS as readonly string[]).includes(value);
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;

  // Logging Configuration
  LOG_LEVEL?: string;

  // Generative text service (Gemini)
  GEMINI_API_KEY?: string;
  GEMINI_MODEL: string;
  GEMINI_FALLBACK_MODEL: string;
  GEMINI_TIMEOUT: number;
  GEMINI_TEMPERATURE: number;

  // Translation models
  TRANSLATION_MODEL_DIR: string;

  // Lexicons
  PRIMARY_LEXICON_PATH: string;
  BACKUP_LEXICON_PATH: string;

  // OCR
  OCR_LANGUAGE: string;
  OCR_LANG_PATH?: string;

  // Scanner defaults
  DEFAULT_TARGET_LANGUAGE: string;
  HIGH_CONTRAST_DEFAULT: boolean;

  // Reports
  REPORT_FONT_DIR: string;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If required validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const geminiTimeout = parseNumericEnv(process.env.GEMINI_TIMEOUT, 60000);
  if (geminiTimeout <= 0) {
    errors.push(`GEMINI_TIMEOUT: Invalid value "${process.env.GEMINI_TIMEOUT}". Must be a positive number of milliseconds.`);
  }

  const geminiTemperature = parseFloatEnv(process.env.GEMINI_TEMPERATURE, 0.75);
  if (geminiTemperature < 0 || geminiTemperature > 2) {
    errors.push(`GEMINI_TEMPERATURE: Invalid value "${process.env.GEMINI_TEMPERATURE}". Must be between 0 and 2.`);
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    const message = `Environment validation failed:\n${errors.join('\n')}`;
    logger.error({ errors }, 'Environment validation failed');
    throw new Error(message);
  }

  if (!process.env.GEMINI_API_KEY && nodeEnv !== 'test') {
    logger.warn('GEMINI_API_KEY not set. AI explanations will be disabled.');
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    LOG_LEVEL: process.env.LOG_LEVEL,

    GEMINI_API_KEY: process.env.GEMINI_API_KEY,
    GEMINI_MODEL: process.env.GEMINI_MODEL || 'gemini-flash-latest',
    GEMINI_FALLBACK_MODEL: process.env.GEMINI_FALLBACK_MODEL || 'gemini-flash-lite-latest',
    GEMINI_TIMEOUT: geminiTimeout,
    GEMINI_TEMPERATURE: geminiTemperature,

    TRANSLATION_MODEL_DIR: process.env.TRANSLATION_MODEL_DIR || 'resources/models',

    PRIMARY_LEXICON_PATH: process.env.PRIMARY_LEXICON_PATH || 'data/medical_glossary.json',
    BACKUP_LEXICON_PATH: process.env.BACKUP_LEXICON_PATH || 'data/codes_glossary.json',

    OCR_LANGUAGE: process.env.OCR_LANGUAGE || 'eng',
    OCR_LANG_PATH: process.env.OCR_LANG_PATH,

    DEFAULT_TARGET_LANGUAGE: process.env.DEFAULT_TARGET_LANGUAGE || 'Spanish',
    HIGH_CONTRAST_DEFAULT: parseBooleanEnv(process.env.HIGH_CONTRAST_DEFAULT, false),

    REPORT_FONT_DIR: process.env.REPORT_FONT_DIR || 'resources/fonts',
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}

