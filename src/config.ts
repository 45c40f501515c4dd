/**
 * Configuration management for the voice translation server
 */

import {
  LANGUAGE_CODES,
  isSpeechVoice,
  isSupportedLanguage,
  type LanguageCode,
  type SpeechVoice,
} from './engine/index.js';

export interface AppConfig {
  // Server
  port: number;

  // AI Provider
  openai: {
    apiKey: string;
    baseUrl?: string;
    timeout: number;
  };

  // Per-port settings
  moderation: {
    model: string;
  };
  translation: {
    model: string;
    temperature: number;
    maxTokens: number;
  };
  speech: {
    model: string;
    voice?: SpeechVoice;
  };
  recognition: {
    model: string;
  };

  // Pipeline
  pipeline: {
    languages: LanguageCode[];
    retry: {
      attempts: number;
      baseDelayMs: number;
      maxDelayMs: number;
    };
    timeoutMs: number;
  };

  /** Entries from the environment that could not be used; reported by validateConfig */
  invalid: {
    languages: string[];
    voice?: string;
  };
}

type Env = Record<string, string | undefined>;

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const requestedLanguages = parseList(env.SUPPORTED_LANGUAGES);
  const languages = requestedLanguages.filter(isSupportedLanguage);
  const voice = env.SPEECH_VOICE?.trim() || undefined;

  return {
    port: parseInt(env.PORT ?? '3000', 10),

    openai: {
      apiKey: env.OPENAI_API_KEY ?? '',
      baseUrl: env.OPENAI_BASE_URL || undefined,
      timeout: parseInt(env.OPENAI_TIMEOUT_MS ?? '30000', 10),
    },

    moderation: {
      model: env.MODERATION_MODEL ?? 'omni-moderation-latest',
    },

    translation: {
      model: env.TRANSLATION_MODEL ?? 'gpt-4o-mini',
      temperature: parseFloat(env.TRANSLATION_TEMPERATURE ?? '0.3'),
      maxTokens: parseInt(env.TRANSLATION_MAX_TOKENS ?? '250', 10),
    },

    speech: {
      model: env.SPEECH_MODEL ?? 'tts-1',
      voice: voice !== undefined && isSpeechVoice(voice) ? voice : undefined,
    },

    recognition: {
      model: env.RECOGNITION_MODEL ?? 'whisper-1',
    },

    pipeline: {
      languages: requestedLanguages.length > 0 ? languages : [...LANGUAGE_CODES],
      retry: {
        attempts: parseInt(env.PORT_RETRY_ATTEMPTS ?? '3', 10),
        baseDelayMs: parseInt(env.PORT_RETRY_BASE_DELAY_MS ?? '500', 10),
        maxDelayMs: parseInt(env.PORT_RETRY_MAX_DELAY_MS ?? '4000', 10),
      },
      timeoutMs: parseInt(env.PORT_TIMEOUT_MS ?? '20000', 10),
    },

    invalid: {
      languages: requestedLanguages.filter((code) => !isSupportedLanguage(code)),
      voice: voice !== undefined && !isSpeechVoice(voice) ? voice : undefined,
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.openai.apiKey) {
    errors.push('OPENAI_API_KEY is required');
  }

  if (Number.isNaN(config.port) || config.port < 0) {
    errors.push('PORT must be a non-negative integer');
  }

  const { temperature } = config.translation;
  if (Number.isNaN(temperature) || temperature < 0 || temperature > 2) {
    errors.push('TRANSLATION_TEMPERATURE must be between 0 and 2');
  }

  if (config.invalid.languages.length > 0) {
    errors.push(`Unknown language codes in SUPPORTED_LANGUAGES: ${config.invalid.languages.join(', ')}`);
  }
  if (config.pipeline.languages.length === 0) {
    errors.push('SUPPORTED_LANGUAGES must name at least one supported language');
  }

  if (config.invalid.voice !== undefined) {
    errors.push(`Unknown SPEECH_VOICE "${config.invalid.voice}"`);
  }

  const { retry, timeoutMs } = config.pipeline;
  if (Number.isNaN(retry.attempts) || retry.attempts < 1) {
    errors.push('PORT_RETRY_ATTEMPTS must be at least 1');
  }
  if (Number.isNaN(retry.baseDelayMs) || retry.baseDelayMs < 0 || Number.isNaN(retry.maxDelayMs) || retry.maxDelayMs < 0) {
    errors.push('Retry delays must not be negative');
  }
  if (Number.isNaN(timeoutMs) || timeoutMs < 0) {
    errors.push('PORT_TIMEOUT_MS must not be negative');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Check if AI provider is configured
 */
export function hasAIProvider(config: AppConfig): boolean {
  return Boolean(config.openai.apiKey);
}
