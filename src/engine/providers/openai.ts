/**
 * OpenAI port adapters: moderation, chat translation, speech and transcription
 */

import OpenAI, { toFile } from 'openai';
import type {
  AudioClip,
  ModerationPort,
  PortCallOptions,
  PortProviderConfig,
  RecognitionPort,
  SpeechPort,
  TranslationPort,
} from '../interfaces/ports.js';
import { getLanguage, type LanguageCode, type SpeechVoice } from '../types/common.js';
import { PortError, type PortErrorKind } from '../types/errors.js';
import type { ModerationResult } from '../types/pipeline.js';
import { createTranslatorSystemPrompt } from '../prompts/system/translator.js';

export function createOpenAIClient(config: PortProviderConfig): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    timeout: config.timeout ?? 30000,
    maxRetries: config.maxRetries ?? 0,
  });
}

/**
 * Map an SDK failure onto a PortError kind
 */
export function toOpenAIPortError(error: unknown, operation: string): PortError {
  if (error instanceof PortError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  let kind: PortErrorKind = 'UNKNOWN';

  // Timeout extends connection error, which extends APIError: most specific first
  if (error instanceof OpenAI.APIUserAbortError) {
    kind = 'UNKNOWN';
  } else if (error instanceof OpenAI.APIConnectionTimeoutError) {
    kind = 'TIMEOUT';
  } else if (error instanceof OpenAI.APIConnectionError) {
    kind = 'UNAVAILABLE';
  } else if (error instanceof OpenAI.APIError) {
    kind = kindForStatus(error.status);
  }

  return new PortError(kind, `${operation}: ${message}`, { cause: error });
}

async function callOpenAI<T>(
  operation: string,
  options: PortCallOptions,
  call: () => Promise<T>
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    // Whoever aborted already knows why; keep their reason
    if (options.signal?.aborted && options.signal.reason instanceof PortError) {
      throw options.signal.reason;
    }
    console.error(`[OpenAI] ${operation}:`, error);
    throw toOpenAIPortError(error, operation);
  }
}

function kindForStatus(status: number | undefined): PortErrorKind {
  if (status === undefined) {
    return 'UNAVAILABLE';
  }
  switch (status) {
    case 408:
      return 'TIMEOUT';
    case 429:
      return 'RATE_LIMITED';
    case 400:
    case 413:
    case 422:
      return 'INVALID_INPUT';
    default:
      return status >= 500 ? 'UNAVAILABLE' : 'UNKNOWN';
  }
}

export interface OpenAIModerationOptions {
  model?: string;
}

export class OpenAIModerationPort implements ModerationPort {
  readonly name = 'openai-moderation';
  readonly model: string;

  constructor(private readonly client: OpenAI, options: OpenAIModerationOptions = {}) {
    this.model = options.model ?? 'omni-moderation-latest';
  }

  async evaluate(text: string, options: PortCallOptions = {}): Promise<ModerationResult> {
    const response = await callOpenAI('Moderation request failed', options, () =>
      this.client.moderations.create({ model: this.model, input: text }, { signal: options.signal })
    );

    const result = response.results[0];
    if (!result) {
      throw new PortError('UNKNOWN', 'Moderation response contained no results');
    }

    const categories = Object.entries(result.categories)
      .filter(([, flagged]) => flagged === true)
      .map(([category]) => category)
      .sort();

    return { flagged: result.flagged, categories };
  }
}

export interface OpenAITranslationOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAITranslationPort implements TranslationPort {
  readonly name = 'openai-translation';
  readonly model: string;

  private temperature: number;
  private maxTokens: number;

  constructor(private readonly client: OpenAI, options: OpenAITranslationOptions = {}) {
    this.model = options.model ?? 'gpt-4o-mini';
    this.temperature = options.temperature ?? 0.3; // Lower for more deterministic translation
    this.maxTokens = options.maxTokens ?? 250;
  }

  async translate(
    text: string,
    targetLanguage: LanguageCode,
    options: PortCallOptions = {}
  ): Promise<string> {
    const language = getLanguage(targetLanguage);

    const response = await callOpenAI('Translation request failed', options, () =>
      this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: createTranslatorSystemPrompt(language) },
            { role: 'user', content: text },
          ],
          temperature: this.temperature,
          max_tokens: this.maxTokens,
        },
        { signal: options.signal }
      )
    );

    const content = response.choices[0]?.message.content?.trim() ?? '';
    if (content.length === 0) {
      throw new PortError('UNKNOWN', 'Translation response was empty');
    }

    return content;
  }
}

export interface OpenAISpeechOptions {
  model?: string;
  /** Overrides the per-language voice */
  voice?: SpeechVoice;
}

export class OpenAISpeechPort implements SpeechPort {
  readonly name = 'openai-speech';
  readonly model: string;

  private voice?: SpeechVoice;

  constructor(private readonly client: OpenAI, options: OpenAISpeechOptions = {}) {
    this.model = options.model ?? 'tts-1';
    this.voice = options.voice;
  }

  async synthesize(
    text: string,
    targetLanguage: LanguageCode,
    options: PortCallOptions = {}
  ): Promise<Buffer> {
    const voice = this.voice ?? getLanguage(targetLanguage).voice;

    const audio = await callOpenAI('Speech request failed', options, async () => {
      const response = await this.client.audio.speech.create(
        {
          model: this.model,
          voice,
          input: text,
          response_format: 'mp3',
        },
        { signal: options.signal }
      );
      return Buffer.from(await response.arrayBuffer());
    });

    if (audio.length === 0) {
      throw new PortError('UNKNOWN', 'Speech response contained no audio');
    }

    return audio;
  }
}

export interface OpenAIRecognitionOptions {
  model?: string;
}

export class OpenAIRecognitionPort implements RecognitionPort {
  readonly name = 'openai-recognition';
  readonly model: string;

  constructor(private readonly client: OpenAI, options: OpenAIRecognitionOptions = {}) {
    this.model = options.model ?? 'whisper-1';
  }

  async transcribe(
    clip: AudioClip,
    language: LanguageCode,
    options: PortCallOptions = {}
  ): Promise<string> {
    if (clip.data.length === 0) {
      throw new PortError('INVALID_INPUT', 'Audio clip is empty');
    }

    const transcription = await callOpenAI('Recognition request failed', options, async () =>
      this.client.audio.transcriptions.create(
        {
          file: await toFile(clip.data, clip.filename),
          model: this.model,
          language,
        },
        { signal: options.signal }
      )
    );

    return transcription.text.trim();
  }
}
