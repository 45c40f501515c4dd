/**
 * Port interfaces - abstractions over the external AI services
 *
 * Implementations reject with PortError on failure. Anything else they
 * reject with is normalized to an UNKNOWN PortError by the pipeline.
 */

import type { LanguageCode } from '../types/common.js';
import type { ModerationResult } from '../types/pipeline.js';

export interface PortCallOptions {
  /** Aborting it cancels the underlying request */
  signal?: AbortSignal;
}

export interface ModerationPort {
  evaluate(text: string, options?: PortCallOptions): Promise<ModerationResult>;
}

export interface TranslationPort {
  translate(text: string, targetLanguage: LanguageCode, options?: PortCallOptions): Promise<string>;
}

export interface SpeechPort {
  /**
   * Returns encoded audio bytes (mp3 for the bundled adapter)
   */
  synthesize(text: string, targetLanguage: LanguageCode, options?: PortCallOptions): Promise<Buffer>;
}

export interface AudioClip {
  data: Buffer;
  /** Original file name; its extension tells the recognizer the format */
  filename: string;
}

export interface RecognitionPort {
  /**
   * Speech to text in the given language. Resolves to '' when no speech was heard.
   */
  transcribe(clip: AudioClip, language: LanguageCode, options?: PortCallOptions): Promise<string>;
}

export interface PipelinePorts {
  moderation: ModerationPort;
  translation: TranslationPort;
  speech: SpeechPort;
}

export interface PortProviderConfig {
  apiKey: string;
  baseUrl?: string;
  timeout?: number;
  maxRetries?: number;
}
