/**
 * Speaking practice - recognize a learner's recording in the target
 * language and compare it with the translation they were given
 */

import type { AudioClip, PortCallOptions, RecognitionPort } from '../interfaces/ports.js';
import {
  LANGUAGE_CODES,
  getLanguage,
  isSupportedLanguage,
  type LanguageCode,
} from '../types/common.js';
import { ValidationError, toPortError } from '../types/errors.js';

export interface PracticeConfig {
  recognition: RecognitionPort;
  languages?: readonly LanguageCode[];
}

export interface PracticeResult {
  targetLanguage: LanguageCode;
  expectedText: string;
  /** '' when no speech was recognized */
  recognizedText: string;
  recognized: boolean;
  match: boolean;
}

function normalize(text: string): string {
  return text
    .normalize('NFC')
    .toLowerCase()
    .replace(/[\p{P}\p{S}]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Case, punctuation and spacing do not count against the speaker
 */
export function matchesExpected(recognizedText: string, expectedText: string): boolean {
  const recognized = normalize(recognizedText);
  return recognized.length > 0 && recognized === normalize(expectedText);
}

export class SpeakingPractice {
  private readonly recognition: RecognitionPort;
  private readonly languages: readonly LanguageCode[];

  constructor(config: PracticeConfig) {
    this.recognition = config.recognition;
    this.languages = LANGUAGE_CODES.filter((code) => (config.languages ?? LANGUAGE_CODES).includes(code));
  }

  /**
   * Rejects with ValidationError for bad input and with PortError when
   * recognition fails
   */
  async check(
    clip: AudioClip,
    targetLanguage: string,
    expectedText: string,
    options: PortCallOptions = {}
  ): Promise<PracticeResult> {
    if (clip.data.length === 0) {
      throw new ValidationError('audio', 'Audio recording must not be empty');
    }
    if (!isSupportedLanguage(targetLanguage) || !this.languages.includes(targetLanguage)) {
      throw new ValidationError(
        'targetLanguage',
        `Unsupported target language "${targetLanguage}". Supported: ${this.languages.join(', ')}`
      );
    }
    if (expectedText.trim().length === 0) {
      throw new ValidationError('expectedText', 'Expected text must not be empty');
    }

    const { locale } = getLanguage(targetLanguage);
    console.log(`[Practice] Recognizing ${clip.data.length} bytes of speech in ${locale}`);

    let recognizedText: string;
    try {
      recognizedText = (await this.recognition.transcribe(clip, targetLanguage, options)).trim();
    } catch (error) {
      const portError = toPortError(error);
      console.error(`[Practice] Speech recognition failed: ${portError.message} (${portError.kind})`);
      throw portError;
    }

    const match = matchesExpected(recognizedText, expectedText);
    console.log(`[Practice] ${recognizedText ? (match ? 'Matched' : 'Did not match') : 'No speech recognized'}`);

    return {
      targetLanguage,
      expectedText,
      recognizedText,
      recognized: recognizedText.length > 0,
      match,
    };
  }
}
