/**
 * Common types used across the voice pipeline
 */

export type LanguageCode =
  | 'es'  // Spanish
  | 'fr'  // French
  | 'it'  // Italian
  | 'de'  // German
  | 'ja'; // Japanese

/** Voices accepted by the speech endpoint */
export type SpeechVoice = 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';

export interface LanguageProfile {
  code: LanguageCode;
  name: string;      // Used in the translator prompt
  locale: string;
  voice: SpeechVoice;
}

export const SUPPORTED_LANGUAGES: Readonly<Record<LanguageCode, LanguageProfile>> = {
  es: { code: 'es', name: 'Spanish', locale: 'es-ES', voice: 'onyx' },
  fr: { code: 'fr', name: 'French', locale: 'fr-FR', voice: 'echo' },
  it: { code: 'it', name: 'Italian', locale: 'it-IT', voice: 'fable' },
  de: { code: 'de', name: 'German', locale: 'de-DE', voice: 'onyx' },
  ja: { code: 'ja', name: 'Japanese', locale: 'ja-JP', voice: 'alloy' },
};

export const LANGUAGE_CODES: readonly LanguageCode[] = ['es', 'fr', 'it', 'de', 'ja'];

const SPEECH_VOICES: readonly SpeechVoice[] = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'];

export function isSupportedLanguage(value: string): value is LanguageCode {
  return LANGUAGE_CODES.some((code) => code === value);
}

export function isSpeechVoice(value: string): value is SpeechVoice {
  return SPEECH_VOICES.some((voice) => voice === value);
}

export function getLanguage(code: LanguageCode): LanguageProfile {
  return SUPPORTED_LANGUAGES[code];
}
