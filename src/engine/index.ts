/**
 * Voice Engine - moderated translation with speech output
 *
 * 3-stage pipeline:
 * 1. Moderate: Gate unsafe input
 * 2. Translate: English into the target language
 * 3. Synthesize: Voice the translation
 *
 * @module voice-engine
 */

// Types
export type { LanguageCode, LanguageProfile, SpeechVoice } from './types/common.js';
export {
  SUPPORTED_LANGUAGES,
  LANGUAGE_CODES,
  isSupportedLanguage,
  isSpeechVoice,
  getLanguage,
} from './types/common.js';
export type {
  PipelineStage,
  TerminalStage,
  ModerationResult,
  PipelineState,
  RunOptions,
  StreamOptions,
} from './types/pipeline.js';
export { STAGE_ORDER, TERMINAL_STAGES, isTerminalStage } from './types/pipeline.js';
export type {
  PortErrorKind,
  PipelineErrorKind,
  PortFailure,
  PipelineError,
  ValidationField,
} from './types/errors.js';
export { PortError, ValidationError, toPortError, createPipelineError } from './types/errors.js';

// Interfaces
export type {
  ModerationPort,
  TranslationPort,
  SpeechPort,
  RecognitionPort,
  AudioClip,
  PortCallOptions,
  PipelinePorts,
  PortProviderConfig,
} from './interfaces/ports.js';

// Providers
export {
  createOpenAIClient,
  toOpenAIPortError,
  OpenAIModerationPort,
  OpenAITranslationPort,
  OpenAISpeechPort,
  OpenAIRecognitionPort,
  type OpenAIModerationOptions,
  type OpenAITranslationOptions,
  type OpenAISpeechOptions,
  type OpenAIRecognitionOptions,
} from './providers/openai.js';
export {
  withRetry,
  withTimeout,
  withResilience,
  withResilientRecognition,
  isRetryable,
  attemptLimit,
  retryDelay,
  type PortCall,
  type RetryPolicy,
  type ResiliencePolicy,
} from './providers/resilience.js';

// Pipeline
export { VoicePipeline, type PipelineConfig } from './pipeline/voice-pipeline.js';
export { PipelineStateMachine } from './pipeline/pipeline-state.js';

// Practice
export {
  SpeakingPractice,
  matchesExpected,
  type PracticeConfig,
  type PracticeResult,
} from './practice/speaking-practice.js';

// Prompts
export { createTranslatorSystemPrompt } from './prompts/system/translator.js';
