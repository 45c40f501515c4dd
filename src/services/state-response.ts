/**
 * JSON shape of a PipelineState as sent to the UI
 */

import type {
  LanguageCode,
  PipelineErrorKind,
  PipelineStage,
  PipelineState,
} from '../engine/index.js';

export interface StateResponse {
  stage: PipelineStage;
  inputText: string;
  targetLanguage: LanguageCode;
  moderation: { flagged: boolean; categories: string[] } | null;
  translatedText: string | null;
  audio: { mimeType: 'audio/mpeg'; base64: string } | null;
  error: { kind: PipelineErrorKind; message: string } | null;
}

export function serializeState(state: PipelineState): StateResponse {
  return {
    stage: state.stage,
    inputText: state.inputText,
    targetLanguage: state.targetLanguage,
    moderation: state.moderationResult
      ? { flagged: state.moderationResult.flagged, categories: [...state.moderationResult.categories] }
      : null,
    translatedText: state.translatedText ?? null,
    audio: state.audioData
      ? { mimeType: 'audio/mpeg', base64: state.audioData.toString('base64') }
      : null,
    error: state.error ? { kind: state.error.kind, message: state.error.message } : null,
  };
}
