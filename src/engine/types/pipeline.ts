/**
 * Voice pipeline types
 */

import type { LanguageCode } from './common.js';
import type { PipelineError } from './errors.js';

export type PipelineStage =
  | 'init'
  | 'moderating'
  | 'moderated'
  | 'translating'
  | 'translated'
  | 'synthesizing'
  | 'done'
  | 'blocked'
  | 'failed';

export type TerminalStage = Extract<PipelineStage, 'done' | 'blocked' | 'failed'>;

/** Forward order of the non-failure stages; 'blocked' sits beside 'moderated' */
export const STAGE_ORDER: readonly PipelineStage[] = [
  'init',
  'moderating',
  'moderated',
  'translating',
  'translated',
  'synthesizing',
  'done',
];

export const TERMINAL_STAGES: readonly TerminalStage[] = ['done', 'blocked', 'failed'];

export function isTerminalStage(stage: PipelineStage): stage is TerminalStage {
  return TERMINAL_STAGES.some((terminal) => terminal === stage);
}

export interface ModerationResult {
  flagged: boolean;
  categories: string[]; // unique, sorted
}

/**
 * The record threaded through one pipeline run.
 * Callers must branch on `stage` before reading the optional fields.
 */
export interface PipelineState {
  readonly inputText: string;
  readonly targetLanguage: LanguageCode;
  stage: PipelineStage;
  moderationResult?: ModerationResult;
  translatedText?: string;
  audioData?: Buffer;
  error?: PipelineError;
}

export interface StreamOptions {
  /**
   * Cancels the run: the port call in flight is aborted, no further port is
   * called and the run ends in 'failed'
   */
  signal?: AbortSignal;
}

export interface RunOptions extends StreamOptions {
  /** Called with a snapshot after every transition, 'init' included */
  onTransition?: (state: PipelineState) => void;
}
