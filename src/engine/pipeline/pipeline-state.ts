/**
 * PipelineStateMachine - owns one PipelineState for the duration of a run
 * and rejects every transition that would break its invariants.
 */

import type { LanguageCode } from '../types/common.js';
import type { PipelineError } from '../types/errors.js';
import {
  STAGE_ORDER,
  isTerminalStage,
  type ModerationResult,
  type PipelineStage,
  type PipelineState,
} from '../types/pipeline.js';

export class PipelineStateMachine {
  private state: PipelineState;

  constructor(inputText: string, targetLanguage: LanguageCode) {
    this.state = { inputText, targetLanguage, stage: 'init' };
  }

  get stage(): PipelineStage {
    return this.state.stage;
  }

  get isTerminal(): boolean {
    return isTerminalStage(this.state.stage);
  }

  get inputText(): string {
    return this.state.inputText;
  }

  get targetLanguage(): LanguageCode {
    return this.state.targetLanguage;
  }

  get translatedText(): string | undefined {
    return this.state.translatedText;
  }

  /**
   * Move one step forward along STAGE_ORDER. Use block/fail for the other edges.
   */
  advance(next: PipelineStage): void {
    this.assertMutable(next);

    const from = STAGE_ORDER.indexOf(this.state.stage);
    const to = STAGE_ORDER.indexOf(next);
    if (to === -1 || to !== from + 1) {
      throw new Error(`Illegal pipeline transition: ${this.state.stage} -> ${next}`);
    }
    if (next === 'translated' && this.state.translatedText === undefined) {
      throw new Error('Cannot enter translated without translated text');
    }
    if (next === 'done' && this.state.audioData === undefined) {
      throw new Error('Cannot enter done without audio data');
    }

    this.state.stage = next;
  }

  recordModeration(result: ModerationResult): void {
    this.expectStage('moderating');
    if (this.state.moderationResult) {
      throw new Error('Moderation result already recorded');
    }
    this.state.moderationResult = {
      flagged: result.flagged,
      categories: [...new Set(result.categories)].sort(),
    };
  }

  recordTranslation(translatedText: string): void {
    this.expectStage('translating');
    this.state.translatedText = translatedText;
    this.advance('translated');
  }

  recordAudio(audioData: Buffer): void {
    this.expectStage('synthesizing');
    this.state.audioData = audioData;
    this.advance('done');
  }

  /**
   * Gate edge: moderating -> blocked
   */
  block(): void {
    this.expectStage('moderating');
    if (!this.state.moderationResult?.flagged) {
      throw new Error('Cannot block without a flagged moderation result');
    }
    this.state.stage = 'blocked';
  }

  fail(error: PipelineError): void {
    this.assertMutable('failed');
    this.state.error = error;
    this.state.stage = 'failed';
  }

  /**
   * Detached copy of the current state; callers may mutate it freely
   */
  snapshot(): PipelineState {
    const { moderationResult, audioData, error, ...rest } = this.state;
    return {
      ...rest,
      ...(moderationResult && {
        moderationResult: { ...moderationResult, categories: [...moderationResult.categories] },
      }),
      ...(audioData && { audioData: Buffer.from(audioData) }),
      ...(error && { error: { ...error, cause: { ...error.cause } } }),
    };
  }

  private expectStage(stage: PipelineStage): void {
    if (this.state.stage !== stage) {
      throw new Error(`Expected pipeline stage ${stage}, found ${this.state.stage}`);
    }
  }

  private assertMutable(next: PipelineStage): void {
    if (this.isTerminal) {
      throw new Error(`Pipeline already terminal (${this.state.stage}); cannot move to ${next}`);
    }
  }
}
