/**
 * Voice Pipeline - Orchestrates the 3-stage moderated translation process
 *
 * Stage 1: Moderate - Gate on the content safety verdict
 * Stage 2: Translate - English text into the target language
 * Stage 3: Synthesize - Voice the translated text
 *
 * A port failure ends the run in 'failed'; a flagged verdict ends it in
 * 'blocked'. Neither is thrown. Retries and timeouts belong to the ports.
 * An aborted signal counts as a port failure of the stage it interrupts.
 */

import type { PipelinePorts, PortCallOptions } from '../interfaces/ports.js';
import {
  LANGUAGE_CODES,
  getLanguage,
  isSupportedLanguage,
  type LanguageCode,
  type LanguageProfile,
} from '../types/common.js';
import {
  ValidationError,
  createPipelineError,
  toPortError,
  type PipelineErrorKind,
} from '../types/errors.js';
import type { PipelineState, RunOptions, StreamOptions } from '../types/pipeline.js';
import { PipelineStateMachine } from './pipeline-state.js';

export interface PipelineConfig {
  ports: PipelinePorts;
  /** Target languages this pipeline accepts; defaults to every supported language */
  languages?: readonly LanguageCode[];
}

interface PipelineStep {
  entering: 'moderating' | 'translating' | 'synthesizing';
  execute(state: PipelineStateMachine, call: PortCallOptions): Promise<void>;
}

type PortOutcome<T> = { ok: true; value: T } | { ok: false };

export class VoicePipeline {
  private readonly ports: PipelinePorts;
  private readonly languages: readonly LanguageCode[];
  private readonly steps: readonly PipelineStep[];

  constructor(config: PipelineConfig) {
    const languages = config.languages ?? LANGUAGE_CODES;
    if (languages.length === 0) {
      throw new Error('VoicePipeline needs at least one target language');
    }

    this.ports = config.ports;
    // Keep registry order regardless of how the config listed them
    this.languages = LANGUAGE_CODES.filter((code) => languages.includes(code));

    this.steps = [
      { entering: 'moderating', execute: (state, call) => this.moderate(state, call) },
      { entering: 'translating', execute: (state, call) => this.translate(state, call) },
      { entering: 'synthesizing', execute: (state, call) => this.synthesize(state, call) },
    ];
  }

  /**
   * Run the pipeline to a terminal state (done, blocked or failed).
   * Rejects with ValidationError for bad input. Any other rejection is a
   * broken state-machine invariant, not a pipeline outcome.
   */
  async run(
    inputText: string,
    targetLanguage: string,
    options: RunOptions = {}
  ): Promise<PipelineState> {
    const state = this.createState(inputText, targetLanguage);

    for await (const snapshot of this.drive(state, options.signal)) {
      options.onTransition?.(snapshot);
    }

    return state.snapshot();
  }

  /**
   * Same as run, but yields a snapshot after every transition.
   * Validation happens here, before the generator is created.
   */
  stream(
    inputText: string,
    targetLanguage: string,
    options: StreamOptions = {}
  ): AsyncGenerator<PipelineState> {
    const state = this.createState(inputText, targetLanguage);
    return this.drive(state, options.signal);
  }

  supportedLanguages(): LanguageProfile[] {
    return this.languages.map(getLanguage);
  }

  private createState(inputText: string, targetLanguage: string): PipelineStateMachine {
    if (typeof inputText !== 'string' || inputText.trim().length === 0) {
      throw new ValidationError('inputText', 'Input text must not be empty');
    }
    if (!isSupportedLanguage(targetLanguage) || !this.languages.includes(targetLanguage)) {
      throw new ValidationError(
        'targetLanguage',
        `Unsupported target language "${targetLanguage}". Supported: ${this.languages.join(', ')}`
      );
    }
    return new PipelineStateMachine(inputText, targetLanguage);
  }

  private async *drive(
    state: PipelineStateMachine,
    signal?: AbortSignal
  ): AsyncGenerator<PipelineState> {
    const startTime = Date.now();
    const call: PortCallOptions = { signal };
    yield state.snapshot();

    for (const step of this.steps) {
      state.advance(step.entering);
      console.log(`[Pipeline] Stage ${step.entering}...`);
      yield state.snapshot();

      await step.execute(state, call);
      yield state.snapshot();

      if (state.isTerminal) {
        break;
      }
    }

    console.log(`[Pipeline] Finished in ${state.stage} after ${Date.now() - startTime}ms`);
  }

  /**
   * Await one port call. A rejection fails the run; faults raised after the
   * port answered are left to propagate.
   */
  private async callPort<T>(
    state: PipelineStateMachine,
    errorKind: PipelineErrorKind,
    call: PortCallOptions,
    invoke: (call: PortCallOptions) => Promise<T>
  ): Promise<PortOutcome<T>> {
    try {
      call.signal?.throwIfAborted();
      return { ok: true, value: await invoke(call) };
    } catch (error) {
      const portError = toPortError(error);
      const pipelineError = createPipelineError(errorKind, portError);
      console.error(`[Pipeline] ${pipelineError.message} (${portError.kind})`);
      state.fail(pipelineError);
      return { ok: false };
    }
  }

  private async moderate(state: PipelineStateMachine, call: PortCallOptions): Promise<void> {
    const outcome = await this.callPort(state, 'MODERATION_ERROR', call, (options) =>
      this.ports.moderation.evaluate(state.inputText, options)
    );
    if (!outcome.ok) {
      return;
    }

    const result = outcome.value;
    state.recordModeration(result);

    if (result.flagged) {
      console.warn(`[Pipeline] Input blocked by moderation: ${result.categories.join(', ') || 'unspecified'}`);
      state.block();
    } else {
      state.advance('moderated');
    }
  }

  private async translate(state: PipelineStateMachine, call: PortCallOptions): Promise<void> {
    const outcome = await this.callPort(state, 'TRANSLATION_ERROR', call, (options) =>
      this.ports.translation.translate(state.inputText, state.targetLanguage, options)
    );
    if (!outcome.ok) {
      return;
    }

    state.recordTranslation(outcome.value);
    console.log(`[Pipeline] Translated into ${state.targetLanguage} (${outcome.value.length} chars)`);
  }

  private async synthesize(state: PipelineStateMachine, call: PortCallOptions): Promise<void> {
    const text = state.translatedText;
    if (text === undefined) {
      throw new Error('Synthesis reached without translated text');
    }

    const outcome = await this.callPort(state, 'SYNTHESIS_ERROR', call, (options) =>
      this.ports.speech.synthesize(text, state.targetLanguage, options)
    );
    if (!outcome.ok) {
      return;
    }

    state.recordAudio(outcome.value);
    console.log(`[Pipeline] Synthesized ${outcome.value.length} bytes of audio`);
  }
}
