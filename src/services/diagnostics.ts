/**
 * Service diagnostics - live calls against each configured service
 */

import {
  ValidationError,
  isSupportedLanguage,
  toPortError,
  type LanguageCode,
  type PipelinePorts,
  type VoicePipeline,
} from '../engine/index.js';

export type DiagnosticCheckName = 'moderation' | 'translation' | 'speech' | 'pipeline';

export interface DiagnosticCheck {
  name: DiagnosticCheckName;
  ok: boolean;
  durationMs: number;
  detail: string;
}

export interface DiagnosticsReport {
  ok: boolean;
  targetLanguage: LanguageCode;
  checks: DiagnosticCheck[];
}

export interface DiagnosticsRequest {
  text?: string;
  targetLanguage?: string;
}

export const DEFAULT_DIAGNOSTIC_TEXT = 'Hello, this is a test of the translation service.';

export class ServiceDiagnostics {
  constructor(
    private readonly ports: PipelinePorts,
    private readonly pipeline: VoicePipeline
  ) {}

  /**
   * Checks run one after another so a report reads in pipeline order
   */
  async run(request: DiagnosticsRequest = {}): Promise<DiagnosticsReport> {
    const text = request.text ?? DEFAULT_DIAGNOSTIC_TEXT;
    const targetLanguage = this.resolveLanguage(request.targetLanguage);
    if (text.trim().length === 0) {
      throw new ValidationError('inputText', 'Input text must not be empty');
    }

    console.log(`[Diagnostics] Checking services with target language ${targetLanguage}`);

    const checks = [
      await this.check('moderation', async () => {
        const result = await this.ports.moderation.evaluate(text);
        return `Flagged: ${result.flagged ? 'yes' : 'no'}`;
      }),
      await this.check('translation', async () => {
        const translated = await this.ports.translation.translate(text, targetLanguage);
        return `Response: "${translated}"`;
      }),
      await this.check('speech', async () => {
        const audio = await this.ports.speech.synthesize(text, targetLanguage);
        return `Generated ${audio.length} bytes of audio`;
      }),
      await this.check('pipeline', async () => {
        const state = await this.pipeline.run(text, targetLanguage);
        if (state.stage !== 'done') {
          throw new Error(`Pipeline ended in ${state.stage}${state.error ? `: ${state.error.message}` : ''}`);
        }
        return `Translated to "${state.translatedText ?? ''}" with ${state.audioData?.length ?? 0} bytes of audio`;
      }),
    ];

    return {
      ok: checks.every((check) => check.ok),
      targetLanguage,
      checks,
    };
  }

  private resolveLanguage(requested: string | undefined): LanguageCode {
    const languages = this.pipeline.supportedLanguages().map((language) => language.code);
    if (requested === undefined) {
      const [first] = languages;
      if (first === undefined) {
        throw new Error('Pipeline has no target languages');
      }
      return first;
    }
    if (!isSupportedLanguage(requested) || !languages.includes(requested)) {
      throw new ValidationError(
        'targetLanguage',
        `Unsupported target language "${requested}". Supported: ${languages.join(', ')}`
      );
    }
    return requested;
  }

  private async check(name: DiagnosticCheckName, exercise: () => Promise<string>): Promise<DiagnosticCheck> {
    const startTime = Date.now();
    try {
      const detail = await exercise();
      return { name, ok: true, durationMs: Date.now() - startTime, detail };
    } catch (error) {
      const detail = toPortError(error).message;
      console.error(`[Diagnostics] ${name} check failed: ${detail}`);
      return { name, ok: false, durationMs: Date.now() - startTime, detail };
    }
  }
}
