import { beforeEach, describe, expect, it, vi } from 'vitest';
import { VoicePipeline } from '../voice-pipeline.js';
import { PortError, ValidationError } from '../../types/errors.js';
import type { PipelineStage, PipelineState } from '../../types/pipeline.js';
import { createStubPorts } from '../../../__tests__/helpers/stub-ports.js';

async function collectStages(states: AsyncGenerator<PipelineState>): Promise<PipelineStage[]> {
  const stages: PipelineStage[] = [];
  for await (const state of states) {
    stages.push(state.stage);
  }
  return stages;
}

describe('VoicePipeline', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('run', () => {
    it('moderates, translates and voices safe input', async () => {
      const stubs = createStubPorts();
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      const state = await pipeline.run('Good morning', 'es');

      expect(state.stage).toBe('done');
      expect(state.translatedText).toBe('Buenos días');
      expect(state.audioData).toEqual(Buffer.from([0x00, 0x01]));
      expect(state.error).toBeUndefined();
      expect(state.moderationResult).toEqual({ flagged: false, categories: [] });

      expect(stubs.evaluate).toHaveBeenCalledTimes(1);
      expect(stubs.evaluate).toHaveBeenCalledWith('Good morning', {});
      expect(stubs.translate).toHaveBeenCalledTimes(1);
      expect(stubs.translate).toHaveBeenCalledWith('Good morning', 'es', {});
      expect(stubs.synthesize).toHaveBeenCalledTimes(1);
      expect(stubs.synthesize).toHaveBeenCalledWith('Buenos días', 'es', {});
    });

    it('stops at blocked when moderation flags the input', async () => {
      const stubs = createStubPorts({
        moderation: { flagged: true, categories: ['violence', 'hate', 'violence'] },
      });
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      const state = await pipeline.run('something unpleasant', 'fr');

      expect(state.stage).toBe('blocked');
      expect(state.moderationResult).toEqual({ flagged: true, categories: ['hate', 'violence'] });
      expect(state.translatedText).toBeUndefined();
      expect(state.audioData).toBeUndefined();
      expect(state.error).toBeUndefined();
      expect(stubs.translate).not.toHaveBeenCalled();
      expect(stubs.synthesize).not.toHaveBeenCalled();
    });

    it('fails with MODERATION_ERROR and skips the other ports when moderation fails', async () => {
      const stubs = createStubPorts({
        moderation: new PortError('UNAVAILABLE', 'service down'),
      });
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      const state = await pipeline.run('Good morning', 'es');

      expect(state.stage).toBe('failed');
      expect(state.error).toEqual({
        kind: 'MODERATION_ERROR',
        message: 'Content moderation failed: service down',
        cause: { kind: 'UNAVAILABLE', message: 'service down' },
      });
      expect(state.moderationResult).toBeUndefined();
      expect(stubs.translate).toHaveBeenCalledTimes(0);
      expect(stubs.synthesize).toHaveBeenCalledTimes(0);
    });

    it('fails with TRANSLATION_ERROR and never calls speech when translation fails', async () => {
      const stubs = createStubPorts({
        translation: new PortError('RATE_LIMITED', 'slow down'),
      });
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      const state = await pipeline.run('Good morning', 'es');

      expect(state.stage).toBe('failed');
      expect(state.error?.kind).toBe('TRANSLATION_ERROR');
      expect(state.error?.message).toBe('Translation failed: slow down');
      expect(state.error?.cause.kind).toBe('RATE_LIMITED');
      expect(state.moderationResult).toEqual({ flagged: false, categories: [] });
      expect(state.translatedText).toBeUndefined();
      expect(stubs.synthesize).not.toHaveBeenCalled();
    });

    it('keeps the translated text when synthesis fails', async () => {
      const stubs = createStubPorts({ audio: new Error('boom') });
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      const state = await pipeline.run('Good morning', 'es');

      expect(state.stage).toBe('failed');
      expect(state.translatedText).toBe('Buenos días');
      expect(state.audioData).toBeUndefined();
      expect(state.error).toEqual({
        kind: 'SYNTHESIS_ERROR',
        message: 'Speech synthesis failed: boom',
        cause: { kind: 'UNKNOWN', message: 'boom' },
      });
    });

    it('surfaces a port timeout as failed', async () => {
      const stubs = createStubPorts({
        translation: new PortError('TIMEOUT', 'Translation timed out after 100ms'),
      });
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      const state = await pipeline.run('Good morning', 'es');

      expect(state.stage).toBe('failed');
      expect(state.error?.cause).toEqual({
        kind: 'TIMEOUT',
        message: 'Translation timed out after 100ms',
      });
    });

    it('normalizes non-Error rejections', async () => {
      const stubs = createStubPorts();
      stubs.evaluate.mockRejectedValueOnce('connection reset');
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      const state = await pipeline.run('Good morning', 'es');

      expect(state.error?.cause).toEqual({ kind: 'UNKNOWN', message: 'connection reset' });
    });

    it('passes the input to the ports untrimmed', async () => {
      const stubs = createStubPorts();
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      await pipeline.run('  Hi there  ', 'fr');

      expect(stubs.evaluate).toHaveBeenCalledWith('  Hi there  ', {});
      expect(stubs.translate).toHaveBeenCalledWith('  Hi there  ', 'fr', {});
    });

    it('produces identical states for identical runs', async () => {
      const pipeline = new VoicePipeline({ ports: createStubPorts().ports });

      const first = await pipeline.run('Good morning', 'es');
      const second = await pipeline.run('Good morning', 'es');

      expect(second).toEqual(first);
    });

    it('keeps concurrent runs independent', async () => {
      const stubs = createStubPorts();
      stubs.translate.mockImplementation(async (text, targetLanguage) => `${targetLanguage}:${text}`);
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      const [spanish, german] = await Promise.all([
        pipeline.run('Good morning', 'es'),
        pipeline.run('Good night', 'de'),
      ]);

      expect(spanish.translatedText).toBe('es:Good morning');
      expect(german.translatedText).toBe('de:Good night');
      expect(spanish.targetLanguage).toBe('es');
      expect(german.targetLanguage).toBe('de');
    });

    it('reports every transition to onTransition', async () => {
      const pipeline = new VoicePipeline({ ports: createStubPorts().ports });
      const stages: PipelineStage[] = [];

      await pipeline.run('Good morning', 'es', {
        onTransition: (state) => stages.push(state.stage),
      });

      expect(stages).toEqual([
        'init',
        'moderating',
        'moderated',
        'translating',
        'translated',
        'synthesizing',
        'done',
      ]);
    });

    it('hands the port calls an abort signal when one is given', async () => {
      const stubs = createStubPorts();
      const controller = new AbortController();
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      await pipeline.run('Good morning', 'es', { signal: controller.signal });

      expect(stubs.evaluate).toHaveBeenCalledWith('Good morning', { signal: controller.signal });
      expect(stubs.translate).toHaveBeenCalledWith('Good morning', 'es', { signal: controller.signal });
      expect(stubs.synthesize).toHaveBeenCalledWith('Buenos días', 'es', { signal: controller.signal });
    });

    it('fails at the next stage without calling its port once the signal is aborted', async () => {
      const stubs = createStubPorts();
      const controller = new AbortController();
      stubs.translate.mockImplementation(async () => {
        controller.abort(new PortError('UNKNOWN', 'Client disconnected'));
        return 'Hola';
      });
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      const state = await pipeline.run('Good morning', 'es', { signal: controller.signal });

      expect(state.stage).toBe('failed');
      expect(state.translatedText).toBe('Hola');
      expect(state.error).toEqual({
        kind: 'SYNTHESIS_ERROR',
        message: 'Speech synthesis failed: Client disconnected',
        cause: { kind: 'UNKNOWN', message: 'Client disconnected' },
      });
      expect(stubs.synthesize).not.toHaveBeenCalled();
    });

    it('propagates faults raised while recording a port result', async () => {
      const stubs = createStubPorts();
      // Malformed adapter output: categories is not a list
      stubs.evaluate.mockResolvedValueOnce(JSON.parse('{"flagged":false,"categories":7}'));
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      await expect(pipeline.run('Good morning', 'es')).rejects.toThrow(TypeError);
      expect(stubs.translate).not.toHaveBeenCalled();
    });

    it('hands out snapshots that do not affect the run', async () => {
      const pipeline = new VoicePipeline({ ports: createStubPorts().ports });

      const state = await pipeline.run('Good morning', 'es', {
        onTransition: (snapshot) => {
          snapshot.stage = 'failed';
        },
      });

      expect(state.stage).toBe('done');
    });
  });

  describe('validation', () => {
    it.each(['', '   \n\t'])('rejects empty input %j before any port call', async (text) => {
      const stubs = createStubPorts();
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      const error = await pipeline.run(text, 'fr').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: 'inputText' });
      expect(stubs.evaluate).not.toHaveBeenCalled();
      expect(stubs.translate).not.toHaveBeenCalled();
      expect(stubs.synthesize).not.toHaveBeenCalled();
    });

    it('rejects unknown target languages before any port call', async () => {
      const stubs = createStubPorts();
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      await expect(pipeline.run('hello', 'xx-not-a-language')).rejects.toMatchObject({
        name: 'ValidationError',
        field: 'targetLanguage',
      });
      expect(stubs.evaluate).not.toHaveBeenCalled();
    });

    it('rejects languages outside the configured subset', async () => {
      const pipeline = new VoicePipeline({ ports: createStubPorts().ports, languages: ['es'] });

      await expect(pipeline.run('hello', 'fr')).rejects.toThrow(
        'Unsupported target language "fr". Supported: es'
      );
    });

    it('refuses an empty language list', () => {
      expect(() => new VoicePipeline({ ports: createStubPorts().ports, languages: [] })).toThrow(
        'VoicePipeline needs at least one target language'
      );
    });
  });

  describe('stream', () => {
    it('yields every stage of a successful run', async () => {
      const pipeline = new VoicePipeline({ ports: createStubPorts().ports });

      const stages = await collectStages(pipeline.stream('Good morning', 'es'));

      expect(stages).toEqual([
        'init',
        'moderating',
        'moderated',
        'translating',
        'translated',
        'synthesizing',
        'done',
      ]);
    });

    it('ends at blocked for flagged input', async () => {
      const stubs = createStubPorts({ moderation: { flagged: true, categories: ['harassment'] } });
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      const stages = await collectStages(pipeline.stream('rude words', 'it'));

      expect(stages).toEqual(['init', 'moderating', 'blocked']);
    });

    it('ends at failed when translation fails', async () => {
      const stubs = createStubPorts({ translation: new PortError('INVALID_INPUT', 'too long') });
      const pipeline = new VoicePipeline({ ports: stubs.ports });

      const stages = await collectStages(pipeline.stream('Good morning', 'ja'));

      expect(stages).toEqual(['init', 'moderating', 'moderated', 'translating', 'failed']);
    });

    it('yields a final state equal to what run returns', async () => {
      const pipeline = new VoicePipeline({ ports: createStubPorts().ports });

      let last: PipelineState | undefined;
      for await (const state of pipeline.stream('Good morning', 'es')) {
        last = state;
      }

      expect(last).toEqual(await pipeline.run('Good morning', 'es'));
    });

    it('validates eagerly', () => {
      const pipeline = new VoicePipeline({ ports: createStubPorts().ports });

      expect(() => pipeline.stream('', 'es')).toThrow(ValidationError);
    });
  });

  it('lists supported languages in registry order', () => {
    const pipeline = new VoicePipeline({ ports: createStubPorts().ports, languages: ['fr', 'es'] });

    expect(pipeline.supportedLanguages().map((language) => language.code)).toEqual(['es', 'fr']);
  });
});
