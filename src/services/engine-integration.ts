/**
 * Engine Integration - builds the pipeline and its companion services from AppConfig
 */

import type OpenAI from 'openai';
import {
  VoicePipeline,
  SpeakingPractice,
  OpenAIModerationPort,
  OpenAITranslationPort,
  OpenAISpeechPort,
  OpenAIRecognitionPort,
  createOpenAIClient,
  withResilience,
  withResilientRecognition,
  type PipelinePorts,
  type ResiliencePolicy,
} from '../engine/index.js';

import { validateConfig, type AppConfig } from '../config.js';
import { ServiceDiagnostics } from './diagnostics.js';

export interface Services {
  pipeline: VoicePipeline;
  practice: SpeakingPractice;
  diagnostics: ServiceDiagnostics;
}

/**
 * Create the three OpenAI-backed ports, unwrapped
 */
export function createPorts(config: AppConfig, client: OpenAI): PipelinePorts {
  return {
    moderation: new OpenAIModerationPort(client, { model: config.moderation.model }),
    translation: new OpenAITranslationPort(client, {
      model: config.translation.model,
      temperature: config.translation.temperature,
      maxTokens: config.translation.maxTokens,
    }),
    speech: new OpenAISpeechPort(client, {
      model: config.speech.model,
      voice: config.speech.voice,
    }),
  };
}

function assertUsable(config: AppConfig): void {
  if (!config.openai.apiKey) {
    throw new Error('OpenAI API key is not configured');
  }

  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new Error(`Invalid configuration: ${validation.errors.join('; ')}`);
  }
}

function resiliencePolicy(config: AppConfig): ResiliencePolicy {
  return {
    retry: config.pipeline.retry,
    timeoutMs: config.pipeline.timeoutMs,
  };
}

function openAIClient(config: AppConfig): OpenAI {
  // Retries happen in the resilience layer, never inside the SDK
  return createOpenAIClient({
    apiKey: config.openai.apiKey,
    baseUrl: config.openai.baseUrl,
    timeout: config.openai.timeout,
    maxRetries: 0,
  });
}

/**
 * Create the voice pipeline with retry and timeout around every port
 */
export function createPipeline(config: AppConfig, client?: OpenAI): VoicePipeline {
  return createServices(config, client).pipeline;
}

/**
 * Create the pipeline, speaking practice and diagnostics over one client.
 * Throws when the configuration does not validate.
 */
export function createServices(config: AppConfig, client?: OpenAI): Services {
  assertUsable(config);

  const openai = client ?? openAIClient(config);
  const policy = resiliencePolicy(config);

  console.log(
    `[Pipeline] Creating ports: moderation=${config.moderation.model}, translation=${config.translation.model}, speech=${config.speech.model}, recognition=${config.recognition.model}`
  );

  const ports = withResilience(createPorts(config, openai), policy);
  const pipeline = new VoicePipeline({ ports, languages: config.pipeline.languages });

  const recognition = withResilientRecognition(
    new OpenAIRecognitionPort(openai, { model: config.recognition.model }),
    policy
  );
  const practice = new SpeakingPractice({ recognition, languages: config.pipeline.languages });

  return {
    pipeline,
    practice,
    diagnostics: new ServiceDiagnostics(ports, pipeline),
  };
}
