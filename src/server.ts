/**
 * Voice translation web server
 *
 * Exposes the voice pipeline to the UI:
 * - POST /api/translate         -> terminal state as JSON
 * - POST /api/translate/stream  -> every transition as server-sent events
 * - POST /api/practice          -> recognize an uploaded recording, compare it
 * - POST /api/diagnostics       -> live check of every service
 */

import express from 'express';
import cors from 'cors';
import multer from 'multer';
import path from 'node:path';
import { hasAIProvider, validateConfig, type AppConfig } from './config.js';
import {
  PortError,
  ValidationError,
  getLanguage,
  type PipelineState,
  type SpeakingPractice,
  type ValidationField,
  type VoicePipeline,
} from './engine/index.js';
import type { DiagnosticsRequest, ServiceDiagnostics } from './services/diagnostics.js';
import { serializeState } from './services/state-response.js';

export const VERSION = '0.1.0';

export interface AppDependencies {
  config: AppConfig;
  /** null when no AI provider is configured */
  pipeline: VoicePipeline | null;
  practice?: SpeakingPractice | null;
  diagnostics?: ServiceDiagnostics | null;
}

const AUDIO_EXTENSIONS = ['.wav', '.mp3', '.m4a', '.ogg', '.webm'];

// Practice recordings stay in memory; they go straight to the recognizer
const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 10 * 1024 * 1024 }, // 10MB limit
  fileFilter: (_req, file, cb) => {
    const extension = path.extname(file.originalname).toLowerCase();
    if (file.mimetype.startsWith('audio/') || AUDIO_EXTENSIONS.includes(extension)) {
      cb(null, true);
    } else {
      cb(new ValidationError('audio', 'Only wav, mp3, m4a, ogg or webm recordings are allowed'));
    }
  },
});

/**
 * Aborts when the client goes away before the response is finished
 */
function abortOnDisconnect(res: express.Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort(new PortError('UNKNOWN', 'Client disconnected'));
    }
  });
  return controller;
}

type TranslateRequest =
  | { ok: true; text: string; targetLanguage: string }
  | { ok: false; field: ValidationField; error: string };

function readField(body: unknown, key: string): unknown {
  if (typeof body === 'object' && body !== null && key in body) {
    return Object.getOwnPropertyDescriptor(body, key)?.value;
  }
  return undefined;
}

function parseTranslateRequest(body: unknown): TranslateRequest {
  const text = readField(body, 'text');
  const targetLanguage = readField(body, 'targetLanguage');

  if (typeof text !== 'string') {
    return { ok: false, field: 'inputText', error: 'text must be a string' };
  }
  if (typeof targetLanguage !== 'string') {
    return { ok: false, field: 'targetLanguage', error: 'targetLanguage must be a string' };
  }
  return { ok: true, text, targetLanguage };
}

export function createApp({
  config,
  pipeline,
  practice = null,
  diagnostics = null,
}: AppDependencies): express.Express {
  const configValidation = validateConfig(config);
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  // ============ API Routes ============

  // System status
  app.get('/api/status', (_req, res) => {
    res.json({
      version: VERSION,
      ready: pipeline !== null,
      ai: {
        provider: hasAIProvider(config) ? 'OpenAI' : null,
        models: {
          moderation: config.moderation.model,
          translation: config.translation.model,
          speech: config.speech.model,
          recognition: config.recognition.model,
        },
      },
      features: {
        practice: practice !== null,
        diagnostics: diagnostics !== null,
      },
      config: {
        valid: configValidation.valid,
        errors: configValidation.errors,
      },
      languages: config.pipeline.languages,
    });
  });

  app.get('/api/languages', (_req, res) => {
    res.json(pipeline ? pipeline.supportedLanguages() : config.pipeline.languages.map(getLanguage));
  });

  // Run the pipeline to a terminal state
  app.post('/api/translate', async (req, res) => {
    if (!pipeline) {
      return res.status(503).json({ error: 'AI provider is not configured' });
    }

    const request = parseTranslateRequest(req.body);
    if (!request.ok) {
      return res.status(400).json({ error: request.error, field: request.field });
    }

    const disconnect = abortOnDisconnect(res);
    try {
      const state = await pipeline.run(request.text, request.targetLanguage, {
        signal: disconnect.signal,
      });
      console.log(`[Server] Translation to ${state.targetLanguage} finished: ${state.stage}`);
      res.json(serializeState(state));
    } catch (error) {
      if (error instanceof ValidationError) {
        return res.status(400).json({ error: error.message, field: error.field });
      }
      console.error('[Server] Translation error:', error);
      res.status(500).json({ error: 'Failed to process translation' });
    }
  });

  // Same run, reported transition by transition
  app.post('/api/translate/stream', async (req, res) => {
    if (!pipeline) {
      return res.status(503).json({ error: 'AI provider is not configured' });
    }

    const request = parseTranslateRequest(req.body);
    if (!request.ok) {
      return res.status(400).json({ error: request.error, field: request.field });
    }

    const disconnect = abortOnDisconnect(res);
    let states: AsyncGenerator<PipelineState>;
    try {
      states = pipeline.stream(request.text, request.targetLanguage, { signal: disconnect.signal });
    } catch (error) {
      if (error instanceof ValidationError) {
        return res.status(400).json({ error: error.message, field: error.field });
      }
      console.error('[Server] Translation stream error:', error);
      return res.status(500).json({ error: 'Failed to process translation' });
    }

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    try {
      for await (const state of states) {
        // Leaving the loop returns the generator, so no later stage starts
        if (disconnect.signal.aborted) {
          console.warn(`[Server] Client disconnected; stream stopped at ${state.stage}`);
          break;
        }
        res.write(`event: state\ndata: ${JSON.stringify(serializeState(state))}\n\n`);
      }
      if (!disconnect.signal.aborted) {
        res.write('event: end\ndata: {}\n\n');
      }
    } catch (error) {
      console.error('[Server] Translation stream error:', error);
      res.write(`event: error\ndata: ${JSON.stringify({ error: 'Failed to process translation' })}\n\n`);
    } finally {
      res.end();
    }
  });

  // ============ Speaking practice ============

  app.post('/api/practice', upload.single('audio'), async (req, res) => {
    if (!practice) {
      return res.status(503).json({ error: 'AI provider is not configured' });
    }
    if (!req.file) {
      return res.status(400).json({ error: 'No audio uploaded', field: 'audio' });
    }

    const targetLanguage = readField(req.body, 'targetLanguage');
    const expectedText = readField(req.body, 'expectedText');
    if (typeof targetLanguage !== 'string') {
      return res.status(400).json({ error: 'targetLanguage must be a string', field: 'targetLanguage' });
    }
    if (typeof expectedText !== 'string') {
      return res.status(400).json({ error: 'expectedText must be a string', field: 'expectedText' });
    }

    const disconnect = abortOnDisconnect(res);
    try {
      const result = await practice.check(
        { data: req.file.buffer, filename: req.file.originalname },
        targetLanguage,
        expectedText,
        { signal: disconnect.signal }
      );
      res.json(result);
    } catch (error) {
      if (error instanceof ValidationError) {
        return res.status(400).json({ error: error.message, field: error.field });
      }
      if (error instanceof PortError) {
        return res
          .status(502)
          .json({ error: `Speech recognition failed: ${error.message}`, kind: error.kind });
      }
      console.error('[Server] Practice error:', error);
      res.status(500).json({ error: 'Failed to check recording' });
    }
  });

  // ============ Diagnostics ============

  app.post('/api/diagnostics', async (req, res) => {
    if (!diagnostics) {
      return res.status(503).json({ error: 'AI provider is not configured' });
    }

    const request: DiagnosticsRequest = {};
    const text = readField(req.body, 'text');
    const targetLanguage = readField(req.body, 'targetLanguage');
    if (text !== undefined) {
      if (typeof text !== 'string') {
        return res.status(400).json({ error: 'text must be a string', field: 'inputText' });
      }
      request.text = text;
    }
    if (targetLanguage !== undefined) {
      if (typeof targetLanguage !== 'string') {
        return res.status(400).json({ error: 'targetLanguage must be a string', field: 'targetLanguage' });
      }
      request.targetLanguage = targetLanguage;
    }

    try {
      const report = await diagnostics.run(request);
      console.log(`[Server] Diagnostics finished: ${report.ok ? 'all services up' : 'failures found'}`);
      res.json(report);
    } catch (error) {
      if (error instanceof ValidationError) {
        return res.status(400).json({ error: error.message, field: error.field });
      }
      console.error('[Server] Diagnostics error:', error);
      res.status(500).json({ error: 'Failed to run diagnostics' });
    }
  });

  // Upload rejections from multer
  const handleUploadError: express.ErrorRequestHandler = (error, _req, res, next) => {
    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: error.message, field: 'audio' });
      return;
    }
    if (error instanceof ValidationError) {
      res.status(400).json({ error: error.message, field: error.field });
      return;
    }
    next(error);
  };
  app.use(handleUploadError);

  return app;
}
