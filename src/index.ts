/**
 * Process entry point: load config, build the pipeline, start listening
 */

import 'dotenv/config';
import { loadConfig, validateConfig } from './config.js';
import { createApp } from './server.js';
import { createServices } from './services/engine-integration.js';

async function startServer(): Promise<void> {
  const config = loadConfig();
  const configValidation = validateConfig(config);

  if (!configValidation.valid) {
    for (const error of configValidation.errors) {
      console.warn(`[Server] Config: ${error}`);
    }
    console.warn('[Server] AI services disabled until the configuration is fixed');
  }

  // An invalid config never builds a pipeline; /api/status reports why
  const services = configValidation.valid ? createServices(config) : null;
  const pipeline = services?.pipeline ?? null;
  const app = createApp({
    config,
    pipeline,
    practice: services?.practice ?? null,
    diagnostics: services?.diagnostics ?? null,
  });

  await new Promise<void>((resolve, reject) => {
    const server = app.listen(config.port, () => resolve());
    server.once('error', reject);
  });

  console.log(`
╔═══════════════════════════════════════════════╗
║            Voice Translation Server           ║
╠═══════════════════════════════════════════════╣
  🌐 Server: http://localhost:${config.port}
  🗣️  Languages: ${config.pipeline.languages.join(', ')}
  🤖 AI: ${pipeline ? 'OpenAI ✅' : 'Not configured ⚠️'}
╚═══════════════════════════════════════════════╝
`);
}

startServer().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exitCode = 1;
});
