/**
 * API Server
 *
 * Entry point: loads the environment, builds the pipeline and its text
 * generator, and serves the express app.
 */

// Load environment variables first
import 'dotenv/config';

import { createServer } from 'http';
import { getLogger } from '../logging/logger.js';
import { loadAnalysisConfigFromEnv } from '../config/analysis.js';
import { loadProviderConfigFromEnv } from '../config/providers.js';
import { createTextGenerator } from '../providers/index.js';
import { AnalysisPipeline } from '../execution/pipeline.js';
import { createApp } from './app.js';

const logger = getLogger();
const PORT = Number(process.env.PORT ?? 3000);

const providerSettings = loadProviderConfigFromEnv();
const generator = createTextGenerator(providerSettings);
const pipeline = new AnalysisPipeline({
  config: loadAnalysisConfigFromEnv(),
  generator,
  logger,
});

const app = createApp({ pipeline, logger });
const httpServer = createServer(app);

httpServer.listen(PORT, () => {
  logger.info('server_started', {
    port: PORT,
    text_generation: generator ? providerSettings.provider : 'disabled',
    model: providerSettings.model,
  });
});

function shutdown(signal: string): void {
  logger.info('server_stopping', { signal });
  httpServer.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
