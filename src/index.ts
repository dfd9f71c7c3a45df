import dotenv from 'dotenv';
import { loadConfig } from './config/index.js';
import type { AppConfig } from './config/index.js';
import { createApp } from './app.js';
import { CONTRACT_VERSION } from './contracts/version.js';
import { eventBus } from './events/bus.js';
import { metrics } from './metrics/metrics.js';
import { createRunHistory } from './runs/history.js';
import { initializeRedis, shutdownRedis } from './persistence/redis-client.js';
import { ConfigurationError, errorMessage } from './errors/types.js';
import { logger } from './observability/logger.js';

dotenv.config();

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('\n❌ FATAL: Invalid configuration');
      console.error(`  ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

const config = loadConfigOrExit();

logger.setLevel(config.logLevel);

initializeRedis(config.redisUrl ? { url: config.redisUrl, keyPrefix: config.redisKeyPrefix } : undefined);

const redisEnabled = !!config.redisUrl;
const history = createRunHistory(redisEnabled);

eventBus.subscribe('stage.failed', event => {
  logger.warn('stage_failed_event', `Stage ${event.stage ?? 'unknown'} failed`, {
    runId: event.runId,
    storyId: event.storyId,
    ...event.data,
  });
});

const app = createApp({ config, history, bus: eventBus, metrics, redisEnabled });
const port = config.port;

const server = app.listen(port, () => {
  const mode = redisEnabled ? 'distributed (Redis)' : 'single-instance (in-memory)';

  console.log(`Contract pipeline listening on port ${port}`);
  console.log(`Mode: ${mode}`);
  console.log(`Contract version: ${CONTRACT_VERSION}`);
  console.log(`Gate error policy: ${config.gateErrorPolicy}`);
  console.log(`Feature label: ${config.github.featureLabel}`);
});

function shutdown(signal: string): void {
  logger.info('shutdown', `${signal} received, graceful shutdown`);
  server.close(() => {
    shutdownRedis()
      .catch(error => {
        logger.error('shutdown', 'Redis shutdown failed', { error: errorMessage(error) });
      })
      .finally(() => process.exit(0));
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
