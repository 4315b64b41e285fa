import { config as loadEnv } from 'dotenv';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { logAuthStartupDetails } from './middleware/auth.js';

loadEnv();

async function bootstrap() {
  const config = loadConfig();
  const logger = createLogger(config);

  logAuthStartupDetails(logger, config);

  const app = await buildApp(config, { logger });

  try {
    await app.listen({ port: config.port, host: config.host });
    logger.info({ host: config.host, port: config.port }, 'orcid-gate listening');
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap().catch((error: unknown) => {
  // Plain synchronous output: the process exits right after
  createLogger({ logLevel: 'error', nodeEnv: 'production' }).fatal(
    { err: error },
    'Failed to bootstrap',
  );
  process.exit(1);
});
