import 'reflect-metadata';
import { createApp, createServices } from './app';
import { config, isProd } from './config/config';
import { AppDataSource } from './database';
import { errorMessage } from './errors';
import { logger } from './logger';

async function bootstrap() {
  logger.info({}, 'Config loaded', {
    NODE_ENV: config.NODE_ENV,
    PORT: config.PORT,
    LOG_LEVEL: config.LOG_LEVEL,
    DB_TYPE: isProd() ? 'postgres (forced in prod)' : config.DB_TYPE,
    ECS_CLUSTER: config.ECS_CLUSTER,
    githubApp: config.GITHUB_APP_ID ? 'configured' : 'not configured',
  });

  try {
    await AppDataSource.initialize();
    logger.info({}, 'Database initialized successfully with TypeORM.');
  } catch (error: unknown) {
    logger.error({}, 'DB init error', { error: errorMessage(error) });
    process.exit(1);
  }

  const services = createServices(AppDataSource, config);
  const app = createApp(services, config);

  const server = app.listen(config.PORT, () => {
    logger.info({}, 'Server started', { port: config.PORT, env: config.NODE_ENV });
  });

  process.on('SIGTERM', () => {
    logger.info({}, 'Server shutdown initiated');
    server.close(() => {
      AppDataSource.destroy().catch((error: unknown) => {
        logger.error({}, 'DB shutdown error', { error: errorMessage(error) });
      });
    });
  });
}

bootstrap().catch((error: unknown) => {
  logger.error({}, 'Bootstrap failed', { error: errorMessage(error) });
  process.exit(1);
});
