// 환경변수 로드 (다른 모듈보다 먼저)
import 'dotenv/config';
import { loadConfig } from './config';
import { createServices } from './services/container';
import { createApp } from './app';
import logger, { applyLogLevel } from './utils/logger';

const HOST = '127.0.0.1'; // 로컬 호스트만 허용

function startServer(): void {
  const config = loadConfig();
  applyLogLevel(config.logLevel);
  const app = createApp(createServices(config));

  const server = app.listen(config.port, HOST, () => {
    logger.info('='.repeat(60));
    logger.info('IOS Config Pilot API Started');
    logger.info('='.repeat(60));
    logger.info(`Server listening on: http://${HOST}:${config.port}`);
    logger.info(`Inventory: ${config.inventoryFile}`);
    logger.info(`Generation backend: ${config.ollamaUrl} (${config.ollamaModel})`);
    logger.info(`Environment: ${process.env.NODE_ENV || 'development'}`);
    logger.info('='.repeat(60));
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} signal received: closing HTTP server`);
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// 처리되지 않은 프로미스 거부 처리
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${reason}`);
});

try {
  startServer();
} catch (error) {
  logger.error(`Failed to start server: ${error}`);
  process.exit(1);
}
