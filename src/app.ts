import express, { Request, Response, NextFunction, Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { ServiceContainer } from './services/container';
import { createDeviceRoutes } from './routes/devices';
import { createGenerateRoutes } from './routes/generate';
import { sendFailure, sendSuccess } from './utils/api-response';
import logger from './utils/logger';

export const APP_VERSION = '1.0.0';

export function createApp(services: ServiceContainer): Express {
  const app = express();

  // 보안 미들웨어 설정
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"]
      }
    },
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true
    }
  }));

  // CORS 설정 (로컬 호스트만 허용)
  app.use(cors({
    origin: ['http://127.0.0.1', 'http://localhost'],
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type'],
  }));

  app.use(express.json({ limit: '10kb' }));

  // 요청 로깅 미들웨어
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info(`${req.method} ${req.path} from ${req.ip}`);
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    sendSuccess(res, { status: 'ok', version: APP_VERSION });
  });

  app.use('/devices', createDeviceRoutes(services));
  app.use('/generate', createGenerateRoutes(services));

  // 404 핸들러
  app.use((req: Request, res: Response) => {
    logger.warn(`404 - ${req.method} ${req.path} from ${req.ip}`);
    sendFailure(res, 404, 'Endpoint not found');
  });

  // 에러 핸들러 (잘못된 JSON 본문 포함)
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    logger.error(`Unhandled error: ${err.message}`, err);

    const message = process.env.NODE_ENV === 'production' && status >= 500
      ? 'Internal server error'
      : err.message;

    sendFailure(res, status, message);
  });

  return app;
}
