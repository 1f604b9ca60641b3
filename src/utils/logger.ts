import winston from 'winston';
import path from 'path';

// 로그 디렉토리 경로
const logDir = path.join(process.cwd(), 'logs');

const isTest = process.env.NODE_ENV === 'test';

// 로그 포맷 정의
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack }) => {
    if (stack) {
      return `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`;
    }
    return `${timestamp} [${level.toUpperCase()}]: ${message}`;
  })
);

const transports: winston.transport[] = [
  // 콘솔 출력 (테스트 중에는 무음)
  new winston.transports.Console({
    silent: isTest,
    format: winston.format.combine(
      winston.format.colorize(),
      logFormat
    )
  })
];

if (!isTest) {
  transports.push(
    // 에러 로그 파일
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }),
    // 전체 로그 파일
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5
    })
  );
}

// 설정 로드 전까지는 info, 이후 applyLogLevel로 AppConfig.logLevel 적용
const logger = winston.createLogger({
  level: 'info',
  format: logFormat,
  transports
});

export function applyLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
