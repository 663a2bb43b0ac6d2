/**
 * 진단 로그
 * stdout은 CLI 출력 전용이라 콘솔 로그는 stderr로만 보낸다.
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export interface LoggingOptions {
  level: string;
  /** 일별 로그 파일 디렉토리 */
  logsDir: string;
}

/**
 * `[시각] LEVEL 메시지 {meta}` 한 줄 (스택은 다음 줄부터)
 */
export function formatLine({ timestamp, level, message, stack, ...meta }: winston.Logform.TransformableInfo): string {
  let line = `[${timestamp}] ${level.toUpperCase()} ${message}`;
  if (Object.keys(meta).length > 0) {
    line += ` ${JSON.stringify(meta)}`;
  }
  return stack ? `${line}\n${stack}` : line;
}

const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(formatLine)
);

export const logger = winston.createLogger({
  level: process.env.REPOMD_READER_LOG_LEVEL || 'warn',
  format: lineFormat,
  transports: [new winston.transports.Console({ stderrLevels: Object.keys(winston.config.npm.levels) })],
});

/**
 * 레벨을 바꾸고 일별 로그 파일을 추가한다. 추가한 트랜스포트를 돌려준다.
 */
export function initializeLogging({ level, logsDir }: LoggingOptions): winston.transport {
  const file = new DailyRotateFile({
    dirname: logsDir,
    filename: 'repomd-reader-%DATE%.log',
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles: '14d',
  });
  logger.level = level;
  logger.add(file);
  logger.debug('로그 파일 설정', { logsDir, level });
  return file;
}

export default logger;
