import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import type * as winston from 'winston';
import { formatLine, initializeLogging, logger } from './logger';

describe('logger', () => {
  describe('formatLine', () => {
    it('메타데이터는 JSON으로 덧붙임', () => {
      const line = formatLine({ timestamp: '2024-01-02 03:04:05', level: 'debug', message: 'primary 파싱 완료', packages: 2 });
      expect(line).toBe('[2024-01-02 03:04:05] DEBUG primary 파싱 완료 {"packages":2}');
    });

    it('메타데이터가 없으면 메시지만', () => {
      expect(formatLine({ timestamp: 't', level: 'warn', message: 'slow' })).toBe('[t] WARN slow');
    });

    it('스택은 다음 줄에', () => {
      const line = formatLine({ timestamp: 't', level: 'error', message: 'boom', stack: 'Error: boom\n    at x' });
      expect(line).toBe('[t] ERROR boom\nError: boom\n    at x');
    });
  });

  describe('initializeLogging', () => {
    let tempDir: string;
    let previousLevel: string;
    let file: winston.transport | undefined;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'repomd-reader-logger-test-'));
      previousLevel = logger.level;
    });

    afterEach(async () => {
      if (file) {
        logger.remove(file);
        file.close?.();
        file = undefined;
      }
      logger.level = previousLevel;
      await fs.remove(tempDir);
    });

    it('레벨을 바꾸고 파일 트랜스포트를 하나 추가', () => {
      const before = logger.transports.length;
      file = initializeLogging({ level: 'info', logsDir: tempDir });

      expect(logger.level).toBe('info');
      expect(logger.transports).toHaveLength(before + 1);
      expect(logger.transports).toContain(file);
    });
  });
});
