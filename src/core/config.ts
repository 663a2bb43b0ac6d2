import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { DEFAULT_MAX_XML_SIZE } from './metadata/types';

// 설정 인터페이스 정의
export interface Config {
  // 압축 해제 후 최대 XML/YAML 크기 (bytes)
  maxXmlSize: number;
  // HTTP 요청 타임아웃 (ms)
  timeoutMs: number;
  userAgent: string;
  logLevel: 'error' | 'warn' | 'info' | 'debug';

  // 저장소 URL 변수
  basearch?: string;
  releasever?: string;
}

export type ConfigKey = keyof Config;

// 기본 설정값
export const DEFAULT_CONFIG: Config = {
  maxXmlSize: DEFAULT_MAX_XML_SIZE,
  timeoutMs: 60000,
  userAgent: 'repomd-reader/1.0',
  logLevel: 'info',
};

const NUMERIC_KEYS: ReadonlySet<ConfigKey> = new Set(['maxXmlSize', 'timeoutMs']);
const LOG_LEVELS: ReadonlyArray<Config['logLevel']> = ['error', 'warn', 'info', 'debug'];

export function isConfigKey(key: string): key is ConfigKey {
  return key in DEFAULT_CONFIG || key === 'basearch' || key === 'releasever';
}

/**
 * 저장된 JSON 값을 설정으로 정규화 (알 수 없는 키와 잘못된 값은 버림)
 */
export function normalizeConfig(raw: unknown): Config {
  const config: Config = { ...DEFAULT_CONFIG };
  if (typeof raw !== 'object' || raw === null) return config;

  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) continue;

    if (NUMERIC_KEYS.has(key)) {
      const num = typeof value === 'number' ? value : Number(value);
      if (Number.isFinite(num) && num > 0) {
        if (key === 'maxXmlSize') config.maxXmlSize = num;
        else config.timeoutMs = num;
      }
    } else if (key === 'logLevel') {
      const level = LOG_LEVELS.find((candidate) => candidate === value);
      if (level) config.logLevel = level;
    } else if (typeof value === 'string') {
      if (key === 'userAgent') config.userAgent = value;
      else if (key === 'basearch') config.basearch = value;
      else if (key === 'releasever') config.releasever = value;
    }
  }
  return config;
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir: string = process.env.REPOMD_READER_HOME || path.join(os.homedir(), '.repomd-reader')) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정을 로드합니다. 파일이 없으면 기본값을 반환합니다.
   */
  async loadConfig(): Promise<Config> {
    if (await fs.pathExists(this.configPath)) {
      // 저장된 설정과 기본값을 병합 (새로운 설정 항목 대응)
      return normalizeConfig(await fs.readJson(this.configPath));
    }
    return { ...DEFAULT_CONFIG };
  }

  /**
   * 설정을 저장합니다.
   */
  async saveConfig(config: Config): Promise<void> {
    await this.ensureDirectories();
    await fs.writeJson(this.configPath, config, { spaces: 2 });
  }

  /**
   * 특정 설정값을 업데이트합니다.
   */
  async updateConfig(updates: Partial<Config>): Promise<Config> {
    const newConfig = normalizeConfig({ ...(await this.loadConfig()), ...updates });
    await this.saveConfig(newConfig);
    return newConfig;
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getLogsDir(): string {
    return this.logsDir;
  }

  /**
   * 설정을 동기적으로 로드합니다 (CLI용).
   */
  getConfig(): Config {
    if (!fs.pathExistsSync(this.configPath)) {
      return { ...DEFAULT_CONFIG };
    }
    return normalizeConfig(fs.readJsonSync(this.configPath));
  }

  /**
   * 설정값을 동기적으로 설정합니다 (CLI용).
   */
  set(key: ConfigKey, value: string): Config {
    const config = normalizeConfig({ ...this.getConfig(), [key]: value });
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, config, { spaces: 2 });
    return config;
  }

  /**
   * 설정을 동기적으로 초기화합니다 (CLI용).
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
