import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, isConfigKey, type ConfigKey } from '../../core/config';
import { errorMessage } from '../../core/metadata';

const descriptions: Record<ConfigKey, string> = {
  maxXmlSize: '압축 해제 최대 크기 (bytes)',
  timeoutMs: 'HTTP 타임아웃 (ms)',
  userAgent: 'User-Agent 헤더',
  logLevel: '로그 레벨',
  basearch: '$basearch 치환값',
  releasever: '$releasever 치환값',
};

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const config = getConfigManager().getConfig();

  if (key) {
    if (isConfigKey(key) && config[key] !== undefined) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(config[key])));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  if (!isConfigKey(key)) {
    console.error(chalk.red(`알 수 없는 설정 키: ${key}`));
    process.exit(1);
  }

  try {
    const config = getConfigManager().set(key, value);
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(config[key])}`));
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${errorMessage(error)}`));
    process.exit(1);
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const configManager = getConfigManager();
  const config = configManager.getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [15, 30, 30],
  });

  for (const key of Object.keys(descriptions)) {
    if (!isConfigKey(key)) continue;
    const value = config[key];
    table.push([key, value === undefined ? '-' : String(value), descriptions[key]]);
  }

  console.log(table.toString());
  console.log(chalk.gray(`\n설정 파일: ${configManager.getConfigPath()}`));
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  getConfigManager().reset();
  console.log(chalk.green('✓ 설정이 초기화되었습니다'));
}
