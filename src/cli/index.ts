#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigManager } from '../core/config';
import { initializeLogging } from '../utils/logger';

// 버전 정보
const VERSION = '1.0.0';

// 메인 프로그램
const program = new Command();

program
  .name('repomd-reader')
  .description(chalk.cyan('repomd-reader - YUM/DNF 저장소 메타데이터 조회 도구'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시')
  .option('--debug', '디버그 로그 출력')
  .hook('preAction', async (command) => {
    const configManager = getConfigManager();
    await configManager.ensureDirectories();
    initializeLogging({
      level: command.opts().debug ? 'debug' : configManager.getConfig().logLevel,
      logsDir: configManager.getLogsDir(),
    });
  });

// repomd 명령어
program
  .command('repomd')
  .description('repomd.xml 인덱스 조회')
  .argument('<url>', '저장소 베이스 URL')
  .option('--raw', '원본 XML 출력')
  .action(async (url, options) => {
    const { repomdCommand } = await import('./commands/repo');
    await repomdCommand(url, options);
  });

// packages 명령어
program
  .command('packages')
  .description('primary 메타데이터의 RPM 패키지 목록')
  .argument('<url>', '저장소 베이스 URL')
  .option('-f, --filter <name>', '패키지 이름 필터 (부분 일치)')
  .option('-l, --limit <num>', '결과 수 제한', '50')
  .action(async (url, options) => {
    const { packagesCommand } = await import('./commands/repo');
    await packagesCommand(url, options);
  });

// groups 명령어
program
  .command('groups')
  .description('comps 패키지 그룹 목록')
  .argument('<url>', '저장소 베이스 URL')
  .action(async (url) => {
    const { groupsCommand } = await import('./commands/repo');
    await groupsCommand(url);
  });

// environments 명령어
program
  .command('environments')
  .description('comps 환경 목록')
  .argument('<url>', '저장소 베이스 URL')
  .action(async (url) => {
    const { environmentsCommand } = await import('./commands/repo');
    await environmentsCommand(url);
  });

// modules 명령어
program
  .command('modules')
  .description('모듈 스트림 목록')
  .argument('<url>', '저장소 베이스 URL')
  .option('-n, --name <name>', '모듈 이름 필터')
  .action(async (url, options) => {
    const { modulesCommand } = await import('./commands/repo');
    await modulesCommand(url, options);
  });

// signature 명령어
program
  .command('signature')
  .description('repomd.xml.asc 분리 서명 출력')
  .argument('<url>', '저장소 베이스 URL')
  .action(async (url) => {
    const { signatureCommand } = await import('./commands/repo');
    await signatureCommand(url);
  });

// gpg-key 명령어
program
  .command('gpg-key')
  .description('GPG 공개키를 가져와 키링 형식 확인')
  .argument('<url>', 'GPG 키 URL')
  .action(async (url) => {
    const { gpgKeyCommand } = await import('./commands/repo');
    await gpgKeyCommand(url);
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key, value) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
