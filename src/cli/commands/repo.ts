import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager } from '../../core/config';
import {
  YumRepository,
  createDefaultClient,
  errorMessage,
  fetchGpgKey,
  parseArmoredKeyRing,
  MetadataError,
  type PackageVersion,
} from '../../core/metadata';

interface RepomdOptions {
  raw?: boolean;
}

interface PackagesOptions {
  filter?: string;
  limit: string;
}

interface ModulesOptions {
  name?: string;
}

/**
 * 설정 파일 값으로 저장소 파사드 생성
 */
export function createRepository(url: string): YumRepository {
  const config = getConfigManager().getConfig();
  return new YumRepository({
    url,
    client: createDefaultClient(config.timeoutMs, config.userAgent),
    maxXmlSize: config.maxXmlSize,
    variables: { basearch: config.basearch, releasever: config.releasever },
  });
}

/**
 * epoch:version-release 형식 (epoch 0은 생략)
 */
export function formatVersion(version: PackageVersion): string {
  const evr = `${version.version}-${version.release}`;
  return version.epoch > 0 ? `${version.epoch}:${evr}` : evr;
}

function fail(context: string, error: unknown): never {
  const status = error instanceof MetadataError && error.status > 0 ? ` (HTTP ${error.status})` : '';
  console.error(chalk.red(`${context}: ${errorMessage(error)}${status}`));
  process.exit(1);
}

/**
 * repomd 명령어 핸들러
 */
export async function repomdCommand(url: string, options: RepomdOptions): Promise<void> {
  try {
    const { data } = await createRepository(url).fetchRepomd();

    if (options.raw) {
      process.stdout.write(data.rawBytes);
      return;
    }

    console.log(chalk.cyan(`\nrevision: ${data.revision || '-'}\n`));

    const table = new Table({
      head: [chalk.cyan('타입'), chalk.cyan('위치'), chalk.cyan('체크섬'), chalk.cyan('크기')],
      colWidths: [22, 60, 12, 14],
    });

    for (const item of data.data) {
      table.push([item.type, item.href, item.checksum?.type ?? '-', item.size !== undefined ? String(item.size) : '-']);
    }

    console.log(table.toString());
  } catch (error) {
    fail('repomd.xml 조회 실패', error);
  }
}

/**
 * packages 명령어 핸들러
 */
export async function packagesCommand(url: string, options: PackagesOptions): Promise<void> {
  console.log(chalk.cyan('primary 메타데이터 로드 중...'));

  try {
    const { data } = await createRepository(url).fetchPackages();
    const filter = options.filter?.toLowerCase();
    const matched = filter ? data.filter((pkg) => pkg.name.toLowerCase().includes(filter)) : data;

    if (matched.length === 0) {
      console.log(chalk.yellow('패키지가 없습니다.'));
      return;
    }

    const limit = parseInt(options.limit, 10) || 50;
    const displayResults = matched.slice(0, limit);

    const table = new Table({
      head: [chalk.cyan('이름'), chalk.cyan('버전'), chalk.cyan('아키텍처'), chalk.cyan('요약')],
      colWidths: [30, 24, 10, 50],
    });

    for (const pkg of displayResults) {
      const summary = pkg.summary.length > 45 ? pkg.summary.slice(0, 45) + '...' : pkg.summary;
      table.push([pkg.name, formatVersion(pkg.version), pkg.arch, summary]);
    }

    console.log(table.toString());

    if (matched.length > limit) {
      console.log(chalk.gray(`\n... 외 ${matched.length - limit}개 패키지`));
    }
    console.log(chalk.green(`\n총 ${matched.length}개 패키지`));
  } catch (error) {
    fail('패키지 목록 조회 실패', error);
  }
}

/**
 * groups 명령어 핸들러
 */
export async function groupsCommand(url: string): Promise<void> {
  try {
    const { data } = await createRepository(url).fetchGroups();

    if (data.length === 0) {
      console.log(chalk.yellow('패키지 그룹이 없습니다.'));
      return;
    }

    const table = new Table({
      head: [chalk.cyan('ID'), chalk.cyan('이름'), chalk.cyan('패키지 수')],
      colWidths: [30, 40, 12],
    });

    for (const group of data) {
      table.push([group.id, group.name, String(group.packageList.length)]);
    }

    console.log(table.toString());
  } catch (error) {
    fail('그룹 조회 실패', error);
  }
}

/**
 * environments 명령어 핸들러
 */
export async function environmentsCommand(url: string): Promise<void> {
  try {
    const { data } = await createRepository(url).fetchEnvironments();

    if (data.length === 0) {
      console.log(chalk.yellow('환경이 없습니다.'));
      return;
    }

    const table = new Table({
      head: [chalk.cyan('ID'), chalk.cyan('이름'), chalk.cyan('설명')],
      colWidths: [30, 30, 50],
    });

    for (const env of data) {
      table.push([env.id, env.name, env.description || '-']);
    }

    console.log(table.toString());
  } catch (error) {
    fail('환경 조회 실패', error);
  }
}

/**
 * modules 명령어 핸들러
 */
export async function modulesCommand(url: string, options: ModulesOptions): Promise<void> {
  try {
    const { data } = await createRepository(url).fetchModuleStreams();
    const streams = options.name ? data.filter((doc) => doc.data.name === options.name) : data;

    if (streams.length === 0) {
      console.log(chalk.yellow('모듈 스트림이 없습니다.'));
      return;
    }

    const table = new Table({
      head: [
        chalk.cyan('이름'),
        chalk.cyan('스트림'),
        chalk.cyan('버전'),
        chalk.cyan('컨텍스트'),
        chalk.cyan('아키텍처'),
        chalk.cyan('프로파일'),
      ],
    });

    for (const { data: stream } of streams) {
      table.push([
        stream.name,
        stream.stream,
        stream.version,
        stream.context,
        stream.arch,
        Object.keys(stream.profiles).join(', ') || '-',
      ]);
    }

    console.log(table.toString());
  } catch (error) {
    fail('모듈 조회 실패', error);
  }
}

/**
 * signature 명령어 핸들러
 */
export async function signatureCommand(url: string): Promise<void> {
  try {
    const { data } = await createRepository(url).fetchSignature();
    console.log(data);
  } catch (error) {
    fail('서명 조회 실패', error);
  }
}

/**
 * gpg-key 명령어 핸들러
 */
export async function gpgKeyCommand(url: string): Promise<void> {
  try {
    const config = getConfigManager().getConfig();
    const { data } = await fetchGpgKey(url, createDefaultClient(config.timeoutMs, config.userAgent));
    const keys = await parseArmoredKeyRing(data);

    const table = new Table({
      head: [chalk.cyan('키 ID'), chalk.cyan('핑거프린트'), chalk.cyan('사용자 ID')],
    });

    for (const key of keys) {
      table.push([key.keyId, key.fingerprint, key.userIds.join('\n')]);
    }

    console.log(table.toString());
    console.log(chalk.green(`\n✓ 유효한 GPG 키 ${keys.length}개`));
  } catch (error) {
    fail('GPG 키 확인 실패', error);
  }
}
