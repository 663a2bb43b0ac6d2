/**
 * YUM Repository Metadata
 * 저장소 URL 하나에 대해 repomd, primary, comps, modules, 서명을 가져오고
 * 디코딩 결과를 설정 수명 동안 캐시하는 파사드
 */

import axios, { type AxiosInstance } from 'axios';
import type { Readable } from 'stream';
import { MetadataCache, type ArtifactKind, type ArtifactValues } from './cache';
import { parseCompsXml } from './comps-parser';
import { isCancellation } from './compression/decompressor';
import { ConfigurationError, TransportError, errorMessage, withStatus } from './errors';
import { getBytes, getStream, getText, type RequestOptions } from './http';
import { parseModuleMds } from './modulemd-parser';
import { parsePrimaryXml } from './primary-parser';
import { findArtifactHref, parseRepomdXml, requireArtifactHref } from './repomd-parser';
import {
  DEFAULT_MAX_XML_SIZE,
  type Comps,
  type EnvironmentRecord,
  type FetchResult,
  type GroupRecord,
  type MetadataRepository,
  type ModuleMd,
  type PackageRecord,
  type RepomdIndex,
  type RepositorySettings,
  type RepositoryVariables,
} from './types';
import { REPOMD_PATH, joinRepositoryUrl, resolveUrlVariables } from './url';
import logger from '../../utils/logger';

const DEFAULT_TIMEOUT = 60000;

interface ResolvedSettings {
  url: string;
  client: AxiosInstance;
  maxXmlSize: number;
  variables: RepositoryVariables;
}

/**
 * 기본 HTTP 클라이언트
 */
export function createDefaultClient(timeout: number = DEFAULT_TIMEOUT, userAgent?: string): AxiosInstance {
  return axios.create({
    timeout,
    headers: {
      Accept: '*/*',
      ...(userAgent ? { 'User-Agent': userAgent } : {}),
    },
  });
}

export class YumRepository implements MetadataRepository {
  private settings: ResolvedSettings;
  private cache = new MetadataCache();

  constructor(settings: RepositorySettings) {
    if (!settings.url) {
      throw new ConfigurationError('url cannot be empty');
    }
    this.settings = {
      url: settings.url,
      client: settings.client ?? createDefaultClient(),
      maxXmlSize: settings.maxXmlSize ?? DEFAULT_MAX_XML_SIZE,
      variables: settings.variables ?? {},
    };
  }

  /**
   * 설정을 변경한다. 지정된 항목만 바뀌고 캐시는 모두 비워진다.
   */
  configure(settings: RepositorySettings): void {
    this.settings = {
      url: settings.url || this.settings.url,
      client: settings.client ?? this.settings.client,
      maxXmlSize: settings.maxXmlSize ?? this.settings.maxXmlSize,
      variables: settings.variables ?? this.settings.variables,
    };
    this.clear();
  }

  /**
   * 캐시된 메타데이터 전체 초기화
   */
  clear(): void {
    this.cache.clear();
  }

  /**
   * 변수 치환이 끝난 저장소 베이스 URL
   */
  get baseUrl(): string {
    return resolveUrlVariables(this.settings.url, this.settings.variables);
  }

  get maxXmlSize(): number {
    return this.settings.maxXmlSize;
  }

  getRepomdUrl(): string {
    return joinRepositoryUrl(this.baseUrl, REPOMD_PATH);
  }

  getSignatureUrl(): string {
    return `${this.getRepomdUrl()}.asc`;
  }

  /**
   * repomd.xml의 href를 저장소 URL로 변환
   */
  getArtifactUrl(href: string): string {
    return joinRepositoryUrl(this.baseUrl, href);
  }

  /**
   * repomd.xml 가져오기
   */
  async fetchRepomd(options: RequestOptions = {}): Promise<FetchResult<RepomdIndex>> {
    return this.load('repomd', async () => {
      const url = this.getRepomdUrl();
      const { data, status } = await getBytes(this.settings.client, url, options);
      try {
        return { data: parseRepomdXml(data), status };
      } catch (error) {
        throw withStatus(error, status);
      }
    });
  }

  /**
   * primary 메타데이터의 RPM 패키지 목록 가져오기
   */
  async fetchPackages(options: RequestOptions = {}): Promise<FetchResult<PackageRecord[]>> {
    return this.load('packages', async () => {
      const { data: repomd } = await this.fetchRepomd(options);
      const url = this.getArtifactUrl(requireArtifactHref(repomd, 'primary'));
      return this.decode(url, options, (body) => parsePrimaryXml(body, this.settings.maxXmlSize));
    });
  }

  /**
   * comps (그룹/환경) 가져오기. 저장소에 group 항목이 없으면 data는 null.
   */
  async fetchComps(options: RequestOptions = {}): Promise<FetchResult<Comps | null>> {
    return this.load('comps', async () => {
      const { data: repomd, status } = await this.fetchRepomd(options);
      const href = findArtifactHref(repomd, 'group');
      if (href === undefined) {
        return { data: null, status };
      }
      return this.decode(this.getArtifactUrl(href), options, (body) =>
        parseCompsXml(body, this.settings.maxXmlSize)
      );
    });
  }

  async fetchGroups(options: RequestOptions = {}): Promise<FetchResult<GroupRecord[]>> {
    const { data, status } = await this.fetchComps(options);
    return { data: data?.groups ?? [], status };
  }

  async fetchEnvironments(options: RequestOptions = {}): Promise<FetchResult<EnvironmentRecord[]>> {
    const { data, status } = await this.fetchComps(options);
    return { data: data?.environments ?? [], status };
  }

  /**
   * modulemd 문서 가져오기. 저장소에 modules 항목이 없으면 빈 목록.
   */
  async fetchModuleStreams(options: RequestOptions = {}): Promise<FetchResult<ModuleMd[]>> {
    return this.load('moduleStreams', async () => {
      const { data: repomd, status } = await this.fetchRepomd(options);
      const href = findArtifactHref(repomd, 'modules');
      if (href === undefined) {
        return { data: [], status };
      }
      return this.decode(this.getArtifactUrl(href), options, (body) =>
        parseModuleMds(body, this.settings.maxXmlSize)
      );
    });
  }

  /**
   * repomd.xml.asc 분리 서명 가져오기 (검증하지 않음)
   */
  async fetchSignature(options: RequestOptions = {}): Promise<FetchResult<string>> {
    return this.load('signature', () => getText(this.settings.client, this.getSignatureUrl(), options));
  }

  /**
   * 캐시 확인 -> 가져오기 -> 캐시 저장
   */
  private async load<K extends ArtifactKind>(
    kind: K,
    loader: () => Promise<FetchResult<ArtifactValues[K]>>
  ): Promise<FetchResult<ArtifactValues[K]>> {
    const cached = this.cache.get(kind);
    if (cached) {
      return cached;
    }

    const epoch = this.cache.epoch;
    try {
      const result = await loader();
      logger.debug('저장소 메타데이터 로드', { kind, url: this.settings.url, status: result.status });
      return this.cache.set(kind, result, epoch);
    } catch (error) {
      logger.error('저장소 메타데이터 로드 실패', {
        kind,
        url: this.settings.url,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  /**
   * 아티팩트 스트림을 받아 디코딩한다. 디코딩 에러에는 응답 상태 코드가 붙는다.
   * 본문 수신 중 연결이 끊기면 디코딩 에러가 아니라 TransportError로 보고한다.
   */
  private async decode<T>(
    url: string,
    options: RequestOptions,
    parse: (body: Readable) => Promise<T>
  ): Promise<FetchResult<T>> {
    const { data: body, status } = await getStream(this.settings.client, url, options);
    let bodyError: unknown;
    body.once('error', (error) => {
      bodyError = error;
    });

    try {
      return { data: await parse(body), status };
    } catch (error) {
      if (bodyError !== undefined && !isCancellation(bodyError)) {
        throw new TransportError(`io read failure for ${url}: ${errorMessage(bodyError)}`, status, bodyError);
      }
      throw withStatus(error, status);
    } finally {
      body.destroy();
    }
  }
}
