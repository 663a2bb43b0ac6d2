/**
 * Repository Metadata Types
 * repomd.xml, primary.xml, comps.xml, modules.yaml 디코딩 결과 타입 정의
 */

import type { AxiosInstance } from 'axios';

// 압축 형식 (스트림 앞부분 매직 넘버로 판별)
export type CompressionKind = 'none' | 'gzip' | 'xz' | 'zstd';

// repomd.xml에 등장하는 주요 아티팩트 타입 (그 외 타입도 그대로 보존됨)
export type KnownArtifactType = 'primary' | 'filelists' | 'other' | 'group' | 'modules' | 'updateinfo';

/**
 * 체크섬 정보
 */
export interface Checksum {
  type: string;
  value: string;
}

/**
 * repomd.xml data 항목
 */
export interface RepomdData {
  /** 아티팩트 타입 (primary, group, modules 등) */
  type: string;
  /** 저장소 기준 상대 경로 */
  href: string;
  checksum?: Checksum;
  openChecksum?: Checksum;
  timestamp?: number;
  /** 압축 크기 */
  size?: number;
  /** 압축 해제 후 크기 */
  openSize?: number;
}

/**
 * repomd.xml 파싱 결과
 */
export interface RepomdIndex {
  /** 저장소 리비전 */
  revision: string;
  /** 문서 순서 그대로의 data 항목 */
  data: RepomdData[];
  /** 원본 텍스트 (UTF-8로 읽은 것) */
  raw: string;
  /** 가져온 바이트 그대로 (서명 검증용) */
  rawBytes: Buffer;
}

export interface PackageVersion {
  version: string;
  release: string;
  epoch: number;
}

/**
 * primary.xml 패키지 레코드 (type="rpm"만 유지)
 */
export interface PackageRecord {
  type: 'rpm';
  name: string;
  arch: string;
  version: PackageVersion;
  checksum: Checksum;
  summary: string;
  /** 저장소 내 파일 경로 */
  location: string;
}

/**
 * comps.xml 패키지 그룹
 */
export interface GroupRecord {
  id: string;
  /** 기본 로케일 이름 */
  name: string;
  /** 기본 로케일 설명 */
  description: string;
  /** packagelist > packagereq 패키지 이름 */
  packageList: string[];
}

/**
 * comps.xml 환경
 */
export interface EnvironmentRecord {
  id: string;
  name: string;
  description: string;
}

export interface Comps {
  groups: GroupRecord[];
  environments: EnvironmentRecord[];
}

export interface RpmList {
  rpms: string[];
}

/**
 * 모듈 스트림 (modulemd 문서의 data)
 */
export interface ModuleStreamRecord {
  name: string;
  stream: string;
  version: string;
  context: string;
  arch: string;
  summary: string;
  description: string;
  artifacts: RpmList;
  /** 프로필 이름 -> RPM 목록 */
  profiles: Record<string, RpmList>;
}

/**
 * modulemd 문서
 */
export interface ModuleMd {
  document: 'modulemd';
  /** 문서 스키마 버전 */
  version: number;
  data: ModuleStreamRecord;
}

/**
 * 저장소 URL 변수 ($basearch, $releasever)
 */
export interface RepositoryVariables {
  basearch?: string;
  releasever?: string;
}

/**
 * 저장소 설정
 */
export interface RepositorySettings {
  /** 저장소 베이스 URL */
  url?: string;
  /** HTTP 클라이언트 */
  client?: AxiosInstance;
  /** 압축 해제 후 최대 크기 (bytes) */
  maxXmlSize?: number;
  variables?: RepositoryVariables;
}

/**
 * 가져오기 결과 (디코딩된 값 + HTTP 상태 코드)
 */
export interface FetchResult<T> {
  data: T;
  status: number;
}

/**
 * 저장소 메타데이터 파사드
 */
export interface MetadataRepository {
  configure(settings: RepositorySettings): void;
  clear(): void;
  fetchRepomd(): Promise<FetchResult<RepomdIndex>>;
  fetchPackages(): Promise<FetchResult<PackageRecord[]>>;
  fetchComps(): Promise<FetchResult<Comps | null>>;
  fetchGroups(): Promise<FetchResult<GroupRecord[]>>;
  fetchEnvironments(): Promise<FetchResult<EnvironmentRecord[]>>;
  fetchModuleStreams(): Promise<FetchResult<ModuleMd[]>>;
  fetchSignature(): Promise<FetchResult<string>>;
}

// 압축 해제 후 XML/YAML 최대 크기 기본값 (512 MiB)
export const DEFAULT_MAX_XML_SIZE = 512 * 1024 * 1024;

// 응답을 받지 못한 경우의 상태 코드
export const NO_RESPONSE_STATUS = 0;
