import { NO_RESPONSE_STATUS } from './types';

export type MetadataErrorCode =
  | 'TRANSPORT' // network failure or non-2xx response
  | 'UNSUPPORTED_FORMAT' // no known compression magic
  | 'DECODE' // XML/YAML structure could not be decoded
  | 'MISSING_ARTIFACT' // repomd has no entry of the requested type
  | 'READ' // input ended before the format could be sniffed
  | 'CONFIGURATION'; // repository settings are unusable

export class MetadataError extends Error {
  /** 관련 HTTP 상태 코드 (응답이 없으면 0) */
  public status: number;

  constructor(
    public readonly code: MetadataErrorCode,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'MetadataError';
    this.status = options?.status ?? NO_RESPONSE_STATUS;
  }
}

export class TransportError extends MetadataError {
  constructor(message: string, status: number = NO_RESPONSE_STATUS, cause?: unknown) {
    super('TRANSPORT', message, { status, cause });
    this.name = 'TransportError';
  }

  /** 서버 응답을 받았는지 여부 */
  get responded(): boolean {
    return this.status !== NO_RESPONSE_STATUS;
  }
}

export class UnsupportedFormatError extends MetadataError {
  constructor(message = 'unsupported input format: must be gzip, xz, or zstd') {
    super('UNSUPPORTED_FORMAT', message);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * 구조 디코딩 실패. 스트리밍 XML 디코딩에서는 실패 전까지 디코딩된 레코드를 partial에 담는다.
 * partial이 있어도 호출은 실패로 취급해야 한다.
 */
export class DecodeError<T = unknown> extends MetadataError {
  constructor(
    message: string,
    public readonly partial: readonly T[] = [],
    cause?: unknown,
  ) {
    super('DECODE', message, { cause });
    this.name = 'DecodeError';
  }
}

export class MissingArtifactError extends MetadataError {
  constructor(public readonly artifactType: string) {
    super('MISSING_ARTIFACT', `Unable to find '${artifactType}' location in repomd.xml`);
    this.name = 'MissingArtifactError';
  }
}

export class ReadError extends MetadataError {
  constructor(message: string, cause?: unknown) {
    super('READ', message, { cause });
    this.name = 'ReadError';
  }
}

export class ConfigurationError extends MetadataError {
  constructor(message: string) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 상태 코드가 비어 있는 MetadataError에 HTTP 상태 코드를 채운다.
 */
export function withStatus(error: unknown, status: number): unknown {
  if (error instanceof MetadataError && error.status === NO_RESPONSE_STATUS) {
    error.status = status;
  }
  return error;
}
