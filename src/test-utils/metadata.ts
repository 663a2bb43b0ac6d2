/**
 * 메타데이터 테스트 유틸리티
 * 픽스처 로딩, 압축, 청크 분할, 네트워크 없이 응답하는 axios 클라이언트
 */

import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import { Readable } from 'stream';
import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';

const FIXTURES_DIR = path.join(__dirname, '..', 'core', 'metadata', '__fixtures__');

/**
 * 픽스처 파일 읽기
 */
export function readFixture(name: string): Buffer {
  return fs.readFileSync(path.join(FIXTURES_DIR, name));
}

export function gzip(text: string | Buffer): Buffer {
  return zlib.gzipSync(text);
}

/**
 * 버퍼를 size 바이트 청크의 비동기 스트림으로 분할
 */
export async function* chunked(data: Uint8Array, size = 7): AsyncGenerator<Uint8Array> {
  for (let offset = 0; offset < data.length; offset += size) {
    yield data.subarray(offset, offset + size);
  }
}

export async function* fromChunks(...chunks: Uint8Array[]): AsyncGenerator<Uint8Array> {
  yield* chunks;
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/**
 * 스텁 응답: 본문(200), 상태 코드만 있는 응답, 또는 응답 없는 네트워크 에러.
 * fail이 있으면 본문을 보낸 뒤 응답 스트림이 그 에러로 끊긴다.
 */
export type StubResponse =
  | Buffer
  | string
  | { status: number; body?: Buffer | string; fail?: Error }
  | Error;

/**
 * 본문을 한 번 보낸 뒤 fail로 끊기는 응답 스트림
 */
function responseBody(body: Buffer, fail?: Error): Readable {
  if (!fail) {
    return Readable.from([body]);
  }
  let sent = false;
  const stream: Readable = new Readable({
    read() {
      if (sent) {
        setImmediate(() => stream.destroy(fail));
        return;
      }
      sent = true;
      this.push(body);
    },
  });
  return stream;
}

export interface StubClient {
  client: AxiosInstance;
  /** URL별 요청 횟수 */
  calls: Map<string, number>;
  /** 응답 교체 */
  routes: Map<string, StubResponse>;
}

/**
 * 등록된 URL에만 응답하는 axios 인스턴스. 등록되지 않은 URL은 404.
 */
export function createStubClient(initial: Record<string, StubResponse> = {}): StubClient {
  const routes = new Map(Object.entries(initial));
  const calls = new Map<string, number>();

  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      const url = config.url ?? '';
      calls.set(url, (calls.get(url) ?? 0) + 1);

      const route = routes.get(url) ?? { status: 404, body: 'not found' };
      if (route instanceof Error) {
        throw new AxiosError(route.message, 'ECONNREFUSED', config);
      }

      const { status, body, fail } =
        typeof route === 'string' || Buffer.isBuffer(route) ? { status: 200, body: route, fail: undefined } : route;

      return {
        data: responseBody(Buffer.from(body ?? ''), fail),
        status,
        statusText: String(status),
        headers: {},
        config,
      };
    },
  });

  return { client, calls, routes };
}
