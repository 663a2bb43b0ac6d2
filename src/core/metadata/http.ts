/**
 * 메타데이터 HTTP GET (단일 시도, 재시도 없음)
 */

import type { Readable } from 'stream';
import { isAxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import { isCancellation } from './compression/decompressor';
import { TransportError, errorMessage } from './errors';
import { NO_RESPONSE_STATUS, type FetchResult } from './types';

export interface RequestOptions {
  /** 요청 취소 (진행 중인 디코딩도 다음 청크에서 중단됨) */
  signal?: AbortSignal;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status <= 299;
}

/**
 * 응답 본문을 스트림으로 가져온다. 2xx 이외의 응답은 TransportError.
 */
export async function getStream(
  client: AxiosInstance,
  url: string,
  options: RequestOptions = {}
): Promise<FetchResult<Readable>> {
  let response: AxiosResponse<Readable>;
  try {
    response = await client.get<Readable>(url, {
      responseType: 'stream',
      signal: options.signal,
      validateStatus: () => true,
    });
  } catch (error) {
    // 취소는 전송 실패로 바꾸지 않는다
    if (isCancellation(error)) throw error;
    const status = isAxiosError(error) ? error.response?.status ?? NO_RESPONSE_STATUS : NO_RESPONSE_STATUS;
    throw new TransportError(`GET error for file ${url}: ${errorMessage(error)}`, status, error);
  }

  if (!isSuccess(response.status)) {
    response.data.destroy();
    throw new TransportError(`Cannot fetch ${url}: received http ${response.status}`, response.status);
  }

  return { data: response.data, status: response.status };
}

/**
 * 스트림 전체를 바이트로 읽는다.
 */
export async function readAll(body: AsyncIterable<Uint8Array>): Promise<Buffer> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of body) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * 응답 본문을 바이트 그대로 가져온다.
 */
export async function getBytes(
  client: AxiosInstance,
  url: string,
  options: RequestOptions = {}
): Promise<FetchResult<Buffer>> {
  const { data, status } = await getStream(client, url, options);
  try {
    return { data: await readAll(data), status };
  } catch (error) {
    if (isCancellation(error)) throw error;
    throw new TransportError(`io read failure for ${url}: ${errorMessage(error)}`, status, error);
  }
}

/**
 * 응답 본문을 UTF-8 텍스트로 가져온다.
 */
export async function getText(
  client: AxiosInstance,
  url: string,
  options: RequestOptions = {}
): Promise<FetchResult<string>> {
  const { data, status } = await getBytes(client, url, options);
  return { data: data.toString('utf-8'), status };
}
