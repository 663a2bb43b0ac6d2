/**
 * Bounded Decompressor
 * 판별된 압축 형식에 맞는 스트리밍 해제 + 해제 후 바이트 상한 적용
 */

import { Readable, type Transform } from 'stream';
import * as zlib from 'zlib';
import * as fzstd from 'fzstd';
import { XzReadableStream } from 'xz-decompress';
import { DecodeError, MetadataError, UnsupportedFormatError, errorMessage } from '../errors';
import { DEFAULT_MAX_XML_SIZE, type CompressionKind } from '../types';
import { PeekableSource, sniffCompression, type ByteSource } from './sniffer';
import logger from '../../../utils/logger';

export interface DecompressOptions {
  /** 해제 후 최대 바이트 수 (도달하면 조용히 잘림) */
  maxSize?: number;
  /** 압축되지 않은 입력을 그대로 통과시킬지 여부 */
  allowUncompressed?: boolean;
}

/**
 * 상한에 도달하면 스트림을 끊는 바이트 스트림.
 * 잘림은 에러가 아니며 truncated 로만 드러난다.
 */
export class BoundedStream implements AsyncIterable<Uint8Array> {
  private cut = false;

  constructor(
    private readonly source: ByteSource,
    public readonly kind: CompressionKind,
    public readonly maxSize: number,
  ) {}

  get truncated(): boolean {
    return this.cut;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    let remaining = this.maxSize;

    for await (const chunk of this.source) {
      if (chunk.length > remaining) {
        if (remaining > 0) yield chunk.subarray(0, remaining);
        // for-await 탈출 시 상위 해제 스트림의 정리(return)가 호출된다
        this.cut = true;
        logger.debug('압축 해제 크기 상한 도달, 스트림 절단', { kind: this.kind, maxSize: this.maxSize });
        return;
      }
      remaining -= chunk.length;
      yield chunk;
    }
  }
}

/**
 * zlib Transform 스트림으로 해제
 */
async function* inflateWith(source: ByteSource, transform: Transform): AsyncGenerator<Uint8Array> {
  const input = Readable.from(source);
  input.on('error', (error) => transform.destroy(error));
  input.pipe(transform);

  try {
    for await (const chunk of transform) {
      const data: unknown = chunk;
      if (data instanceof Uint8Array) yield data;
    }
  } finally {
    input.destroy();
    transform.destroy();
  }
}

/**
 * zstd 스트리밍 해제 (fzstd)
 */
async function* inflateZstd(source: ByteSource): AsyncGenerator<Uint8Array> {
  const pending: Uint8Array[] = [];
  const decompressor = new fzstd.Decompress((chunk) => {
    pending.push(chunk);
  });

  for await (const chunk of source) {
    decompressor.push(chunk);
    while (pending.length > 0) {
      const next = pending.shift();
      if (next) yield next;
    }
  }

  decompressor.push(new Uint8Array(0), true);
  yield* pending.splice(0);
}

/**
 * xz 스트리밍 해제 (xz-decompress, Web Streams 기반)
 */
async function* inflateXz(source: ByteSource): AsyncGenerator<Uint8Array> {
  const iterator = source[Symbol.asyncIterator]();
  const compressed = new ReadableStream<Uint8Array>({
    async pull(controller) {
      const next = await iterator.next();
      if (next.done) {
        controller.close();
      } else {
        controller.enqueue(next.value);
      }
    },
    async cancel() {
      await iterator.return?.();
    },
  });

  const reader = new XzReadableStream(compressed).getReader();
  let finished = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * 압축 형식에 맞는 해제 스트림 생성
 */
export function createDecompressor(kind: CompressionKind, source: ByteSource): ByteSource {
  switch (kind) {
    case 'gzip':
      return inflateWith(source, zlib.createGunzip());
    case 'zstd':
      return inflateZstd(source);
    case 'xz':
      return inflateXz(source);
    case 'none':
      return source;
    default:
      throw new UnsupportedFormatError();
  }
}

/**
 * 압축 형식을 판별해 해제하고 해제 후 바이트 상한을 건다.
 */
export async function openDecompressed(
  body: ByteSource,
  options: DecompressOptions = {}
): Promise<BoundedStream> {
  const maxSize = options.maxSize ?? DEFAULT_MAX_XML_SIZE;
  const source = new PeekableSource(body);
  const kind = await sniffCompression(source);

  if (kind === 'none' && !options.allowUncompressed) {
    throw new UnsupportedFormatError();
  }

  logger.debug('압축 형식 판별', { kind, maxSize });
  return new BoundedStream(createDecompressor(kind, source), kind, maxSize);
}

/**
 * 취소(abort)로 끝난 스트림인지 여부
 */
export function isCancellation(error: unknown): error is Error {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError');
}

/**
 * 디코딩 중 발생한 에러를 DecodeError로 정규화한다.
 * 취소와 DecodeError 이외의 MetadataError는 그대로 돌려준다.
 */
export function toDecodeError<T>(error: unknown, partial: readonly T[] = []): Error {
  if (isCancellation(error)) {
    return error;
  }
  if (error instanceof MetadataError && !(error instanceof DecodeError)) {
    return error;
  }
  if (error instanceof DecodeError) {
    return new DecodeError<T>(error.message, partial, error.cause ?? error);
  }
  return new DecodeError<T>(`error decoding stream: ${errorMessage(error)}`, partial, error);
}
