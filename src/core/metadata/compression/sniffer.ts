/**
 * Compression Format Sniffer
 * 스트림 앞부분(20 bytes)의 매직 넘버로 압축 형식 판별
 */

import { ReadError } from '../errors';
import type { CompressionKind } from '../types';

// 가장 긴 매직 넘버보다 넉넉한 prefix 길이
export const SNIFF_LENGTH = 20;

const MAGIC_NUMBERS: Array<{ kind: Exclude<CompressionKind, 'none'>; bytes: number[] }> = [
  { kind: 'gzip', bytes: [0x1f, 0x8b] },
  { kind: 'xz', bytes: [0xfd, 0x37, 0x7a, 0x58, 0x5a] },
  { kind: 'zstd', bytes: [0x28, 0xb5, 0x2f, 0xfd] },
];

export type ByteSource = AsyncIterable<Uint8Array>;

/**
 * 앞부분을 소비하지 않고 미리 볼 수 있는 바이트 소스
 */
export class PeekableSource implements AsyncIterable<Uint8Array> {
  private buffered: Uint8Array[] = [];
  private bufferedLength = 0;
  private iterator: AsyncIterator<Uint8Array>;
  private done = false;
  private consumed = false;

  constructor(source: ByteSource) {
    this.iterator = source[Symbol.asyncIterator]();
  }

  /**
   * 최소 length 바이트를 버퍼링하고 앞부분을 반환한다.
   * 스트림이 그보다 짧으면 있는 만큼만 반환한다.
   */
  async peek(length: number): Promise<Uint8Array> {
    while (this.bufferedLength < length && !this.done) {
      const next = await this.iterator.next();
      if (next.done) {
        this.done = true;
        break;
      }
      if (next.value.length === 0) continue;
      this.buffered.push(next.value);
      this.bufferedLength += next.value.length;
    }

    const joined = Buffer.concat(this.buffered, this.bufferedLength);
    this.buffered = joined.length > 0 ? [joined] : [];
    return joined.subarray(0, Math.min(length, joined.length));
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    if (this.consumed) {
      throw new ReadError('byte source has already been consumed');
    }
    this.consumed = true;

    try {
      const pending = this.buffered;
      this.buffered = [];
      this.bufferedLength = 0;
      yield* pending;

      while (!this.done) {
        const next = await this.iterator.next();
        if (next.done) {
          this.done = true;
          break;
        }
        yield next.value;
      }
    } finally {
      // 소비자가 중간에 멈추면 원본 스트림도 정리
      if (!this.done) {
        this.done = true;
        await this.iterator.return?.();
      }
    }
  }
}

/**
 * prefix로 압축 형식 판별
 */
export function detectCompression(header: Uint8Array): CompressionKind {
  for (const { kind, bytes } of MAGIC_NUMBERS) {
    if (header.length >= bytes.length && bytes.every((byte, i) => header[i] === byte)) {
      return kind;
    }
  }
  return 'none';
}

/**
 * 소스를 소비하지 않고 압축 형식을 판별한다.
 * prefix 길이만큼 읽을 수 없으면 추측하지 않고 ReadError를 던진다.
 */
export async function sniffCompression(source: PeekableSource): Promise<CompressionKind> {
  const header = await source.peek(SNIFF_LENGTH);
  if (header.length < SNIFF_LENGTH) {
    throw new ReadError(
      `unable to read ${SNIFF_LENGTH} byte header: input ended after ${header.length} bytes`,
    );
  }
  return detectCompression(header);
}
