import { describe, it, expect } from 'vitest';
import * as zlib from 'zlib';
import {
  BoundedStream,
  isCancellation,
  openDecompressed,
  toDecodeError,
} from './decompressor';
import { DecodeError, MissingArtifactError, UnsupportedFormatError } from '../errors';
import { chunked, collect, fromChunks, gzip, readFixture } from '../../../test-utils/metadata';

const text = async (source: AsyncIterable<Uint8Array>): Promise<string> =>
  Buffer.concat(await collect(source)).toString('utf-8');

const expectedXml = zlib.gunzipSync(readFixture('primary.xml.gz')).toString('utf-8');

describe('openDecompressed', () => {
  it.each(['primary.xml.gz', 'primary.xml.xz', 'primary.xml.zst'])('%s 해제 결과가 원본과 동일', async (name) => {
    const stream = await openDecompressed(chunked(readFixture(name), 64));
    expect(await text(stream)).toBe(expectedXml);
    expect(stream.truncated).toBe(false);
  });

  it('판별된 형식을 kind에 기록', async () => {
    const stream = await openDecompressed(chunked(readFixture('primary.xml.zst')));
    expect(stream.kind).toBe('zstd');
  });

  it('압축되지 않은 입력은 기본적으로 거부', async () => {
    await expect(openDecompressed(fromChunks(Buffer.from(expectedXml)))).rejects.toThrow(
      UnsupportedFormatError
    );
  });

  it('allowUncompressed면 그대로 통과', async () => {
    const stream = await openDecompressed(fromChunks(Buffer.from(expectedXml)), { allowUncompressed: true });
    expect(stream.kind).toBe('none');
    expect(await text(stream)).toBe(expectedXml);
  });

  it('상한을 넘으면 조용히 잘림', async () => {
    const stream = await openDecompressed(chunked(gzip('0123456789'.repeat(10))), { maxSize: 25 });
    expect(await text(stream)).toBe('0123456789012345678901234');
    expect(stream.truncated).toBe(true);
  });

  it('손상된 gzip 스트림은 해제 중 에러', async () => {
    const data = gzip('<metadata>' + 'x'.repeat(2000) + '</metadata>');
    const corrupted = data.subarray(0, data.length - 12);
    const stream = await openDecompressed(chunked(corrupted, 16));
    await expect(collect(stream)).rejects.toThrow();
  });
});

describe('BoundedStream', () => {
  it('상한과 정확히 같은 크기는 잘리지 않음', async () => {
    const stream = new BoundedStream(fromChunks(Buffer.from('abc'), Buffer.from('de')), 'none', 5);
    expect(await text(stream)).toBe('abcde');
    expect(stream.truncated).toBe(false);
  });

  it('상한 뒤에 데이터가 더 있으면 잘림', async () => {
    const stream = new BoundedStream(
      fromChunks(Buffer.from('abc'), Buffer.from('de'), Buffer.from('f')),
      'none',
      5
    );
    expect(await text(stream)).toBe('abcde');
    expect(stream.truncated).toBe(true);
  });

  it('청크 중간에서 잘림', async () => {
    const stream = new BoundedStream(fromChunks(Buffer.from('abcdef')), 'none', 4);
    expect(await text(stream)).toBe('abcd');
    expect(stream.truncated).toBe(true);
  });

  it('빈 입력', async () => {
    const stream = new BoundedStream(fromChunks(), 'none', 0);
    expect(await text(stream)).toBe('');
    expect(stream.truncated).toBe(false);
  });
});

describe('toDecodeError', () => {
  it('일반 에러는 partial을 담은 DecodeError로 변환', () => {
    const error = toDecodeError(new Error('unexpected end of file'), ['a']);
    expect(error).toBeInstanceOf(DecodeError);
    expect(error.message).toBe('error decoding stream: unexpected end of file');
    expect(error instanceof DecodeError ? error.partial : []).toEqual(['a']);
  });

  it('DecodeError는 메시지를 유지하고 partial만 교체', () => {
    const error = toDecodeError(new DecodeError('invalid package element: name: Required'), [1, 2]);
    expect(error.message).toBe('invalid package element: name: Required');
    expect(error instanceof DecodeError ? error.partial : []).toEqual([1, 2]);
  });

  it('다른 MetadataError는 그대로', () => {
    const original = new MissingArtifactError('primary');
    expect(toDecodeError(original)).toBe(original);
  });

  it('취소는 그대로', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(isCancellation(abort)).toBe(true);
    expect(toDecodeError(abort)).toBe(abort);
  });
});
