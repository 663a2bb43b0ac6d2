import { describe, it, expect } from 'vitest';
import { PeekableSource, SNIFF_LENGTH, detectCompression, sniffCompression } from './sniffer';
import { ReadError } from '../errors';
import { chunked, collect, fromChunks, gzip, readFixture } from '../../../test-utils/metadata';

const padded = (prefix: number[]): Uint8Array => {
  const header = new Uint8Array(SNIFF_LENGTH);
  header.set(prefix);
  return header;
};

describe('detectCompression', () => {
  it('gzip 매직 넘버 판별', () => {
    expect(detectCompression(padded([0x1f, 0x8b, 0x08]))).toBe('gzip');
  });

  it('xz 매직 넘버 판별', () => {
    expect(detectCompression(padded([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]))).toBe('xz');
  });

  it('zstd 매직 넘버 판별', () => {
    expect(detectCompression(padded([0x28, 0xb5, 0x2f, 0xfd]))).toBe('zstd');
  });

  it('xz 매직 넘버가 일부만 일치하면 none', () => {
    expect(detectCompression(padded([0xfd, 0x37, 0x7a, 0x58]))).toBe('none');
  });

  it('XML 텍스트는 none', () => {
    expect(detectCompression(Buffer.from('<?xml version="1.0"?>'))).toBe('none');
  });

  it('빈 헤더는 none', () => {
    expect(detectCompression(new Uint8Array(0))).toBe('none');
  });
});

describe('sniffCompression', () => {
  it('픽스처 파일 형식 판별', async () => {
    expect(await sniffCompression(new PeekableSource(chunked(readFixture('primary.xml.gz'))))).toBe('gzip');
    expect(await sniffCompression(new PeekableSource(chunked(readFixture('primary.xml.xz'))))).toBe('xz');
    expect(await sniffCompression(new PeekableSource(chunked(readFixture('primary.xml.zst'))))).toBe('zstd');
  });

  it('20바이트보다 짧은 입력은 ReadError', async () => {
    const source = new PeekableSource(fromChunks(Buffer.from([0x1f, 0x8b, 0x08])));
    await expect(sniffCompression(source)).rejects.toThrow(ReadError);
  });

  it('빈 입력은 ReadError', async () => {
    const source = new PeekableSource(fromChunks());
    await expect(sniffCompression(source)).rejects.toThrow(
      'unable to read 20 byte header: input ended after 0 bytes'
    );
  });
});

describe('PeekableSource', () => {
  it('peek한 바이트를 소비하지 않음', async () => {
    const data = gzip('<metadata/>');
    const source = new PeekableSource(chunked(data, 3));

    const header = await source.peek(SNIFF_LENGTH);
    expect(header.length).toBe(SNIFF_LENGTH);

    const chunks = await collect(source);
    expect(Buffer.concat(chunks).equals(data)).toBe(true);
  });

  it('입력보다 긴 peek은 있는 만큼만 반환', async () => {
    const source = new PeekableSource(fromChunks(Buffer.from('abc'), Buffer.from('de')));
    const header = await source.peek(SNIFF_LENGTH);
    expect(Buffer.from(header).toString()).toBe('abcde');
  });

  it('두 번 순회하면 ReadError', async () => {
    const source = new PeekableSource(fromChunks(Buffer.from('abc')));
    await collect(source);
    await expect(collect(source)).rejects.toThrow(ReadError);
  });
});
