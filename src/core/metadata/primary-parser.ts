/**
 * Primary XML Parser
 * primary.xml(.gz|.xz|.zst)을 스트리밍으로 읽어 RPM 패키지 레코드 추출
 */

import { z } from 'zod';
import { openDecompressed, toDecodeError } from './compression/decompressor';
import type { ByteSource } from './compression/sniffer';
import {
  attributeValue,
  childElement,
  childText,
  streamElements,
  type XmlElement,
} from './xml/element-stream';
import { DecodeError } from './errors';
import { DEFAULT_MAX_XML_SIZE, type PackageRecord } from './types';
import logger from '../../utils/logger';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

// 숫자 속성: 빈 문자열은 0
const int32Attribute = z.preprocess(
  (value) => (value === undefined || value === '' ? 0 : Number(value)),
  z.number().int().min(INT32_MIN).max(INT32_MAX)
);

export const PackageElementSchema = z.object({
  type: z.string(),
  name: z.string(),
  arch: z.string(),
  version: z.object({
    version: z.string(),
    release: z.string(),
    epoch: int32Attribute,
  }),
  checksum: z.object({
    type: z.string(),
    value: z.string(),
  }),
  summary: z.string(),
  location: z.string(),
});

export type PackageElement = z.infer<typeof PackageElementSchema>;

const PACKAGE_ELEMENTS: ReadonlySet<string> = new Set(['package']);

/**
 * package 요소 서브트리를 구조 디코딩한다 (type 필터 적용 전).
 */
export function decodePackageElement(element: XmlElement): PackageElement {
  const versionEl = childElement(element, 'version');
  const checksumEl = childElement(element, 'checksum');

  const result = PackageElementSchema.safeParse({
    type: attributeValue(element, 'type') ?? '',
    name: childText(element, 'name'),
    arch: childText(element, 'arch'),
    version: {
      version: attributeValue(versionEl, 'ver') ?? '',
      release: attributeValue(versionEl, 'rel') ?? '',
      epoch: attributeValue(versionEl, 'epoch'),
    },
    checksum: {
      type: attributeValue(checksumEl, 'type') ?? '',
      value: checksumEl?.text.trim() ?? '',
    },
    summary: childText(element, 'summary'),
    location: attributeValue(childElement(element, 'location'), 'href') ?? '',
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new DecodeError(`invalid package element: ${issue.path.join('.')}: ${issue.message}`);
  }
  return result.data;
}

function isRpm(pkg: PackageElement): pkg is PackageElement & { type: 'rpm' } {
  return pkg.type === 'rpm';
}

/**
 * 압축된 primary.xml 스트림에서 RPM 패키지 목록을 추출한다.
 *
 * 해제 후 크기가 maxSize를 넘으면 그 지점까지 파싱된 패키지만 에러 없이 반환한다.
 * 요소 디코딩에 실패하면 그 전까지의 패키지를 partial에 담은 DecodeError를 던진다.
 */
export async function parsePrimaryXml(
  body: ByteSource,
  maxSize: number = DEFAULT_MAX_XML_SIZE
): Promise<PackageRecord[]> {
  const stream = await openDecompressed(body, { maxSize });
  const packages: PackageRecord[] = [];
  let skipped = 0;

  try {
    for await (const element of streamElements(stream, PACKAGE_ELEMENTS)) {
      const pkg = decodePackageElement(element);
      // rpm 이외의 타입은 디코딩 후 버린다
      if (!isRpm(pkg)) {
        skipped++;
        continue;
      }
      packages.push(pkg);
    }
  } catch (error) {
    throw toDecodeError(error, packages);
  }

  logger.debug('primary.xml 파싱 완료', {
    packages: packages.length,
    skipped,
    truncated: stream.truncated,
  });
  return packages;
}
