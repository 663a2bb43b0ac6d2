/**
 * Repomd XML Parser
 * repomd.xml (작고 압축되지 않은 인덱스)을 한 번에 파싱
 */

import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { DecodeError, MissingArtifactError, errorMessage } from './errors';
import type { Checksum, RepomdData, RepomdIndex } from './types';

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  removeNSPrefix: true,
  trimValues: true,
  isArray: (_name, jpath) => jpath === 'repomd.data',
});

// 빈 요소는 fast-xml-parser가 '' 로 돌려준다
const emptyAsObject = (value: unknown) => (value === '' || value === undefined ? {} : value);

const optionalNumber = z.preprocess(
  (value) => (value === undefined || value === '' ? undefined : Number(value)),
  z.number().finite().optional()
);

const ChecksumSchema = z.union([
  z.string().transform((value): Checksum => ({ type: '', value })),
  z
    .object({ '#text': z.string().default(''), '@_type': z.string().default('') })
    .transform((el): Checksum => ({ type: el['@_type'], value: el['#text'] })),
]);

const DataSchema = z.preprocess(
  emptyAsObject,
  z.object({
    '@_type': z.string().default(''),
    location: z.preprocess(emptyAsObject, z.object({ '@_href': z.string().default('') })),
    checksum: ChecksumSchema.optional(),
    'open-checksum': ChecksumSchema.optional(),
    timestamp: optionalNumber,
    size: optionalNumber,
    'open-size': optionalNumber,
  })
);

const RepomdDocumentSchema = z.object({
  repomd: z.preprocess(
    (value) => (value === '' ? {} : value),
    z.object({
      revision: z.string().default(''),
      data: z.array(DataSchema).default([]),
    })
  ),
});

/**
 * repomd.xml 바이트를 파싱한다. 입력 바이트는 rawBytes에 그대로 보존된다.
 */
export function parseRepomdXml(body: Uint8Array | string): RepomdIndex {
  const rawBytes = typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body);
  const raw = rawBytes.toString('utf-8');

  let parsed: unknown;
  try {
    parsed = xmlParser.parse(raw, true);
  } catch (error) {
    throw new DecodeError(`invalid repomd.xml: ${errorMessage(error)}`, [], error);
  }

  const result = RepomdDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'repomd';
    throw new DecodeError(`invalid repomd.xml: ${where}: ${issue.message}`);
  }

  const { repomd } = result.data;
  const data: RepomdData[] = repomd.data.map((entry) => ({
    type: entry['@_type'],
    href: entry.location['@_href'],
    checksum: entry.checksum,
    openChecksum: entry['open-checksum'],
    timestamp: entry.timestamp,
    size: entry.size,
    openSize: entry['open-size'],
  }));

  return { revision: repomd.revision, data, raw, rawBytes };
}

/**
 * 아티팩트 타입의 href 조회. 같은 타입이 여러 번 나오면 마지막 항목이 우선한다.
 * href가 비어 있으면 없는 것으로 본다.
 */
export function findArtifactHref(index: RepomdIndex, type: string): string | undefined {
  let href: string | undefined;
  for (const entry of index.data) {
    if (entry.type === type) {
      href = entry.href;
    }
  }
  return href ? href : undefined;
}

/**
 * 필수 아티팩트의 href 조회 (없으면 MissingArtifactError)
 */
export function requireArtifactHref(index: RepomdIndex, type: string): string {
  const href = findArtifactHref(index, type);
  if (href === undefined) {
    throw new MissingArtifactError(type);
  }
  return href;
}
