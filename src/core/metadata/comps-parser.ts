/**
 * Comps XML Parser
 * comps.xml에서 패키지 그룹과 환경을 한 번의 스트리밍 패스로 추출
 */

import { openDecompressed, toDecodeError } from './compression/decompressor';
import type { ByteSource } from './compression/sniffer';
import {
  attributeValue,
  childElement,
  childElements,
  childText,
  streamElements,
  type XmlElement,
} from './xml/element-stream';
import { DecodeError } from './errors';
import {
  DEFAULT_MAX_XML_SIZE,
  type Comps,
  type EnvironmentRecord,
  type GroupRecord,
} from './types';
import logger from '../../utils/logger';

const COMPS_ELEMENTS: ReadonlySet<string> = new Set(['group', 'environment']);

/**
 * 로케일이 지정되지 않은(xml:lang 없는) 첫 번째 항목의 텍스트.
 * 번역된 항목은 모두 버린다.
 */
export function pickDefaultLocale(entries: XmlElement[]): string | undefined {
  const entry = entries.find((candidate) => attributeValue(candidate, 'lang') === undefined);
  return entry?.text.trim();
}

function decodeLocalized(element: XmlElement, kind: string) {
  const id = childText(element, 'id');
  const name = pickDefaultLocale(childElements(element, 'name'));
  if (name === undefined) {
    throw new DecodeError(`${kind} '${id}' has no default-locale name`);
  }
  const description = pickDefaultLocale(childElements(element, 'description')) ?? '';
  return { id, name, description };
}

export function decodeGroupElement(element: XmlElement): GroupRecord {
  const packageList = childElement(element, 'packagelist');
  return {
    ...decodeLocalized(element, 'group'),
    packageList: packageList
      ? childElements(packageList, 'packagereq').map((req) => req.text.trim())
      : [],
  };
}

export function decodeEnvironmentElement(element: XmlElement): EnvironmentRecord {
  return decodeLocalized(element, 'environment');
}

/**
 * comps.xml 스트림(압축 여부 무관)에서 그룹/환경 목록을 추출한다.
 * 종류별로 문서 순서가 유지된다. 실패 시 partial은 두 종류를 섞어 도착 순서대로 담는다.
 */
export async function parseCompsXml(
  body: ByteSource,
  maxSize: number = DEFAULT_MAX_XML_SIZE
): Promise<Comps> {
  const stream = await openDecompressed(body, { maxSize, allowUncompressed: true });
  const groups: GroupRecord[] = [];
  const environments: EnvironmentRecord[] = [];
  const records: Array<GroupRecord | EnvironmentRecord> = [];

  try {
    for await (const element of streamElements(stream, COMPS_ELEMENTS)) {
      if (element.local === 'group') {
        const group = decodeGroupElement(element);
        groups.push(group);
        records.push(group);
      } else {
        const environment = decodeEnvironmentElement(element);
        environments.push(environment);
        records.push(environment);
      }
    }
  } catch (error) {
    throw toDecodeError(error, records);
  }

  logger.debug('comps.xml 파싱 완료', {
    groups: groups.length,
    environments: environments.length,
    truncated: stream.truncated,
  });
  return { groups, environments };
}
