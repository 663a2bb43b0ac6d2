/**
 * Streaming XML Element Reader
 * SAX 토큰을 순서대로 읽으면서 지정된 요소의 서브트리만 materialize 한다.
 * 한 번에 하나의 레코드(서브트리)만 메모리에 유지된다.
 */

import { SaxesParser, type SaxesTagNS } from 'saxes';
import { BoundedStream } from '../compression/decompressor';
import type { ByteSource } from '../compression/sniffer';

/**
 * 디코딩 대상 요소의 구조 표현
 */
export interface XmlElement {
  /** 접두사 포함 이름 (rpm:entry) */
  name: string;
  /** 로컬 이름 (entry) */
  local: string;
  /** 접두사 포함 속성 이름 -> 값 */
  attributes: Record<string, string>;
  children: XmlElement[];
  /** 직계 텍스트 (chardata) */
  text: string;
}

function toElement(tag: SaxesTagNS): XmlElement {
  const attributes: Record<string, string> = {};
  for (const [name, attribute] of Object.entries(tag.attributes)) {
    attributes[name] = attribute.value;
  }
  return { name: tag.name, local: tag.local, attributes, children: [], text: '' };
}

/**
 * 로컬 이름이 names에 포함된 요소를 문서 순서대로 yield 한다.
 *
 * 입력이 크기 상한으로 잘린 BoundedStream이면 미완성 요소를 버리고 조용히 끝낸다.
 * 그 외의 XML 구문 오류는 그대로 throw 된다.
 */
export async function* streamElements(
  source: BoundedStream | ByteSource,
  names: ReadonlySet<string>
): AsyncGenerator<XmlElement> {
  const parser = new SaxesParser<{ xmlns: true; position: true }>({ xmlns: true, position: true });
  const completed: XmlElement[] = [];
  const stack: XmlElement[] = [];

  parser.on('opentag', (tag) => {
    if (stack.length === 0 && !names.has(tag.local)) return;

    const element = toElement(tag);
    const parent = stack[stack.length - 1];
    if (parent) parent.children.push(element);
    stack.push(element);
  });

  parser.on('closetag', () => {
    const element = stack.pop();
    if (element && stack.length === 0) {
      completed.push(element);
    }
  });

  const appendText = (text: string): void => {
    const current = stack[stack.length - 1];
    if (current) current.text += text;
  };
  parser.on('text', appendText);
  parser.on('cdata', appendText);

  // 구문 오류가 나도 그 전에 완성된 요소는 먼저 내보낸다
  function* step(action: () => void): Generator<XmlElement> {
    try {
      action();
    } catch (error) {
      yield* completed.splice(0);
      throw error;
    }
    yield* completed.splice(0);
  }

  const decoder = new TextDecoder('utf-8');
  let written = false;

  for await (const chunk of source) {
    const text = decoder.decode(chunk, { stream: true });
    if (text.length === 0) continue;
    written = true;
    yield* step(() => parser.write(text));
  }

  if (source instanceof BoundedStream && source.truncated) {
    // 상한에서 잘린 입력: 진행 중이던 요소는 버린다
    return;
  }

  const tail = decoder.decode();
  if (tail.length > 0) {
    written = true;
    yield* step(() => parser.write(tail));
  }
  if (written) {
    yield* step(() => parser.close());
  }
}

/**
 * 로컬 이름으로 첫 번째 직계 자식 찾기
 */
export function childElement(element: XmlElement, local: string): XmlElement | undefined {
  return element.children.find((child) => child.local === local);
}

/**
 * 로컬 이름으로 모든 직계 자식 찾기
 */
export function childElements(element: XmlElement, local: string): XmlElement[] {
  return element.children.filter((child) => child.local === local);
}

/**
 * 직계 자식의 텍스트 (없으면 빈 문자열)
 */
export function childText(element: XmlElement, local: string): string {
  return childElement(element, local)?.text.trim() ?? '';
}

/**
 * 로컬 이름으로 속성 값 조회 (접두사 무시)
 */
export function attributeValue(element: XmlElement | undefined, local: string): string | undefined {
  if (!element) return undefined;
  if (local in element.attributes) return element.attributes[local];
  const entry = Object.entries(element.attributes).find(([name]) => name.split(':').pop() === local);
  return entry?.[1];
}
