/**
 * Module Stream Parser
 * modules.yaml(.gz|.zst)은 modulemd, modulemd-defaults, modulemd-obsoletes 등
 * 서로 모양이 다른 문서가 섞인 multi-document 스트림이다.
 *
 * 1단계: 문서를 하나씩 타입 없는 mapping으로 읽는다 (하나라도 실패하면 전체 실패)
 * 2단계: document 값이 "modulemd"인 문서만 스키마로 다시 디코딩한다
 */

import * as yaml from 'js-yaml';
import { z } from 'zod';
import { BoundedStream, openDecompressed, toDecodeError } from './compression/decompressor';
import type { ByteSource } from './compression/sniffer';
import { DecodeError, errorMessage } from './errors';
import { DEFAULT_MAX_XML_SIZE, type ModuleMd } from './types';
import logger from '../../utils/logger';

export const MODULEMD_DOCUMENT = 'modulemd';

type GenericDocument = Record<string, unknown>;

// null/빈 값은 없는 것으로 취급
const absentAsUndefined = (value: unknown) => (value === null || value === '' ? undefined : value);

// 스칼라만 문자열로 받는다 (mapping/sequence는 에러)
const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const scalarString = z.preprocess(absentAsUndefined, scalar.default(''));

const integer = z.preprocess(
  (value) => (absentAsUndefined(value) === undefined ? 0 : Number(value)),
  z.number().int()
);

// 단일 값도 목록으로 받는다
const stringList = z.preprocess((value) => {
  const present = absentAsUndefined(value);
  if (present === undefined) return [];
  return Array.isArray(present) ? present : [present];
}, z.array(scalar));

const RpmListSchema = z.preprocess(
  (value) => absentAsUndefined(value) ?? {},
  z.object({ rpms: stringList })
);

export const ModuleStreamSchema = z.preprocess(
  (value) => absentAsUndefined(value) ?? {},
  z.object({
    name: scalarString,
    stream: scalarString,
    version: scalarString,
    context: scalarString,
    arch: scalarString,
    summary: scalarString,
    description: scalarString,
    artifacts: RpmListSchema,
    profiles: z.preprocess(
      (value) => absentAsUndefined(value) ?? {},
      z.record(z.string(), RpmListSchema)
    ),
  })
);

export const ModuleMdSchema = z.object({
  document: z.literal(MODULEMD_DOCUMENT),
  version: integer,
  data: ModuleStreamSchema,
});

function isGenericDocument(value: unknown): value is GenericDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const DOCUMENT_START = /^---(?:[ \t]|$)/;
const DOCUMENT_END = /^\.\.\.[ \t]*$/;
// 빈 줄, 주석, 지시자(%YAML)
const BLANK = /^(?:[ \t]*(?:#.*)?|%.*)$/;

function isContent(line: string): boolean {
  if (DOCUMENT_END.test(line)) return false;
  if (DOCUMENT_START.test(line)) return /^---[ \t]+[^\s#]/.test(line);
  return !BLANK.test(line);
}

/**
 * 해제된 스트림을 문서 경계(---, ...) 줄 단위로 나눠 문서 텍스트를 하나씩 yield 한다.
 * 전체 텍스트를 한 문자열로 모으지 않는다. 크기 상한으로 잘린 마지막 문서는 버린다.
 */
export async function* splitYamlDocuments(source: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8');
  let pending = '';
  let lines: string[] = [];
  let content = false;

  function* flush(): Generator<string> {
    if (content) yield lines.join('\n') + '\n';
    lines = [];
    content = false;
  }

  function* accept(line: string): Generator<string> {
    // 내용 없는 문서 뒤의 ---는 빈 문서를 버리고 새로 시작
    if (DOCUMENT_START.test(line) && (content || lines.some((prev) => DOCUMENT_START.test(prev)))) {
      yield* flush();
    }
    lines.push(line);
    content ||= isContent(line);
    if (DOCUMENT_END.test(line)) {
      yield* flush();
    }
  }

  for await (const chunk of source) {
    pending += decoder.decode(chunk, { stream: true });
    const parts = pending.split('\n');
    pending = parts.pop() ?? '';
    for (const line of parts) {
      yield* accept(line.endsWith('\r') ? line.slice(0, -1) : line);
    }
  }

  if (source instanceof BoundedStream && source.truncated) {
    return;
  }

  pending += decoder.decode();
  if (pending.length > 0) {
    yield* accept(pending);
  }
  yield* flush();
}

/**
 * 1단계: 문서 하나를 타입 없는 mapping으로 디코딩한다. 빈 문서는 undefined.
 * 모든 스칼라는 원문 문자열로 유지된다 (19자리 버전 등 정밀도 손실 방지).
 */
export function loadGenericDocument(text: string, index: number): GenericDocument | undefined {
  let doc: unknown;
  try {
    doc = yaml.load(text, { schema: yaml.FAILSAFE_SCHEMA });
  } catch (error) {
    throw new DecodeError(`error decoding streams: ${errorMessage(error)}`, [], error);
  }

  if (doc === null || doc === undefined) return undefined;
  if (!isGenericDocument(doc)) {
    throw new DecodeError(`error decoding streams: document ${index} is not a mapping`);
  }
  return doc;
}

/**
 * 2단계: modulemd 문서 하나를 약한 타입 변환으로 디코딩한다.
 */
export function decodeModuleMd(doc: GenericDocument): ModuleMd {
  const result = ModuleMdSchema.safeParse(doc);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new DecodeError(`error decoding map: ${issue.path.join('.')}: ${issue.message}`);
  }
  return result.data;
}

/**
 * modules.yaml 스트림에서 modulemd 문서를 추출한다. 다른 종류의 문서는 건너뛴다.
 * 문서는 하나씩 읽어 디코딩하며, 어떤 단계에서든 실패하면 부분 결과 없이 DecodeError를 던진다.
 */
export async function parseModuleMds(
  body: ByteSource,
  maxSize: number = DEFAULT_MAX_XML_SIZE
): Promise<ModuleMd[]> {
  const stream = await openDecompressed(body, { maxSize, allowUncompressed: true });

  const skipped: Record<string, number> = {};
  const modules: ModuleMd[] = [];
  let index = 0;

  try {
    for await (const text of splitYamlDocuments(stream)) {
      const doc = loadGenericDocument(text, index++);
      if (doc === undefined) continue;
      if (doc.document !== MODULEMD_DOCUMENT) {
        const kind = String(doc.document);
        skipped[kind] = (skipped[kind] ?? 0) + 1;
        continue;
      }
      modules.push(decodeModuleMd(doc));
    }
  } catch (error) {
    throw toDecodeError(error);
  }

  logger.debug('modules.yaml 파싱 완료', { modules: modules.length, skipped, truncated: stream.truncated });
  return modules;
}
