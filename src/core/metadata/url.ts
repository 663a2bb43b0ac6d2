/**
 * 저장소 URL 처리
 */

import * as path from 'path';
import { ConfigurationError } from './errors';
import type { RepositoryVariables } from './types';

export const REPOMD_PATH = 'repodata/repomd.xml';

/**
 * URL 변수 치환 ($basearch, $releasever) 및 trailing slash 제거
 */
export function resolveUrlVariables(url: string, variables: RepositoryVariables = {}): string {
  let resolved = url.trim().replace(/\/+$/, '');

  if (variables.basearch) {
    resolved = resolved.replace(/\$basearch/g, variables.basearch);
  }
  if (variables.releasever) {
    resolved = resolved.replace(/\$releasever/g, variables.releasever);
  }

  return resolved;
}

/**
 * 베이스 URL과 상대 경로를 구분자 하나로 이어 붙인다.
 * 이미 인코딩된 경로(%20 등)는 다시 인코딩하지 않는다.
 */
export function joinRepositoryUrl(base: string, relative: string): string {
  let url: URL;
  try {
    url = new URL(base);
  } catch {
    throw new ConfigurationError(`invalid repository url: '${base}'`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`unsupported repository url scheme: '${url.protocol}'`);
  }

  url.pathname = path.posix.join(url.pathname, relative);
  return url.toString();
}
