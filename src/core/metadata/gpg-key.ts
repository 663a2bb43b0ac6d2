/**
 * GPG Public Key
 * 저장소 GPG 공개키를 가져와 ASCII armor 키링으로 파싱 가능한지 확인
 * (신뢰 여부 판단과 서명 검증은 하지 않음)
 */

import axios, { type AxiosInstance } from 'axios';
import { readKeys } from 'openpgp';
import { DecodeError, errorMessage, withStatus } from './errors';
import { getText, type RequestOptions } from './http';
import type { FetchResult } from './types';
import logger from '../../utils/logger';

export interface GpgKeySummary {
  /** 키 ID (16자리 hex) */
  keyId: string;
  /** 핑거프린트 (hex) */
  fingerprint: string;
  /** 사용자 ID 목록 */
  userIds: string[];
}

/**
 * armored 키링 텍스트를 파싱한다. 실패하면 DecodeError.
 */
export async function parseArmoredKeyRing(armored: string): Promise<GpgKeySummary[]> {
  try {
    const keys = await readKeys({ armoredKeys: armored });
    return keys.map((key) => ({
      keyId: key.getKeyID().toHex().toUpperCase(),
      fingerprint: key.getFingerprint().toUpperCase(),
      userIds: key.getUserIDs(),
    }));
  } catch (error) {
    throw new DecodeError(`invalid armored GPG key ring: ${errorMessage(error)}`, [], error);
  }
}

/**
 * GPG 키를 가져와 검증한다. 성공하면 원본 텍스트를 반환한다.
 */
export async function fetchGpgKey(
  url: string,
  client: AxiosInstance = axios.create(),
  options: RequestOptions = {}
): Promise<FetchResult<string>> {
  const { data, status } = await getText(client, url, options);
  let keys: GpgKeySummary[];
  try {
    keys = await parseArmoredKeyRing(data);
  } catch (error) {
    throw withStatus(error, status);
  }
  logger.debug('GPG 키 파싱 완료', { url, keys: keys.map((key) => key.keyId) });
  return { data, status };
}
