import { describe, it, expect, beforeAll } from 'vitest';
import { CanceledError } from 'axios';
import { generateKey } from 'openpgp';
import { fetchGpgKey, parseArmoredKeyRing } from './gpg-key';
import { DecodeError, TransportError } from './errors';
import { createStubClient } from '../../test-utils/metadata';

const KEY_URL = 'https://repo.example.test/keys/RPM-GPG-KEY-test';

describe('gpg-key', () => {
  let armored = '';

  beforeAll(async () => {
    const { publicKey } = await generateKey({
      type: 'ecc',
      curve: 'curve25519',
      userIDs: [{ name: 'Test Repository', email: 'repo@example.test' }],
      format: 'armored',
    });
    armored = publicKey;
  });

  describe('parseArmoredKeyRing', () => {
    it('키 ID, 핑거프린트, 사용자 ID 추출', async () => {
      const [key] = await parseArmoredKeyRing(armored);

      expect(key.userIds).toEqual(['Test Repository <repo@example.test>']);
      expect(key.fingerprint).toMatch(/^[0-9A-F]{40}$/);
      expect(key.keyId).toBe(key.fingerprint.slice(-16));
    });

    it('armor가 아닌 텍스트는 DecodeError', async () => {
      await expect(parseArmoredKeyRing('not a key')).rejects.toThrow(DecodeError);
    });
  });

  describe('fetchGpgKey', () => {
    it('유효한 키는 원본 텍스트와 상태 코드 반환', async () => {
      const { client } = createStubClient({ [KEY_URL]: armored });
      const result = await fetchGpgKey(KEY_URL, client);
      expect(result).toEqual({ data: armored, status: 200 });
    });

    it('파싱 실패 에러에 상태 코드가 붙음', async () => {
      const { client } = createStubClient({ [KEY_URL]: '<html>moved</html>' });
      const error = await fetchGpgKey(KEY_URL, client).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      expect(error instanceof DecodeError ? error.status : -1).toBe(200);
    });

    it('404는 TransportError', async () => {
      const { client } = createStubClient();
      const error = await fetchGpgKey(KEY_URL, client).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error instanceof TransportError ? error.status : -1).toBe(404);
    });

    it('취소 signal을 요청에 전달', async () => {
      const { client, calls } = createStubClient({ [KEY_URL]: armored });
      const controller = new AbortController();
      controller.abort();
      const error = await fetchGpgKey(KEY_URL, client, { signal: controller.signal }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CanceledError);
      expect(calls.size).toBe(0);
    });
  });
});
