import { describe, it, expect } from 'vitest';
import { parseCompsXml } from './comps-parser';
import { DecodeError } from './errors';
import { chunked, gzip } from '../../test-utils/metadata';

const COMPS = `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE comps PUBLIC "-//Example//DTD Comps info//EN" "comps.dtd">
<comps>
  <group>
    <id>core</id>
    <name xml:lang="de">Kern</name>
    <name>Core</name>
    <name xml:lang="ko">코어</name>
    <description>Smallest possible installation</description>
    <description xml:lang="de">Kleinste Installation</description>
    <default>true</default>
    <uservisible>false</uservisible>
    <packagelist>
      <packagereq type="mandatory">bash</packagereq>
      <packagereq type="default">coreutils</packagereq>
      <packagereq type="optional">tinyhttpd</packagereq>
    </packagelist>
  </group>
  <environment>
    <id>minimal-environment</id>
    <name>Minimal Install</name>
    <name xml:lang="ko">최소 설치</name>
    <description>Basic functionality.</description>
    <grouplist>
      <groupid>core</groupid>
    </grouplist>
  </environment>
  <group>
    <id>editors</id>
    <name>Editors</name>
  </group>
  <category>
    <id>base-system</id>
    <name>Base System</name>
  </category>
</comps>
`;

describe('parseCompsXml', () => {
  it('압축되지 않은 comps에서 그룹과 환경 추출', async () => {
    const comps = await parseCompsXml(chunked(Buffer.from(COMPS), 13));

    expect(comps.groups).toEqual([
      {
        id: 'core',
        name: 'Core',
        description: 'Smallest possible installation',
        packageList: ['bash', 'coreutils', 'tinyhttpd'],
      },
      { id: 'editors', name: 'Editors', description: '', packageList: [] },
    ]);
    expect(comps.environments).toEqual([
      { id: 'minimal-environment', name: 'Minimal Install', description: 'Basic functionality.' },
    ]);
  });

  it('gzip 압축된 comps도 동일한 결과', async () => {
    const plain = await parseCompsXml(chunked(Buffer.from(COMPS)));
    const compressed = await parseCompsXml(chunked(gzip(COMPS)));
    expect(compressed).toEqual(plain);
  });

  it('그룹이 없는 comps는 빈 목록', async () => {
    const comps = await parseCompsXml(chunked(gzip('<?xml version="1.0"?><comps></comps>')));
    expect(comps).toEqual({ groups: [], environments: [] });
  });

  it('기본 로케일 이름이 없는 그룹은 DecodeError, 앞선 레코드는 partial', async () => {
    const xml = COMPS.replace('<name>Editors</name>', '<name xml:lang="fr">Éditeurs</name>');
    const error = await parseCompsXml(chunked(gzip(xml))).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DecodeError);
    if (!(error instanceof DecodeError)) return;
    expect(error.message).toBe("group 'editors' has no default-locale name");
    expect(error.partial).toEqual([
      expect.objectContaining({ id: 'core' }),
      expect.objectContaining({ id: 'minimal-environment' }),
    ]);
  });

  it('partial은 그룹과 환경이 섞여도 문서 순서 그대로', async () => {
    const xml =
      '<comps>' +
      '<environment><id>server</id><name>Server</name></environment>' +
      '<group><id>core</id><name>Core</name></group>' +
      '<group><id>broken</id><name xml:lang="fr">Cassé</name></group>' +
      '</comps>';
    const error = await parseCompsXml(chunked(Buffer.from(xml))).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DecodeError);
    if (!(error instanceof DecodeError)) return;
    expect(error.message).toBe("group 'broken' has no default-locale name");
    expect(error.partial).toEqual([
      { id: 'server', name: 'Server', description: '' },
      { id: 'core', name: 'Core', description: '', packageList: [] },
    ]);
  });

  it('상한에서 잘리면 완성된 레코드만 반환', async () => {
    const limit = COMPS.indexOf('<environment>') + 20;
    const comps = await parseCompsXml(chunked(Buffer.from(COMPS)), Buffer.byteLength(COMPS.slice(0, limit)));

    expect(comps.groups.map((g) => g.id)).toEqual(['core']);
    expect(comps.environments).toEqual([]);
  });
});
