import { describe, it, expect } from 'vitest';
import { findArtifactHref, parseRepomdXml, requireArtifactHref } from './repomd-parser';
import { DecodeError, MissingArtifactError } from './errors';

const REPOMD = `<?xml version="1.0" encoding="UTF-8"?>
<repomd xmlns="http://linux.duke.edu/metadata/repo" xmlns:rpm="http://linux.duke.edu/metadata/rpm">
  <revision>1700000000</revision>
  <data type="primary">
    <checksum type="sha256">aaaa</checksum>
    <open-checksum type="sha256">bbbb</open-checksum>
    <location href="repodata/aaaa-primary.xml.gz"/>
    <timestamp>1700000001</timestamp>
    <size>510</size>
    <open-size>1422</open-size>
  </data>
  <data type="group">
    <checksum type="sha256">cccc</checksum>
    <location href="repodata/cccc-comps.xml"/>
  </data>
  <data type="group_gz">
    <location href="repodata/cccc-comps.xml.gz"/>
  </data>
</repomd>
`;

describe('parseRepomdXml', () => {
  it('data 항목 파싱', () => {
    const index = parseRepomdXml(Buffer.from(REPOMD));

    expect(index.revision).toBe('1700000000');
    expect(index.data).toHaveLength(3);
    expect(index.data[0]).toEqual({
      type: 'primary',
      href: 'repodata/aaaa-primary.xml.gz',
      checksum: { type: 'sha256', value: 'aaaa' },
      openChecksum: { type: 'sha256', value: 'bbbb' },
      timestamp: 1700000001,
      size: 510,
      openSize: 1422,
    });
    expect(index.data[2].checksum).toBeUndefined();
  });

  it('원본 텍스트를 그대로 보존', () => {
    expect(parseRepomdXml(REPOMD).raw).toBe(REPOMD);
  });

  it('UTF-8이 아닌 바이트도 rawBytes에 그대로 보존', () => {
    const input = Buffer.concat([
      Buffer.from('<?xml version="1.0"?>\n<!-- caf'),
      Buffer.from([0xe9]),
      Buffer.from(' -->\n<repomd><revision>7</revision></repomd>\n'),
    ]);
    const index = parseRepomdXml(input);

    expect(index.revision).toBe('7');
    expect(index.rawBytes.equals(input)).toBe(true);
    expect(Buffer.from(index.raw, 'utf-8').equals(input)).toBe(false);
  });

  it('문자열 입력은 UTF-8 바이트로 보존', () => {
    expect(parseRepomdXml('<repomd/>').rawBytes.toString('utf-8')).toBe('<repomd/>');
  });

  it('data 하나만 있어도 배열', () => {
    const index = parseRepomdXml('<repomd><data type="primary"><location href="p.xml.gz"/></data></repomd>');
    expect(index.data).toEqual([{ type: 'primary', href: 'p.xml.gz' }]);
  });

  it('빈 repomd', () => {
    expect(parseRepomdXml('<repomd/>')).toMatchObject({ revision: '', data: [] });
  });

  it('repomd 루트가 없으면 DecodeError', () => {
    expect(() => parseRepomdXml('<metadata/>')).toThrow(DecodeError);
  });

  it('잘못된 XML은 DecodeError', () => {
    expect(() => parseRepomdXml('<repomd><data></repomd>')).toThrow(DecodeError);
  });

  it('숫자가 아닌 size는 DecodeError', () => {
    const xml = '<repomd><data type="primary"><location href="p"/><size>big</size></data></repomd>';
    expect(() => parseRepomdXml(xml)).toThrow('invalid repomd.xml: repomd.data.0.size: Expected number, received nan');
  });
});

describe('findArtifactHref', () => {
  const index = parseRepomdXml(REPOMD);

  it('타입으로 href 조회', () => {
    expect(findArtifactHref(index, 'group')).toBe('repodata/cccc-comps.xml');
  });

  it('없는 타입은 undefined', () => {
    expect(findArtifactHref(index, 'modules')).toBeUndefined();
  });

  it('같은 타입이 여러 번 나오면 마지막 항목', () => {
    const duplicated = parseRepomdXml(
      '<repomd><data type="primary"><location href="old.xml.gz"/></data>' +
        '<data type="primary"><location href="new.xml.gz"/></data></repomd>'
    );
    expect(findArtifactHref(duplicated, 'primary')).toBe('new.xml.gz');
  });

  it('requireArtifactHref는 없으면 MissingArtifactError', () => {
    expect(() => requireArtifactHref(index, 'modules')).toThrow(
      new MissingArtifactError('modules').message
    );
    expect(requireArtifactHref(index, 'primary')).toBe('repodata/aaaa-primary.xml.gz');
  });
});
