/**
 * Metadata Cache
 * 아티팩트 종류별 캐시 슬롯. 슬롯은 설정 수명 동안 한 번만 채워지고,
 * clear()는 모든 슬롯을 한 번에 비운다.
 */

import type {
  Comps,
  FetchResult,
  ModuleMd,
  PackageRecord,
  RepomdIndex,
} from './types';

export interface ArtifactValues {
  repomd: RepomdIndex;
  packages: PackageRecord[];
  comps: Comps | null;
  moduleStreams: ModuleMd[];
  signature: string;
}

export type ArtifactKind = keyof ArtifactValues;

type Slots = { [K in ArtifactKind]?: FetchResult<ArtifactValues[K]> };

export class MetadataCache {
  private slots: Slots = {};
  private generation = 0;

  /**
   * 현재 세대. 가져오기를 시작할 때 기록해 두었다가 set()에 넘긴다.
   */
  get epoch(): number {
    return this.generation;
  }

  get<K extends ArtifactKind>(kind: K): FetchResult<ArtifactValues[K]> | undefined {
    return this.slots[kind];
  }

  has(kind: ArtifactKind): boolean {
    return this.slots[kind] !== undefined;
  }

  /**
   * 슬롯을 채운다. 먼저 채운 값이 이기며, clear() 이전 세대에 시작된 값은 저장하지 않는다.
   */
  set<K extends ArtifactKind>(
    kind: K,
    value: FetchResult<ArtifactValues[K]>,
    epoch: number
  ): FetchResult<ArtifactValues[K]> {
    if (epoch !== this.generation) {
      return value;
    }
    const existing = this.slots[kind];
    if (existing !== undefined) {
      return existing;
    }
    const slots: { [P in K]?: FetchResult<ArtifactValues[P]> } = this.slots;
    slots[kind] = value;
    return value;
  }

  clear(): void {
    this.slots = {};
    this.generation++;
  }
}
