/**
 * Repository Metadata Module
 */

export * from './types';
export * from './errors';
export { PeekableSource, detectCompression, sniffCompression, SNIFF_LENGTH } from './compression/sniffer';
export type { ByteSource } from './compression/sniffer';
export { BoundedStream, createDecompressor, openDecompressed } from './compression/decompressor';
export type { DecompressOptions } from './compression/decompressor';
export { streamElements } from './xml/element-stream';
export type { XmlElement } from './xml/element-stream';
export { parsePrimaryXml } from './primary-parser';
export { parseCompsXml, pickDefaultLocale } from './comps-parser';
export { parseRepomdXml, findArtifactHref, requireArtifactHref } from './repomd-parser';
export { parseModuleMds, MODULEMD_DOCUMENT } from './modulemd-parser';
export { parseArmoredKeyRing, fetchGpgKey } from './gpg-key';
export type { GpgKeySummary } from './gpg-key';
export { YumRepository, createDefaultClient } from './repository';
export { MetadataCache } from './cache';
export type { ArtifactKind } from './cache';
export { joinRepositoryUrl, resolveUrlVariables } from './url';
export type { RequestOptions } from './http';
