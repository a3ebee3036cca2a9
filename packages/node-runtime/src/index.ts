// packages/node-runtime/src/index.ts
import { NcchContainer, type NcchContainerOptions } from '../../core/src/index.js';
import { FileByteSource } from './FileByteSource.js';

export interface OpenedNcch {
  container: NcchContainer;
  /** releases the underlying file handle */
  close(): Promise<void>;
}

export async function openNcchFile(
  path: string,
  cfg?: NcchContainerOptions,
): Promise<OpenedNcch> {
  const source = await FileByteSource.open(path);
  return {
    container: new NcchContainer(source, cfg),
    close    : () => source.close(),
  };
}

export * from '../../core/src/index.js';
export { FileByteSource } from './FileByteSource.js';
export { loadKeyFile, parseKeyFile } from './keyFile.js';
