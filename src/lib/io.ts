import type { FileHandle } from 'fs/promises';

/**
 * Wraps one unit of directory work (a file or a group), e.g. in a spinner
 */
export type UnitRunner<T> = (label: string, fn: () => Promise<T>) => Promise<T>;

export const runDirectly = <T>(_label: string, fn: () => Promise<T>): Promise<T> => fn();

/**
 * Write a whole buffer, looping over short writes
 */
export const writeAll = async (handle: FileHandle, data: Uint8Array): Promise<void> => {
  let offset = 0;
  while (offset < data.length) {
    const { bytesWritten } = await handle.write(data, offset, data.length - offset);
    offset += bytesWritten;
  }
};
