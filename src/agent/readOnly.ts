import fse from "fs-extra";

export interface FileAttributes {
  setReadOnly(filePath: string, readOnly: boolean): Promise<void>;
}

const WRITE_BITS = 0o222;

/**
 * Toggles the write bits of a local file. Making it writable again grants
 * write to each class (owner, group, other) that can read it.
 */
export const fsFileAttributes: FileAttributes = {
  async setReadOnly(filePath, readOnly) {
    const stats = await fse.stat(filePath);
    const mode = stats.mode & 0o777;
    const next = readOnly ? mode & ~WRITE_BITS : mode | ((mode & 0o444) >> 1);
    if (next !== mode) {
      await fse.chmod(filePath, next);
    }
  },
};
