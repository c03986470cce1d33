import { comparablePath, isUnderRoot } from "../common/files";
import { LockInfo, SyncRecord } from "../common/types";

interface FileState {
  path: string;
  lock?: LockInfo;
  lastSync?: SyncRecord;
}

export type Clock = () => Date;

/**
 * In-memory lock state for the files under the managed drive roots. Keys
 * are comparable paths, so C:\A\b.3dm and c:/a/b.3dm are the same file.
 */
export class LockTable {
  private readonly files = new Map<string, FileState>();
  private readonly roots: string[];

  constructor(roots: string[], private readonly clock: Clock = () => new Date()) {
    this.roots = roots.filter((root) => root.trim().length > 0);
  }

  get driveRoots(): string[] {
    return [...this.roots];
  }

  contains(filePath: string): boolean {
    return this.roots.some((root) => isUnderRoot(filePath, root));
  }

  lockOf(filePath: string): LockInfo | undefined {
    return this.files.get(comparablePath(filePath))?.lock;
  }

  isLockedByOther(filePath: string, owner: string): boolean {
    const lock = this.lockOf(filePath);
    return lock !== undefined && lock.owner !== owner;
  }

  /** Takes the lock, or keeps it when `owner` already holds it. */
  acquire(filePath: string, owner: string): boolean {
    const state = this.upsert(filePath);
    if (state.lock) {
      return state.lock.owner === owner;
    }
    state.lock = { owner, lockTimestamp: this.clock().toISOString() };
    return true;
  }

  release(filePath: string, owner: string): boolean {
    const state = this.files.get(comparablePath(filePath));
    if (!state?.lock || state.lock.owner !== owner) {
      return false;
    }
    state.lock = undefined;
    return true;
  }

  releaseAll(owner: string): string[] {
    const released: string[] = [];
    this.files.forEach((state) => {
      if (state.lock?.owner === owner) {
        state.lock = undefined;
        released.push(state.path);
      }
    });
    return released;
  }

  sync(filePath: string, force: boolean): SyncRecord {
    const state = this.upsert(filePath);
    const record: SyncRecord = { path: filePath, force, syncedAt: this.clock().toISOString() };
    state.lastSync = record;
    return record;
  }

  lastSyncOf(filePath: string): SyncRecord | undefined {
    return this.files.get(comparablePath(filePath))?.lastSync;
  }

  private upsert(filePath: string): FileState {
    const key = comparablePath(filePath);
    let state = this.files.get(key);
    if (!state) {
      state = { path: filePath };
      this.files.set(key, state);
    }
    return state;
  }
}
