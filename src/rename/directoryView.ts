import { existsSync, renameSync, statSync, unlinkSync } from 'fs';
import { join } from 'path';

/**
 * The file operations the normalizer needs on one category folder.
 * The live view touches the disk; the dry-run view only records what it
 * would have done, so later collision checks in the same pass see the same
 * state a live run would.
 */
export interface DirectoryView {
  readonly dryRun: boolean;
  /** True when `target` is taken by a file other than `current`. */
  isOccupied(target: string, current: string): boolean;
  rename(from: string, to: string): void;
  remove(name: string): void;
}

function fileKey(path: string): string {
  const stats = statSync(path);
  return `${stats.dev}:${stats.ino}`;
}

export function createLiveDirectoryView(dirPath: string): DirectoryView {
  return {
    dryRun: false,
    isOccupied(target, current) {
      const targetPath = join(dirPath, target);
      if (!existsSync(targetPath)) return false;
      // Case-insensitive filesystems report the current file under the new spelling.
      return fileKey(targetPath) !== fileKey(join(dirPath, current));
    },
    rename(from, to) {
      renameSync(join(dirPath, from), join(dirPath, to));
    },
    remove(name) {
      unlinkSync(join(dirPath, name));
    },
  };
}

/**
 * Asks the disk the same question the live view does, then overlays the
 * renames and deletions simulated so far in this pass.
 */
export function createDryRunDirectoryView(dirPath: string): DirectoryView {
  const added = new Set<string>();
  const removedNames = new Set<string>();
  const removedFiles = new Set<string>();

  function forget(name: string): void {
    if (added.delete(name)) return;
    removedNames.add(name);
    removedFiles.add(fileKey(join(dirPath, name)));
  }

  return {
    dryRun: true,
    isOccupied(target, current) {
      if (target === current) return false;
      if (added.has(target)) return true;
      if (removedNames.has(target)) return false;

      const targetPath = join(dirPath, target);
      if (!existsSync(targetPath)) return false;
      const key = fileKey(targetPath);
      return key !== fileKey(join(dirPath, current)) && !removedFiles.has(key);
    },
    rename(from, to) {
      forget(from);
      removedNames.delete(to);
      added.add(to);
    },
    remove(name) {
      forget(name);
    },
  };
}
