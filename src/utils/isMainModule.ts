import { realpathSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';

/** True when the module at `moduleUrl` is the script node/tsx was started with (bin symlinks included). */
export function isMainModule(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(resolve(entry)) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}
