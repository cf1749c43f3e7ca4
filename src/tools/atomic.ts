import fs from 'node:fs/promises';
import path from 'node:path';

import { randomId } from '../utils.js';

/** Name of the temporary sibling used while a file is being replaced. */
export function tempSiblingPath(absPath: string): string {
  return path.join(
    path.dirname(absPath),
    `.${path.basename(absPath)}.termpilot.tmp.${process.pid}.${randomId(4)}`
  );
}

/**
 * Replace `absPath` with `data` so readers only ever see the old or the new bytes.
 * The data goes to a fresh sibling file first and is renamed over the target.
 */
export async function atomicWrite(absPath: string, data: string | Buffer): Promise<void> {
  // Capture original permissions before overwriting
  const origStat = await fs.stat(absPath).catch(() => null);
  const origMode = origStat?.mode;

  const tmp = tempSiblingPath(absPath);
  try {
    // 'wx': fail rather than reuse an existing file of the same name
    await fs.writeFile(tmp, data, { flag: 'wx' });
    if (origMode != null) {
      await fs.chmod(tmp, origMode & 0o7777);
    }
    await fs.rename(tmp, absPath);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw e;
  }
}

/** Write in place; used when the caller opts out of atomic replacement. */
export async function directWrite(absPath: string, data: string | Buffer): Promise<void> {
  await fs.writeFile(absPath, data);
}
