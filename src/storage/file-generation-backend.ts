/**
 * File-backed generation backend.
 *
 * Each target's snapshot lives in `<stateDir>/<targetId>/generations.json`.
 * Writes go to a temp file in the same directory, are fsynced, then renamed
 * over the snapshot, so the file on disk always holds one whole snapshot.
 */

import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { GenerationSnapshot } from '../domain/generation';
import { GenerationBackend, ConcurrentWriteError } from './store';

const SNAPSHOT_FILE = 'generations.json';
const TARGET_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export class FileGenerationBackend implements GenerationBackend {
  constructor(private readonly stateDir: string) {}

  async read(targetId: string): Promise<GenerationSnapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.snapshotPath(targetId), 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw err;
    }
    // Shape is checked by the generation store when it opens the snapshot.
    const parsed: GenerationSnapshot = JSON.parse(raw);
    return parsed;
  }

  async write(targetId: string, snapshot: GenerationSnapshot, expectedVersion: number): Promise<void> {
    const current = await this.read(targetId);
    const actualVersion = current?.version ?? 0;
    if (actualVersion !== expectedVersion) {
      throw new ConcurrentWriteError(targetId, expectedVersion, actualVersion);
    }

    const filePath = this.snapshotPath(targetId);
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true, mode: 0o755 });

    const tmp = `${filePath}.tmp.${randomBytes(4).toString('hex')}`;
    try {
      const handle = await fs.open(tmp, 'w', 0o600);
      try {
        await handle.writeFile(JSON.stringify(snapshot, null, 2), 'utf8');
        await handle.datasync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmp, filePath);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }

  private snapshotPath(targetId: string): string {
    if (!TARGET_ID_PATTERN.test(targetId)) {
      throw new Error(`Target id is not usable as a directory name: ${targetId}`);
    }
    return path.join(this.stateDir, targetId, SNAPSHOT_FILE);
  }
}

// Errors from fs may come from another realm (Jest's VM contexts), so no instanceof.
function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}
