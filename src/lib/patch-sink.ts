import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import * as path from 'node:path';
import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import type { Patch } from './types';
import { errorMessage } from './utils';

/**
 * Where applied cell changes are recorded. Both calls are synchronous so a
 * command completes, persistence included, before control returns.
 * `delete` archives the patch; it never destroys it.
 */
export interface PatchSink {
  write(patch: Patch): void;
  delete(patchId: string): void;
}

export class NullPatchSink implements PatchSink {
  write(_patch: Patch): void {}
  delete(_patchId: string): void {}
}

export class MemoryPatchSink implements PatchSink {
  readonly active = new Map<string, Patch>();
  readonly archived = new Map<string, Patch>();

  write(patch: Patch): void {
    this.archived.delete(patch.patchId);
    this.active.set(patch.patchId, { ...patch });
  }

  delete(patchId: string): void {
    const patch = this.active.get(patchId);
    if (!patch) return;
    this.active.delete(patchId);
    this.archived.set(patchId, patch);
  }
}

// --------------------------
// File sink: <dir>/<patchId>.json, archived to <dir>/undone/
// --------------------------
const PatchSchema = z.object({
  patchId: z.string(),
  actionId: z.string(),
  row: z.number().int().nonnegative(),
  column: z.string(),
  oldValue: z.string().nullable(),
  newValue: z.string().nullable(),
  issueId: z.string().nullable(),
  timestamp: z.string(),
});

const byTime = (a: Patch, b: Patch) => a.timestamp.localeCompare(b.timestamp) || a.patchId.localeCompare(b.patchId);

export class FilePatchSink implements PatchSink {
  readonly undoneDir: string;

  constructor(readonly dir: string) {
    this.undoneDir = path.join(dir, 'undone');
    mkdirSync(this.undoneDir, { recursive: true });
  }

  write(patch: Patch): void {
    writeFileSync(this.file(patch.patchId), JSON.stringify(patch, null, 2), 'utf8');
    // a redo re-activates the patch
    rmSync(path.join(this.undoneDir, `${patch.patchId}.json`), { force: true });
  }

  delete(patchId: string): void {
    const src = this.file(patchId);
    if (!existsSync(src)) {
      logger.debug('Patch to archive not found', { patchId });
      return;
    }
    renameSync(src, path.join(this.undoneDir, `${patchId}.json`));
  }

  read(patchId: string): Patch | null {
    const file = this.file(patchId);
    return existsSync(file) ? readPatch(file) : null;
  }

  /** Active patches, oldest first. */
  all(): Patch[] {
    return readDir(this.dir);
  }

  archived(): Patch[] {
    return readDir(this.undoneDir);
  }

  private file(patchId: string): string {
    return path.join(this.dir, `${patchId}.json`);
  }
}

function readPatch(file: string): Patch | null {
  try {
    const parsed = PatchSchema.safeParse(JSON.parse(readFileSync(file, 'utf8')));
    if (parsed.success) return parsed.data;
    logger.warn('Malformed patch file skipped', { file });
  } catch (e) {
    logger.warn('Unreadable patch file skipped', { file, error: errorMessage(e) });
  }
  return null;
}

function readDir(dir: string): Patch[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((f) => f.endsWith('.json'))
    .map((f) => readPatch(path.join(dir, f)))
    .filter((p): p is Patch => p !== null)
    .sort(byTime);
}
