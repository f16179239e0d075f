/**
 * ScratchDirectory.ts - Explicitly owned temporary directory
 *
 * A run creates one scratch directory for its sampled frames and is the only
 * holder of the handle. Release is idempotent and safe to call from a
 * `finally` block on every path.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

export class ScratchDirectory {
  private released = false;

  private constructor(public readonly path: string) {}

  static async create(prefix: string, parent: string = tmpdir()): Promise<ScratchDirectory> {
    const path = await mkdtemp(join(parent, prefix));
    return new ScratchDirectory(path);
  }

  get isReleased(): boolean {
    return this.released;
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await rm(this.path, { recursive: true, force: true });
  }
}
