/**
 * FrameMaterializer.ts - Writes selected keyframes as scaled JPEGs
 *
 * Output files are named by the frame's sampling ordinal
 * (`frame_0007.jpg`) and created with exclusive-create semantics: an
 * existing file is never overwritten. prepareFramesDirectory() clears
 * files left by an earlier run beforehand.
 */

import { mkdir, readdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import sharp from 'sharp';

import { PipelineError, errnoCode, errorMessage } from '../shared/errors.js';
import type { Keyframe, ProgressCallback } from '../shared/types.js';
import { createLogger } from '../utils/Logger.js';

// ============================================================================
// Types
// ============================================================================

export interface MaterializeOptions {
  outputDir: string;
  /** JPEG quality, 1-100 */
  quality: number;
  /** Linear scale factor applied to both dimensions, (0, 1] */
  scale: number;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

// ============================================================================
// Constants
// ============================================================================

const KEYFRAME_FILE_NAME = /^frame_\d{4,}\.jpg$/;

const log = createLogger('FrameMaterializer');

export function keyframeFileName(index: number): string {
  return `frame_${String(index).padStart(4, '0')}.jpg`;
}

/**
 * Create the frames directory and remove keyframe files from a previous run.
 * Other files are left alone.
 */
export async function prepareFramesDirectory(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
    const entries = await readdir(dir);
    const stale = entries.filter((name) => KEYFRAME_FILE_NAME.test(name));
    await Promise.all(stale.map((name) => rm(join(dir, name), { force: true })));
    if (stale.length > 0) {
      log.debug(`Removed ${stale.length} stale keyframe file(s) from ${dir}`);
    }
  } catch (error) {
    throw new PipelineError('WriteFailed', `Cannot prepare frames directory ${dir}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

// ============================================================================
// FrameMaterializer Class
// ============================================================================

export class FrameMaterializer {
  /**
   * Encode every keyframe in order. The first failure aborts the step and
   * names the frame ordinal; files already written stay in place.
   */
  async materialize(keyframes: readonly Keyframe[], options: MaterializeOptions): Promise<Keyframe[]> {
    const written: Keyframe[] = [];

    for (const keyframe of keyframes) {
      options.signal?.throwIfAborted();

      const outputPath = join(options.outputDir, keyframeFileName(keyframe.index));
      const encoded = await this.encode(keyframe, options);

      try {
        await writeFile(outputPath, encoded, { flag: 'wx' });
      } catch (error) {
        const reason = errnoCode(error) === 'EEXIST' ? 'file already exists' : errorMessage(error);
        throw new PipelineError('WriteFailed', `Cannot write keyframe ${keyframe.index} to ${outputPath}: ${reason}`, {
          ordinal: keyframe.index,
          cause: error,
        });
      }

      written.push({ ...keyframe, path: outputPath });
      options.onProgress?.(written.length / keyframes.length);
    }

    log.debug(`Materialized ${written.length} keyframe(s) into ${options.outputDir}`);
    return written;
  }

  private async encode(keyframe: Keyframe, options: MaterializeOptions): Promise<Buffer> {
    try {
      let pipeline = sharp(keyframe.path);

      if (options.scale !== 1) {
        const metadata = await pipeline.metadata();
        const width = Math.max(1, Math.floor((metadata.width ?? 0) * options.scale));
        const height = Math.max(1, Math.floor((metadata.height ?? 0) * options.scale));
        pipeline = pipeline.resize(width, height, { fit: 'fill', kernel: 'lanczos3' });
      }

      return await pipeline.jpeg({ quality: options.quality }).toBuffer();
    } catch (error) {
      throw new PipelineError('EncodingFailed', `Failed to encode keyframe ${keyframe.index}: ${errorMessage(error)}`, {
        ordinal: keyframe.index,
        cause: error,
      });
    }
  }
}
