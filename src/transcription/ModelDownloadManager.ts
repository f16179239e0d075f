/**
 * ModelDownloadManager.ts - Whisper model acquisition
 *
 * Handles:
 * - Checking for the model at its canonical path
 * - Downloading it from Hugging Face (following redirects)
 * - Progress tracking by bytes written
 * - Atomic placement: the body lands in a temp file beside the target and
 *   is renamed into place only once complete
 */

import { randomUUID } from 'crypto';
import { createWriteStream } from 'fs';
import { mkdir, rename, rm, stat } from 'fs/promises';
import type { IncomingMessage } from 'http';
import * as https from 'https';
import { homedir } from 'os';
import { basename, dirname, join } from 'path';
import { pipeline } from 'stream/promises';

import { PipelineError, errorMessage, isPipelineError } from '../shared/errors.js';
import { createLogger } from '../utils/Logger.js';
import type { DownloadProgress, ModelDownloadOptions } from './types.js';

// ============================================================================
// Constants
// ============================================================================

const HUGGINGFACE_BASE_URL = 'https://huggingface.co/ggerganov/whisper.cpp/resolve/main';

export const DEFAULT_MODEL_URL = `${HUGGINGFACE_BASE_URL}/ggml-base.en.bin`;

/** Used for progress when the server sends no content-length */
export const FALLBACK_MODEL_SIZE_BYTES = 148_000_000;

const MAX_REDIRECTS = 5;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export function defaultModelPath(home: string = homedir()): string {
  return join(home, '.cache', 'whisper', 'ggml-base.bin');
}

const log = createLogger('ModelDownloadManager');

// ============================================================================
// ModelDownloadManager Class
// ============================================================================

export class ModelDownloadManager {
  /**
   * True when a non-empty regular file sits at the model path.
   */
  async isModelAvailable(modelPath: string): Promise<boolean> {
    try {
      const stats = await stat(modelPath);
      return stats.isFile() && stats.size > 0;
    } catch {
      return false;
    }
  }

  /**
   * Download the model to targetPath. The canonical path only ever holds a
   * complete file.
   */
  async download(targetPath: string, options: ModelDownloadOptions = {}): Promise<void> {
    const url = options.url ?? process.env.KEYSCRIBE_MODEL_URL ?? DEFAULT_MODEL_URL;
    const modelDir = dirname(targetPath);
    const tempPath = join(modelDir, `.${basename(targetPath)}.${randomUUID()}.download`);

    log.info(`Downloading model from ${url}`);

    try {
      await mkdir(modelDir, { recursive: true });

      const response = await this.request(url, options.signal);
      const headerLength = Number.parseInt(response.headers['content-length'] ?? '', 10);
      const totalBytes = headerLength > 0 ? headerLength : FALLBACK_MODEL_SIZE_BYTES;
      let downloadedBytes = 0;

      response.on('data', (chunk: Buffer) => {
        downloadedBytes += chunk.length;
        const progress: DownloadProgress = {
          downloadedBytes,
          totalBytes,
          fraction: Math.min(1, downloadedBytes / totalBytes),
        };
        options.onProgress?.(progress);
      });

      await pipeline(response, createWriteStream(tempPath, { mode: 0o644 }), { signal: options.signal });
      await rename(tempPath, targetPath);
    } catch (error) {
      await rm(tempPath, { force: true });
      if (isPipelineError(error)) throw error;
      throw new PipelineError('DownloadFailed', `Model download failed: ${errorMessage(error)}`, { cause: error });
    }

    log.info(`Model saved to ${targetPath}`);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * GET a URL, following redirects. Resolves with a 200 response whose body
   * has not been read yet.
   */
  private request(url: string, signal: AbortSignal | undefined, redirectCount = 0): Promise<IncomingMessage> {
    return new Promise<IncomingMessage>((resolve, reject) => {
      const request = https.get(url, { signal }, (response) => {
        const status = response.statusCode ?? 0;

        if (REDIRECT_STATUSES.has(status)) {
          response.resume();
          const location = response.headers.location;
          if (!location) {
            reject(new PipelineError('DownloadFailed', `HTTP ${status} redirect without a location`));
            return;
          }
          if (redirectCount >= MAX_REDIRECTS) {
            reject(new PipelineError('DownloadFailed', 'Too many redirects'));
            return;
          }
          const next = new URL(location, url).toString();
          log.debug(`Following redirect to ${next.substring(0, 60)}...`);
          this.request(next, signal, redirectCount + 1).then(resolve, reject);
          return;
        }

        if (status !== 200) {
          response.resume();
          reject(new PipelineError('DownloadFailed', `Download failed: HTTP ${status}`));
          return;
        }

        resolve(response);
      });

      request.on('error', (error) => {
        reject(new PipelineError('DownloadFailed', `Download failed: ${error.message}`, { cause: error }));
      });
    });
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const modelDownloadManager = new ModelDownloadManager();
export default ModelDownloadManager;
