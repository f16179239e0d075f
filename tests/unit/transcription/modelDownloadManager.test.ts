/**
 * ModelDownloadManager Unit Tests
 *
 * Tests:
 * - Model availability check
 * - Download to a temp file and rename into place
 * - Redirect following and the redirect limit
 * - Failure cleanup (no partial file at the canonical path)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { existsSync } from 'fs';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PassThrough } from 'stream';

// ============================================================================
// Hoisted mocks
// ============================================================================

const { mockGet } = vi.hoisted(() => ({
  mockGet: vi.fn(),
}));

vi.mock('https', () => ({
  get: mockGet,
}));

import {
  FALLBACK_MODEL_SIZE_BYTES,
  ModelDownloadManager,
  defaultModelPath,
} from '../../../src/transcription/ModelDownloadManager.js';
import type { DownloadProgress } from '../../../src/transcription/types.js';

// ============================================================================
// Fake HTTP layer
// ============================================================================

interface FakeResponse {
  statusCode: number;
  headers?: Record<string, string>;
  body?: string;
}

/**
 * Serve responses by URL. Unknown URLs make the request emit an error.
 */
function serve(routes: Record<string, FakeResponse | ((url: string) => FakeResponse)>): void {
  mockGet.mockImplementation((url: string, _options: unknown, callback: (response: PassThrough) => void) => {
    const request = new EventEmitter();
    const route = routes[url];
    setImmediate(() => {
      if (!route) {
        request.emit('error', new Error(`getaddrinfo ENOTFOUND ${new URL(url).host}`));
        return;
      }
      const reply = typeof route === 'function' ? route(url) : route;
      const response = Object.assign(new PassThrough(), {
        statusCode: reply.statusCode,
        headers: reply.headers ?? {},
      });
      response.end(reply.body ?? '');
      callback(response);
    });
    return request;
  });
}

const MODEL_URL = 'https://models.example.test/ggml-base.en.bin';

let dir: string;

beforeEach(async () => {
  vi.clearAllMocks();
  dir = await mkdtemp(join(tmpdir(), 'keyscribe-models-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

// ============================================================================
// isModelAvailable
// ============================================================================

describe('ModelDownloadManager.isModelAvailable', () => {
  it('is false when the file does not exist', async () => {
    await expect(new ModelDownloadManager().isModelAvailable(join(dir, 'ggml-base.bin'))).resolves.toBe(false);
  });

  it('is false for an empty file', async () => {
    await writeFile(join(dir, 'ggml-base.bin'), '');

    await expect(new ModelDownloadManager().isModelAvailable(join(dir, 'ggml-base.bin'))).resolves.toBe(false);
  });

  it('is false for a directory', async () => {
    await expect(new ModelDownloadManager().isModelAvailable(dir)).resolves.toBe(false);
  });

  it('is true for a non-empty file', async () => {
    await writeFile(join(dir, 'ggml-base.bin'), 'weights');

    await expect(new ModelDownloadManager().isModelAvailable(join(dir, 'ggml-base.bin'))).resolves.toBe(true);
  });
});

describe('defaultModelPath', () => {
  it('lives in the whisper cache under the home directory', () => {
    expect(defaultModelPath('/home/tester')).toBe(join('/home/tester', '.cache', 'whisper', 'ggml-base.bin'));
  });
});

// ============================================================================
// download
// ============================================================================

describe('ModelDownloadManager.download', () => {
  it('writes the body to the target path and reports byte progress', async () => {
    serve({ [MODEL_URL]: { statusCode: 200, headers: { 'content-length': '11' }, body: 'model-bytes' } });
    const target = join(dir, 'cache', 'whisper', 'ggml-base.bin');
    const progress: DownloadProgress[] = [];

    await new ModelDownloadManager().download(target, { url: MODEL_URL, onProgress: (p) => progress.push(p) });

    expect(await readFile(target, 'utf-8')).toBe('model-bytes');
    expect(await readdir(join(dir, 'cache', 'whisper'))).toEqual(['ggml-base.bin']);
    expect(progress[progress.length - 1]).toEqual({ downloadedBytes: 11, totalBytes: 11, fraction: 1 });
  });

  it('assumes the fallback size when content-length is missing', async () => {
    serve({ [MODEL_URL]: { statusCode: 200, body: 'abc' } });
    const progress: DownloadProgress[] = [];

    await new ModelDownloadManager().download(join(dir, 'ggml-base.bin'), {
      url: MODEL_URL,
      onProgress: (p) => progress.push(p),
    });

    expect(progress[progress.length - 1]).toEqual({
      downloadedBytes: 3,
      totalBytes: FALLBACK_MODEL_SIZE_BYTES,
      fraction: 3 / FALLBACK_MODEL_SIZE_BYTES,
    });
  });

  it('follows a relative redirect', async () => {
    serve({
      [MODEL_URL]: { statusCode: 302, headers: { location: '/resolved/ggml-base.en.bin' } },
      'https://models.example.test/resolved/ggml-base.en.bin': { statusCode: 200, body: 'weights' },
    });
    const target = join(dir, 'ggml-base.bin');

    await new ModelDownloadManager().download(target, { url: MODEL_URL });

    expect(mockGet).toHaveBeenCalledTimes(2);
    expect(mockGet.mock.calls[1][0]).toBe('https://models.example.test/resolved/ggml-base.en.bin');
    expect(await readFile(target, 'utf-8')).toBe('weights');
  });

  it('gives up after five redirects', async () => {
    serve({
      [MODEL_URL]: { statusCode: 301, headers: { location: MODEL_URL } },
    });
    const target = join(dir, 'ggml-base.bin');

    await expect(new ModelDownloadManager().download(target, { url: MODEL_URL })).rejects.toMatchObject({
      kind: 'DownloadFailed',
      message: 'Too many redirects',
    });
    expect(mockGet).toHaveBeenCalledTimes(6);
    expect(existsSync(target)).toBe(false);
  });

  it('rejects a redirect without a location', async () => {
    serve({ [MODEL_URL]: { statusCode: 307 } });

    await expect(
      new ModelDownloadManager().download(join(dir, 'ggml-base.bin'), { url: MODEL_URL })
    ).rejects.toMatchObject({ kind: 'DownloadFailed', message: 'HTTP 307 redirect without a location' });
  });

  it('fails on a non-200 status and leaves nothing behind', async () => {
    serve({ [MODEL_URL]: { statusCode: 404, body: 'Not Found' } });
    const target = join(dir, 'ggml-base.bin');

    await expect(new ModelDownloadManager().download(target, { url: MODEL_URL })).rejects.toMatchObject({
      kind: 'DownloadFailed',
      message: 'Download failed: HTTP 404',
    });
    expect(await readdir(dir)).toEqual([]);
  });

  it('fails on a network error', async () => {
    serve({});

    await expect(
      new ModelDownloadManager().download(join(dir, 'ggml-base.bin'), { url: MODEL_URL })
    ).rejects.toMatchObject({
      kind: 'DownloadFailed',
      message: 'Download failed: getaddrinfo ENOTFOUND models.example.test',
    });
    expect(await readdir(dir)).toEqual([]);
  });

  it('keeps an existing model in place when a new download fails', async () => {
    const target = join(dir, 'ggml-base.bin');
    await writeFile(target, 'previous');
    serve({ [MODEL_URL]: { statusCode: 500 } });

    await expect(new ModelDownloadManager().download(target, { url: MODEL_URL })).rejects.toMatchObject({
      kind: 'DownloadFailed',
    });
    expect(await readFile(target, 'utf-8')).toBe('previous');
  });
});
