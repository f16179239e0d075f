/**
 * WhisperCliRecognizer.ts - SpeechRecognizer backed by the whisper.cpp CLI
 *
 * Runs `whisper-cli -m <model> -f <audio> -otxt -of <base> --print-progress`,
 * parses timestamped lines from stdout and progress from stderr. When stdout
 * carries no timestamped lines, the plain-text file written to `<base>.txt`
 * becomes a single segment.
 */

import { randomUUID } from 'crypto';
import { existsSync } from 'fs';
import { readFile, rm } from 'fs/promises';
import { homedir, tmpdir } from 'os';
import { join } from 'path';

import { findExecutable } from '../media/executables.js';
import { ProcessError, runProcess } from '../media/ProcessRunner.js';
import { PipelineError, errnoCode, errorMessage } from '../shared/errors.js';
import type { TranscriptSegment } from '../shared/types.js';
import { createLogger } from '../utils/Logger.js';
import type { RecognitionRequest, SpeechRecognizer } from './types.js';
import { parseWhisperOutput, parseWhisperProgress } from './whisperOutput.js';

// ============================================================================
// Types
// ============================================================================

export interface WhisperCliRecognizerOptions {
  /** Explicit executable; skips the lookup */
  executablePath?: string;
}

// ============================================================================
// Executable Lookup
// ============================================================================

const WHISPER_COMMANDS = ['whisper-cli', 'whisper'];

export const WHISPER_INSTALL_HINT =
  'Install whisper.cpp and put whisper-cli on your PATH, or set WHISPER_CLI_PATH';

/**
 * Locate the whisper CLI: WHISPER_CLI_PATH, then `whisper-cli` and
 * `whisper` on PATH, then the whisper.cpp source build under
 * ~/.local/share.
 */
export function resolveWhisperExecutable(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string | null {
  const override = env.WHISPER_CLI_PATH;
  if (override) {
    return existsSync(override) ? override : null;
  }

  for (const command of WHISPER_COMMANDS) {
    const found = findExecutable(command, env);
    if (found) return found;
  }

  const sourceBuild = join(home, '.local', 'share', 'whisper.cpp', 'src', 'build', 'bin', 'whisper-cli');
  return existsSync(sourceBuild) ? sourceBuild : null;
}

const log = createLogger('WhisperCliRecognizer');

// ============================================================================
// WhisperCliRecognizer Class
// ============================================================================

export class WhisperCliRecognizer implements SpeechRecognizer {
  private readonly executablePath?: string;

  constructor(options: WhisperCliRecognizerOptions = {}) {
    this.executablePath = options.executablePath;
  }

  async recognize(request: RecognitionRequest): Promise<TranscriptSegment[]> {
    const executable = this.executablePath ?? resolveWhisperExecutable();
    if (!executable) {
      throw new PipelineError('ToolNotFound', `whisper-cli not found. ${WHISPER_INSTALL_HINT}`);
    }

    const outputBase = join(tmpdir(), `keyscribe-transcript-${randomUUID()}`);
    const textPath = `${outputBase}.txt`;
    const { onProgress } = request;

    try {
      let output: string;
      try {
        ({ stdout: output } = await runProcess({
          command: executable,
          args: ['-m', request.modelPath, '-f', request.audioPath, '-otxt', '-of', outputBase, '--print-progress'],
          label: 'whisper',
          captureStdout: true,
          onStderrLine: onProgress
            ? (line) => {
                const fraction = parseWhisperProgress(line);
                if (fraction !== null) onProgress(fraction);
              }
            : undefined,
          signal: request.signal,
        }));
      } catch (error) {
        if (error instanceof ProcessError && error.isNotFound) {
          throw new PipelineError('ToolNotFound', `whisper-cli not found at ${executable}. ${WHISPER_INSTALL_HINT}`, {
            cause: error,
          });
        }
        throw new PipelineError('TranscriptionFailed', `Transcription failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      const segments = parseWhisperOutput(output);
      if (segments.length > 0) {
        log.debug(`Parsed ${segments.length} timestamped segment(s)`);
        return segments;
      }

      const plainText = (await this.readPlainText(textPath)).trim();
      if (!plainText) {
        log.debug('Recognizer produced no text');
        return [];
      }
      log.debug('No timestamped output; using plain-text transcript');
      return [{ start: 0, end: 0, text: plainText }];
    } finally {
      await rm(textPath, { force: true });
    }
  }

  private async readPlainText(textPath: string): Promise<string> {
    try {
      return await readFile(textPath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return '';
      }
      throw new PipelineError('TranscriptionFailed', `Cannot read transcript file ${textPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
