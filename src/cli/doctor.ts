/**
 * doctor.ts - Environment health check for the keyscribe CLI
 *
 * Checks that everything an analysis run needs is available:
 * - Node.js version compatibility
 * - ffmpeg / ffprobe (frame sampling, audio extraction, duration probe)
 * - whisper.cpp CLI (speech recognition)
 * - Whisper model (downloaded on first run when missing)
 * - Disk space (frames, audio and the model)
 */

import { execFile as execFileCb } from 'child_process';
import { stat } from 'fs/promises';
import { platform } from 'os';

import { SAFE_CHILD_ENV } from '../media/ProcessRunner.js';
import { ModelDownloadManager, defaultModelPath } from '../transcription/ModelDownloadManager.js';
import { WHISPER_INSTALL_HINT, resolveWhisperExecutable } from '../transcription/WhisperCliRecognizer.js';

// ============================================================================
// Types
// ============================================================================

export interface DoctorCheck {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
  hint?: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  passed: number;
  warned: number;
  failed: number;
}

export interface DoctorOptions {
  env?: NodeJS.ProcessEnv;
  nodeVersion?: string;
  modelPath?: string;
}

const MIN_NODE_MAJOR = 20;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Execute a command and return stdout, or null on failure.
 */
function execQuiet(command: string, args: string[]): Promise<string | null> {
  return new Promise((resolve) => {
    execFileCb(command, args, { env: SAFE_CHILD_ENV }, (error, stdout) => {
      if (error) {
        resolve(null);
      } else {
        resolve(stdout?.toString().trim() ?? '');
      }
    });
  });
}

/**
 * Parse a semver string into [major, minor, patch].
 */
function parseSemver(version: string): [number, number, number] | null {
  const match = version.match(/(\d+)\.(\d+)\.(\d+)/);
  if (!match) return null;
  return [parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10)];
}

function ffmpegInstallHint(): string {
  const os = platform();
  return os === 'darwin'
    ? 'brew install ffmpeg'
    : os === 'win32'
      ? 'winget install ffmpeg (or download from https://ffmpeg.org)'
      : 'apt install ffmpeg (or your package manager)';
}

// ============================================================================
// Check functions
// ============================================================================

async function checkNodeVersion(version: string): Promise<DoctorCheck> {
  const parsed = parseSemver(version);

  if (!parsed) {
    return {
      name: 'Node.js',
      status: 'warn',
      message: `Unknown version: ${version}`,
      hint: `keyscribe requires Node.js >= ${MIN_NODE_MAJOR}.0.0`,
    };
  }

  const [major] = parsed;

  if (major >= MIN_NODE_MAJOR) {
    return {
      name: 'Node.js',
      status: 'pass',
      message: `${version} (>= ${MIN_NODE_MAJOR}.0.0)`,
    };
  }

  return {
    name: 'Node.js',
    status: 'fail',
    message: `${version} is too old`,
    hint: `keyscribe requires Node.js >= ${MIN_NODE_MAJOR}.0.0. Upgrade at https://nodejs.org`,
  };
}

async function checkTool(name: 'ffmpeg' | 'ffprobe', command: string): Promise<DoctorCheck> {
  const stdout = await execQuiet(command, ['-version']);

  if (stdout === null) {
    return {
      name,
      status: 'fail',
      message: command === name ? 'Not found on PATH' : `Not runnable: ${command}`,
      hint:
        name === 'ffmpeg'
          ? `Install via: ${ffmpegInstallHint()}`
          : 'ffprobe is usually installed alongside ffmpeg',
    };
  }

  // First line looks like "ffmpeg version 6.1.1 Copyright ..."
  const versionMatch = stdout.match(new RegExp(`${name} version (\\S+)`));
  const version = versionMatch ? versionMatch[1] : 'unknown';

  return {
    name,
    status: 'pass',
    message: `Installed (${version})`,
  };
}

async function checkWhisperCli(env: NodeJS.ProcessEnv): Promise<DoctorCheck> {
  const executable = resolveWhisperExecutable(env);

  if (!executable) {
    return {
      name: 'whisper-cli',
      status: 'fail',
      message: env.WHISPER_CLI_PATH ? `Not found: ${env.WHISPER_CLI_PATH}` : 'Not found',
      hint: `${WHISPER_INSTALL_HINT}. Needed unless you run with --no-transcript`,
    };
  }

  return {
    name: 'whisper-cli',
    status: 'pass',
    message: executable,
  };
}

async function checkWhisperModel(modelPath: string): Promise<DoctorCheck> {
  const available = await new ModelDownloadManager().isModelAvailable(modelPath);

  if (!available) {
    return {
      name: 'Whisper model',
      status: 'warn',
      message: `Not found at ${modelPath}`,
      hint: 'It is downloaded on the first transcribing run, or pass --model <path>',
    };
  }

  return {
    name: 'Whisper model',
    status: 'pass',
    message: modelPath,
  };
}

async function checkDiskSpace(env: NodeJS.ProcessEnv): Promise<DoctorCheck> {
  // Frames and audio are staged in the OS temp directory
  try {
    const tempDir = env.TMPDIR || env.TEMP || '/tmp';

    if (platform() !== 'win32') {
      const dfOutput = await execQuiet('df', ['-k', tempDir]);
      if (dfOutput) {
        // Filesystem 1K-blocks Used Available Use% Mounted
        const lines = dfOutput.split('\n');
        if (lines.length >= 2) {
          const parts = lines[1].split(/\s+/);
          if (parts.length >= 4) {
            const availableKB = parseInt(parts[3], 10);
            if (!isNaN(availableKB)) {
              const availableGB = availableKB / (1024 * 1024);
              if (availableGB < 1) {
                return {
                  name: 'Disk space',
                  status: 'warn',
                  message: `${availableGB.toFixed(1)} GB available (low)`,
                  hint: 'Long videos produce many temporary frames. Free up some space before analyzing them',
                };
              }
              return {
                name: 'Disk space',
                status: 'pass',
                message: `${availableGB.toFixed(1)} GB available`,
              };
            }
          }
        }
      }
    }

    await stat(tempDir);
    return {
      name: 'Disk space',
      status: 'pass',
      message: 'Temp directory accessible',
    };
  } catch {
    return {
      name: 'Disk space',
      status: 'warn',
      message: 'Could not determine available disk space',
    };
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run all doctor checks and return the result.
 */
export async function runDoctorChecks(options: DoctorOptions = {}): Promise<DoctorResult> {
  const env = options.env ?? process.env;
  const modelPath = options.modelPath ?? env.KEYSCRIBE_MODEL_PATH ?? defaultModelPath();

  const checks = await Promise.all([
    checkNodeVersion(options.nodeVersion ?? process.version),
    checkTool('ffmpeg', env.FFMPEG_PATH || 'ffmpeg'),
    checkTool('ffprobe', env.FFPROBE_PATH || 'ffprobe'),
    checkWhisperCli(env),
    checkWhisperModel(modelPath),
    checkDiskSpace(env),
  ]);

  const passed = checks.filter((c) => c.status === 'pass').length;
  const warned = checks.filter((c) => c.status === 'warn').length;
  const failed = checks.filter((c) => c.status === 'fail').length;

  return { checks, passed, warned, failed };
}
