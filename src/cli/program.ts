/**
 * program.ts - Command definitions for the keyscribe CLI
 *
 * Commands:
 *   keyscribe analyze <media-file> [options]
 *   keyscribe doctor
 *
 * Actions return exit codes instead of exiting, so the entry point owns
 * process lifetime.
 */

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';

import { DEFAULT_SETTINGS, resolveAnalyzeSettings } from '../config/settings.js';
import type { AnalyzeCliOptions, AnalyzeSettings } from '../config/settings.js';
import { errorMessage } from '../shared/errors.js';
import { parseLogLevel, setLogLevel } from '../utils/Logger.js';
import {
  AnalyzePipeline,
  EXIT_SIGINT,
  EXIT_SUCCESS,
  EXIT_USER_ERROR,
  exitCodeFor,
} from './AnalyzePipeline.js';
import type { AnalyzeResult } from './AnalyzePipeline.js';
import { runDoctorChecks } from './doctor.js';
import type { DoctorResult } from './doctor.js';
import { ConsoleStepReporter } from './StepReporter.js';
import type { StepReporter } from './StepReporter.js';
import { banner, fail, step, success, warn } from './terminal.js';

// ============================================================================
// Version
// ============================================================================

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
    const parsed = packageJsonSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.version : '0.0.0-dev';
  } catch {
    return '0.0.0-dev';
  }
}

export const VERSION = readVersion();

// ============================================================================
// Types
// ============================================================================

export interface RunnablePipeline {
  run(): Promise<AnalyzeResult>;
  abort(): void;
  readonly aborted: boolean;
}

export interface ProgramDependencies {
  createPipeline?: (settings: AnalyzeSettings, reporter: StepReporter) => RunnablePipeline;
  runDoctor?: () => Promise<DoctorResult>;
  /** Receives the exit code of each finished command */
  onExit?: (code: number) => void;
}

// ============================================================================
// Active run tracking (signal handlers abort it)
// ============================================================================

let activePipeline: RunnablePipeline | null = null;

/**
 * Abort the active run. Returns false when nothing was running.
 */
export function interruptActiveRun(): boolean {
  if (!activePipeline) return false;
  activePipeline.abort();
  return true;
}

// ============================================================================
// analyze
// ============================================================================

export async function runAnalyzeCommand(
  mediaFile: string,
  options: AnalyzeCliOptions,
  dependencies: ProgramDependencies = {}
): Promise<number> {
  banner(VERSION);

  let settings: AnalyzeSettings;
  try {
    settings = resolveAnalyzeSettings(mediaFile, options);
  } catch (error) {
    fail(errorMessage(error));
    return EXIT_USER_ERROR;
  }

  if (settings.verbose && !parseLogLevel(process.env.KEYSCRIBE_LOG_LEVEL)) {
    setLogLevel('debug');
  }

  step(`Input:  ${settings.inputPath}`);
  step(`Output: ${settings.outputPath}`);
  if (settings.frames) {
    step(`Frames: ${settings.framesDir}/`);
  }
  console.log();

  const reporter = new ConsoleStepReporter({ verbose: settings.verbose });
  const pipeline = dependencies.createPipeline
    ? dependencies.createPipeline(settings, reporter)
    : new AnalyzePipeline(settings, { reporter });

  activePipeline = pipeline;
  try {
    const result = await pipeline.run();

    console.log();
    if (result.segmentCount === 0 && result.keyframeCount === 0) {
      warn('Report has no transcript and no keyframes.');
    }
    success('Analysis complete!');
    console.log();
    console.log(`  Transcript segments: ${result.segmentCount}`);
    console.log(`  Keyframes:           ${result.keyframeCount} of ${result.sampledFrameCount} frames`);
    console.log(`  Token estimate:      ~${result.tokenEstimate}`);
    console.log(`  Processing time:     ${result.elapsedSeconds.toFixed(1)}s`);
    console.log();
    // Stable prefix for scripts and agents: `keyscribe analyze ... | grep '^OUTPUT:'`
    console.log(`OUTPUT:${result.outputPath}`);
    return EXIT_SUCCESS;
  } catch (error) {
    console.log();
    if (pipeline.aborted) {
      fail('Interrupted');
      return EXIT_SIGINT;
    }
    fail(`Analysis failed: ${errorMessage(error)}`);
    if (settings.verbose && error instanceof Error && error.stack) {
      console.log();
      console.log(error.stack);
    }
    return exitCodeFor(error);
  } finally {
    activePipeline = null;
  }
}

// ============================================================================
// doctor
// ============================================================================

export async function runDoctorCommand(dependencies: ProgramDependencies = {}): Promise<number> {
  banner(VERSION);

  const result = await (dependencies.runDoctor ?? runDoctorChecks)();

  for (const check of result.checks) {
    const line = `${check.name}: ${check.message}`;
    if (check.status === 'pass') success(line);
    else if (check.status === 'warn') warn(line);
    else fail(line);

    if (check.hint && check.status !== 'pass') {
      for (const hintLine of check.hint.split('\n')) {
        console.log(`      ${hintLine}`);
      }
    }
  }

  console.log();
  console.log(`  ${result.passed} passed, ${result.warned} warning(s), ${result.failed} failed`);
  console.log();

  return result.failed > 0 ? EXIT_USER_ERROR : EXIT_SUCCESS;
}

// ============================================================================
// CLI definition
// ============================================================================

export function createProgram(dependencies: ProgramDependencies = {}): Command {
  const onExit = dependencies.onExit ?? ((code: number) => {
    process.exitCode = code;
  });

  const program = new Command();

  program
    .name('keyscribe')
    .description('Turn video and audio files into markdown with a timestamped transcript and keyframes')
    .version(VERSION, '-v, --version')
    .showHelpAfterError('(use --help for available options)');

  program
    .command('analyze')
    .description('Analyze a media file and write a markdown report')
    .argument('<media-file>', 'Path to the video or audio file')
    .option('-o, --output <path>', 'Output markdown path (default: <input>_keyscribe.md)')
    .option('-t, --threshold <number>', `Similarity threshold, 0-1 exclusive (default: ${DEFAULT_SETTINGS.threshold})`)
    .option('-q, --quality <number>', `JPEG quality, 1-100 (default: ${DEFAULT_SETTINGS.quality})`)
    .option('-s, --scale <number>', `Keyframe scale factor, 0-1 (default: ${DEFAULT_SETTINGS.scale})`)
    .option('-m, --model <path>', 'Whisper model path (default: ~/.cache/whisper/ggml-base.bin)')
    .option('--no-transcript', 'Skip transcription (frames only)')
    .option('--no-frames', 'Skip frame extraction (audio only)')
    .option('--no-download', 'Fail instead of downloading a missing model')
    .option('--verbose', 'Verbose output', false)
    .action(async (mediaFile: string, options: AnalyzeCliOptions) => {
      onExit(await runAnalyzeCommand(mediaFile, options, dependencies));
    });

  program
    .command('doctor')
    .description('Check that ffmpeg, whisper and the model are available')
    .action(async () => {
      onExit(await runDoctorCommand(dependencies));
    });

  return program;
}
