/**
 * settings.ts - Run configuration for `keyscribe analyze`
 *
 * Values come from CLI flags, then KEYSCRIBE_* environment variables, then
 * defaults. The merged result is validated once with zod; any violation is
 * reported as a single InvalidOptions error listing every bad field.
 */

import { extname, resolve } from 'path';
import { z } from 'zod';

import { PipelineError } from '../shared/errors.js';
import { defaultModelPath } from '../transcription/ModelDownloadManager.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SETTINGS = {
  threshold: 0.85,
  quality: 30,
  scale: 0.5,
} as const;

const OUTPUT_SUFFIX = '_keyscribe.md';
const FRAMES_SUFFIX = '_frames';

// ============================================================================
// Schema
// ============================================================================

export const analyzeSettingsSchema = z
  .object({
    inputPath: z.string().min(1, 'input path is required'),
    outputPath: z.string().min(1),
    framesDir: z.string().min(1),
    threshold: z.coerce
      .number()
      .gt(0, 'must be greater than 0')
      .lt(1, 'must be less than 1'),
    quality: z.coerce.number().int('must be an integer').min(1).max(100),
    scale: z.coerce.number().gt(0, 'must be greater than 0').lte(1, 'must be at most 1'),
    modelPath: z.string().min(1),
    transcript: z.boolean(),
    frames: z.boolean(),
    download: z.boolean(),
    verbose: z.boolean(),
  })
  .refine((settings) => settings.transcript || settings.frames, {
    message: '--no-transcript and --no-frames together leave nothing to analyze',
    path: ['frames'],
  });

export type AnalyzeSettings = z.infer<typeof analyzeSettingsSchema>;

/**
 * Raw option bag as commander hands it over. Numbers arrive as strings.
 */
export interface AnalyzeCliOptions {
  output?: string;
  threshold?: string | number;
  quality?: string | number;
  scale?: string | number;
  model?: string;
  transcript?: boolean;
  frames?: boolean;
  download?: boolean;
  verbose?: boolean;
}

// ============================================================================
// Path Derivation
// ============================================================================

/**
 * `/videos/demo.mp4` -> `/videos/demo_keyscribe.md`
 */
export function defaultOutputPath(inputPath: string): string {
  const ext = extname(inputPath);
  const base = ext ? inputPath.slice(0, -ext.length) : inputPath;
  return `${base}${OUTPUT_SUFFIX}`;
}

/**
 * `/out/report.md` -> `/out/report_frames`
 */
export function framesDirFor(outputPath: string): string {
  const base = outputPath.endsWith('.md') ? outputPath.slice(0, -'.md'.length) : outputPath;
  return `${base}${FRAMES_SUFFIX}`;
}

// ============================================================================
// Resolution
// ============================================================================

function firstDefined<T>(...values: Array<T | undefined>): T | undefined {
  return values.find((value) => value !== undefined && value !== '');
}

/**
 * Merge flags, environment and defaults, then validate.
 */
export function resolveAnalyzeSettings(
  inputPath: string,
  options: AnalyzeCliOptions,
  env: NodeJS.ProcessEnv = process.env
): AnalyzeSettings {
  const absoluteInput = inputPath ? resolve(inputPath) : '';
  const outputPath = resolve(options.output ?? defaultOutputPath(absoluteInput));
  const modelPath = firstDefined(options.model, env.KEYSCRIBE_MODEL_PATH);

  const result = analyzeSettingsSchema.safeParse({
    inputPath: absoluteInput,
    outputPath,
    framesDir: framesDirFor(outputPath),
    threshold: firstDefined(options.threshold, env.KEYSCRIBE_THRESHOLD) ?? DEFAULT_SETTINGS.threshold,
    quality: firstDefined(options.quality, env.KEYSCRIBE_QUALITY) ?? DEFAULT_SETTINGS.quality,
    scale: firstDefined(options.scale, env.KEYSCRIBE_SCALE) ?? DEFAULT_SETTINGS.scale,
    modelPath: modelPath ? resolve(modelPath) : defaultModelPath(),
    transcript: options.transcript ?? true,
    frames: options.frames ?? true,
    download: options.download ?? true,
    verbose: options.verbose ?? false,
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const field = issue.path.join('.') || 'options';
      return `  ${field}: ${issue.message}`;
    });
    throw new PipelineError('InvalidOptions', `Invalid options:\n${problems.join('\n')}`);
  }

  return result.data;
}
