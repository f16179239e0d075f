#!/usr/bin/env node
/**
 * keyscribe CLI - Media files to markdown from the command line
 *
 * Usage:
 *   keyscribe analyze <media-file> [options]
 *   keyscribe doctor
 *
 * Processes a video or audio file:
 *   1. Sample one frame per second and keep the visually distinct ones
 *   2. Extract the audio track and transcribe it with whisper.cpp
 *   3. Write a markdown report linking transcript and keyframes
 */

import { EXIT_SIGINT, EXIT_SUCCESS } from './AnalyzePipeline.js';
import { VERSION, createProgram, interruptActiveRun } from './program.js';
import { banner } from './terminal.js';

// ============================================================================
// Signal handling
// ============================================================================

let interrupted = false;

function setupSignalHandlers(): void {
  const handler = (): void => {
    if (interrupted) {
      // Second signal: stop waiting for cleanup
      process.exit(EXIT_SIGINT);
    }
    interrupted = true;
    console.log('\n  Interrupted, cleaning up...');
    if (!interruptActiveRun()) {
      process.exit(EXIT_SIGINT);
    }
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
}

setupSignalHandlers();

const program = createProgram();

// Show help if no command provided
if (process.argv.length <= 2) {
  banner(VERSION);
  program.outputHelp();
  process.exit(EXIT_SUCCESS);
}

await program.parseAsync(process.argv);
