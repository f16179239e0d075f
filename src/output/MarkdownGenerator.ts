/**
 * MarkdownGenerator - Report document for keyscribe
 *
 * Line-oriented layout:
 * - `# Video Analysis: <file>` followed by a metadata list
 * - `## Transcript`, one `[M:SS] text` line per segment (omitted when empty)
 * - `## Keyframes`, a heading and image link per keyframe (omitted when empty)
 *
 * Image links are relative to the report's directory.
 */

import { writeFile } from 'fs/promises';
import * as path from 'path';

import { PipelineError, errnoCode, errorMessage } from '../shared/errors.js';
import { computeRelativeFramePath, formatTimestamp, markdownLinkTarget, singleLine } from './helpers.js';
import type { AnalysisReport } from './ReportAssembler.js';

export class MarkdownGenerator {
  /**
   * Render the report as markdown text. `reportDir` is where the document
   * will live; keyframe paths are made relative to it.
   */
  generate(report: AnalysisReport, reportDir: string): string {
    const blocks: string[] = [
      `# Video Analysis: ${report.sourceName}`,
      [
        '## Metadata',
        `- Duration: ${formatTimestamp(report.durationSeconds)}`,
        `- Original frames: ${report.sampledFrameCount}`,
        `- Keyframes extracted: ${report.keyframes.length}`,
        `- Token estimate: ~${report.tokenEstimate}`,
      ].join('\n'),
    ];

    if (report.segments.length > 0) {
      blocks.push('## Transcript');
      blocks.push(
        report.segments
          .map((segment) => `[${formatTimestamp(segment.start)}] ${singleLine(segment.text)}`)
          .join('\n')
      );
    }

    if (report.keyframes.length > 0) {
      blocks.push('## Keyframes');
      for (const keyframe of report.keyframes) {
        const time = formatTimestamp(keyframe.timestamp);
        const target = markdownLinkTarget(computeRelativeFramePath(keyframe.path, reportDir));
        blocks.push(`### Frame ${keyframe.index} (${time})\n![Frame at ${time}](${target})`);
      }
    }

    return `${blocks.join('\n\n')}\n`;
  }

  /**
   * Render and write the document to outputPath.
   */
  async write(report: AnalysisReport, outputPath: string): Promise<void> {
    const content = this.generate(report, path.dirname(outputPath));
    try {
      await writeFile(outputPath, content, 'utf-8');
    } catch (error) {
      const reason = errnoCode(error) === 'ENOSPC' ? 'Disk is full' : errorMessage(error);
      throw new PipelineError('WriteFailed', `Failed to write output file: ${outputPath}\n  Reason: ${reason}`, {
        cause: error,
      });
    }
  }
}

export const markdownGenerator = new MarkdownGenerator();
export default MarkdownGenerator;
