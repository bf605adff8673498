import * as fs from 'fs';
import * as path from 'path';
import type { PipelineRunSummary } from '@tube-to-pod/publish-episodes';

const HEADER = `# Pipeline Run History

This file contains a log of pipeline runs, with the most recent runs at the top.

`;

const STATUS_LABELS: Record<PipelineRunSummary['outcome'], string> = {
  success: '✅ SUCCESS',
  'partial-failure': '⚠️ PARTIAL FAILURE',
  'total-failure': '❌ TOTAL FAILURE',
};

/**
 * Logs pipeline results to a markdown file with most recent entries first
 */
export class PipelineResultLogger {
  constructor(private readonly logFilePath: string) {}

  logRun(summary: PipelineRunSummary, startTime: Date, endTime: Date = new Date()): void {
    const status = summary.dryRun ? '🧪 DRY RUN' : STATUS_LABELS[summary.outcome];
    let entry = this.formatHeading(startTime, endTime, status);

    entry += `**Detected:** ${summary.detected}  \n`;
    entry += `**Published:** ${summary.published}  \n`;
    entry += `**Failed:** ${summary.failed}  \n`;
    entry += `**Skipped:** ${summary.skipped}  \n`;
    if (summary.recovered > 0) {
      entry += `**Recovered:** ${summary.recovered}  \n`;
    }
    entry += '\n';

    if (summary.publishedIdentities.length > 0) {
      entry += '### Published\n\n';
      entry += summary.publishedIdentities.map(identity => `- \`${identity}\``).join('\n') + '\n\n';
    }

    if (summary.wouldProcess.length > 0) {
      entry += '### Would Process\n\n';
      entry += summary.wouldProcess.map(identity => `- \`${identity}\``).join('\n') + '\n\n';
    }

    if (summary.failures.length > 0) {
      entry += '### Failures\n\n';
      entry +=
        summary.failures
          .map(failure => {
            const parked = failure.parked ? ', no further retries' : '';
            return `- \`${failure.identity}\` ${failure.title}: ${failure.message} (attempt ${failure.attempts}${parked})`;
          })
          .join('\n') + '\n\n';
    }

    this.prependEntry(entry);
  }

  /** Runs that ended before producing a summary */
  logAbortedRun(error: unknown, startTime: Date, endTime: Date = new Date()): void {
    const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    const entry = this.formatHeading(startTime, endTime, '🛑 ABORTED') + `**Error:** ${message}\n\n`;
    this.prependEntry(entry);
  }

  getLogFilePath(): string {
    return this.logFilePath;
  }

  private formatHeading(startTime: Date, endTime: Date, status: string): string {
    const durationSeconds = ((endTime.getTime() - startTime.getTime()) / 1000).toFixed(1);
    return `## ${endTime.toISOString()} - ${status}\n\n**Duration:** ${durationSeconds}s  \n`;
  }

  private prependEntry(entry: string): void {
    let existingContent = '';
    if (fs.existsSync(this.logFilePath)) {
      existingContent = fs.readFileSync(this.logFilePath, 'utf8');
      if (existingContent.startsWith(HEADER)) {
        existingContent = existingContent.slice(HEADER.length);
      }
    }

    fs.mkdirSync(path.dirname(this.logFilePath), { recursive: true });
    fs.writeFileSync(this.logFilePath, HEADER + entry + '---\n\n' + existingContent);
  }
}
