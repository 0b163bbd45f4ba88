import type { CombinedStats, RunSummary } from '@refmt/core';

const ANSI_RED = '\u001b[31m';
const ANSI_YELLOW = '\u001b[33m';
const ANSI_GREEN = '\u001b[32m';
const ANSI_RESET = '\u001b[0m';

export function isTTY(): boolean {
  return process.stdout.isTTY ?? false;
}

function paint(text: string, color: string, useColors: boolean): string {
  return useColors ? `${color}${text}${ANSI_RESET}` : text;
}

function dryRunPrefix(dryRun: boolean, useColors: boolean): string {
  return dryRun ? `${paint('[DRY-RUN]', ANSI_YELLOW, useColors)} ` : '';
}

function withFailures(lines: string[], failed: number, useColors: boolean): string {
  if (failed > 0) {
    lines.push(paint(`${failed} file(s) failed`, ANSI_RED, useColors));
  }
  return lines.join('\n');
}

export function formatConvertSummary(summary: RunSummary, dryRun: boolean, useColors: boolean): string {
  const lines: string[] = [];
  if (summary.changed === 0) {
    lines.push('No files needed conversion');
  } else if (dryRun) {
    lines.push(`${dryRunPrefix(true, useColors)}Would convert ${summary.changed} file(s)`);
  } else {
    lines.push(paint(`Converted ${summary.changed} file(s)`, ANSI_GREEN, useColors));
  }
  return withFailures(lines, summary.failed, useColors);
}

export function formatCleanSummary(summary: RunSummary, dryRun: boolean, useColors: boolean): string {
  const lines: string[] = [];
  if (summary.changed === 0) {
    lines.push('No files needed cleaning');
  } else {
    lines.push(
      `${dryRunPrefix(dryRun, useColors)}Cleaned ${summary.changes} lines in ${summary.changed} file(s)`,
    );
  }
  return withFailures(lines, summary.failed, useColors);
}

export function formatEmojiSummary(summary: RunSummary, dryRun: boolean, useColors: boolean): string {
  const lines: string[] = [];
  if (summary.changed === 0) {
    lines.push('No files contained emojis to transform');
  } else {
    lines.push(
      `${dryRunPrefix(dryRun, useColors)}Transformed emojis in ${summary.changed} file(s) (${summary.changes} changes)`,
    );
  }
  return withFailures(lines, summary.failed, useColors);
}

export function formatRenameSummary(summary: RunSummary, dryRun: boolean, useColors: boolean): string {
  const lines: string[] = [];
  if (summary.changed === 0) {
    lines.push('No files needed renaming');
  } else {
    lines.push(`${dryRunPrefix(dryRun, useColors)}Renamed ${summary.changed} file(s)`);
  }
  return withFailures(lines, summary.failed, useColors);
}

/**
 * Multi-line breakdown for the default command; only non-zero steps are listed.
 */
export function formatCombinedSummary(stats: CombinedStats, dryRun: boolean, useColors: boolean): string {
  const lines: string[] = [];
  if (stats.filesRenamed === 0 && stats.filesEmojiTransformed === 0 && stats.filesWhitespaceCleaned === 0) {
    lines.push('No files needed processing');
    return withFailures(lines, stats.failed, useColors);
  }

  lines.push(`${dryRunPrefix(dryRun, useColors)}Processed files:`);
  if (stats.filesRenamed > 0) {
    lines.push(`  - Renamed: ${stats.filesRenamed} file(s)`);
  }
  if (stats.filesEmojiTransformed > 0) {
    lines.push(
      `  - Emoji transformations: ${stats.filesEmojiTransformed} file(s) (${stats.emojiChanges} changes)`,
    );
  }
  if (stats.filesWhitespaceCleaned > 0) {
    lines.push(
      `  - Whitespace cleaned: ${stats.filesWhitespaceCleaned} file(s) (${stats.whitespaceLinesCleaned} lines)`,
    );
  }
  return withFailures(lines, stats.failed, useColors);
}
