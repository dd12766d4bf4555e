/**
 * Common formatters for CLI output
 *
 * Color is decided by the configured mode: `always`, `never`, or `auto`
 * (interactive terminal, NO_COLOR unset, TERM not dumb).
 */

import type { ColorMode } from '../types/config.js';
import type { Task } from '../types/task.js';
import { detectTerminal } from './terminal.js';

/**
 * Terminal width for formatting (fallback to 80)
 */
export const TERM_WIDTH = process.stdout.columns || 80;

let colorMode: ColorMode = 'auto';

export function setColorMode(mode: ColorMode): void {
  colorMode = mode;
}

/**
 * Check if ANSI colors should be emitted
 */
export function useColor(): boolean {
  switch (colorMode) {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'auto': {
      const terminal = detectTerminal();
      return terminal.interactive && terminal.colorAllowed;
    }
  }
}

/**
 * ANSI color codes (only used if colors are enabled)
 */
export const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export type ColorName = keyof typeof COLORS;

export function color(text: string, colorCode: ColorName): string {
  if (!useColor()) {
    return text;
  }
  return `${COLORS[colorCode]}${text}${COLORS.reset}`;
}

export function dim(text: string): string {
  return color(text, 'dim');
}

export function bold(text: string): string {
  return color(text, 'bold');
}

export function success(text: string): string {
  return `${color('✓', 'green')} ${text}`;
}

export function error(text: string): string {
  return `${color('✗', 'red')} ${text}`;
}

export function warning(text: string): string {
  return `${color('⚠', 'yellow')} ${text}`;
}

/**
 * Create a horizontal rule
 */
export function hr(width: number = TERM_WIDTH): string {
  return dim('─'.repeat(width));
}

/**
 * Calculate column widths for table data
 */
export function calculateColumnWidths(headers: string[], rows: string[][]): number[] {
  return headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] || '').length)));
}

/**
 * Format a simple table with a dimmed header
 */
export function formatTable(headers: string[], rows: string[][]): string {
  const widths = calculateColumnWidths(headers, rows);
  const line = (columns: string[]) => columns.map((col, i) => col.padEnd(widths[i])).join('  ').trimEnd();

  return [
    dim(line(headers)),
    hr(widths.reduce((sum, w) => sum + w + 2, -2)),
    ...rows.map(line),
  ].join('\n');
}

const STATUS_MARKS: Record<Task['status'], string> = {
  open: '○',
  completed: '✓',
  canceled: '✗',
};

/**
 * One-line summary of a task:
 *   ○ Review PR  #jira #review  [Mobile App]  due 2024-12-15
 */
export function formatTaskLine(task: Task, options: { showId?: boolean } = {}): string {
  const parts: string[] = [];

  const mark = STATUS_MARKS[task.status];
  parts.push(task.status === 'completed' ? color(mark, 'green') : task.status === 'canceled' ? color(mark, 'gray') : mark);
  parts.push(task.status === 'open' ? task.name : dim(task.name));

  if (task.tags.length > 0) {
    parts.push(color(task.tags.map((t) => `#${t}`).join(' '), 'cyan'));
  }

  const container = task.project ?? task.area;
  if (container) {
    parts.push(dim(`[${container}]`));
  }

  if (task.dueDate) {
    parts.push(color(`due ${task.dueDate}`, 'yellow'));
  }

  if (options.showId) {
    parts.push(dim(task.id));
  }

  return parts.join('  ');
}

/**
 * Multi-line view of one task for `show`; empty fields are left out
 */
export function formatTaskDetails(task: Task): string[] {
  const lines = [bold(task.name)];
  const field = (label: string, value: string | null) => {
    if (value) {
      lines.push(`  ${`${label}:`.padEnd(11)}${value}`);
    }
  };

  field('ID', task.id);
  field('Status', task.status);
  field('Project', task.project);
  field('Area', task.area);
  field('Tags', task.tags.join(', '));
  field('Due', task.dueDate);
  field('Created', task.createdAt);
  field('Modified', task.modifiedAt);
  field('Completed', task.completedAt);

  if (task.notes) {
    lines.push('  Notes:');
    for (const line of task.notes.split('\n')) {
      lines.push(`    ${line}`);
    }
  }
  return lines;
}

/**
 * Format bytes to human-readable size
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}
