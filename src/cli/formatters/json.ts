import type { DiffReport } from './terminal.js';

export function formatJson(report: DiffReport): string {
  return JSON.stringify({
    left: report.left,
    right: report.right,
    target: report.target ?? null,
    warnings: report.warnings,
    lines: report.lines,
  }, null, 2);
}
