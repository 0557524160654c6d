import chalk from 'chalk';

export interface DiffReport {
  left: string;
  right: string;
  target?: string;
  warnings: string[];
  lines: string[];
}

function colorLine(line: string): string {
  if (line.startsWith('Change details for [')) return chalk.bold(line);
  if (line.startsWith('    -')) return chalk.red(line);
  if (line.startsWith('    +')) return chalk.green(line);
  if (line.startsWith('  (')) return chalk.yellow(line);
  if (line.startsWith('Skipping ') || line.startsWith('Unable to explain')) return chalk.dim(line);
  return line;
}

export function formatTerminal(report: DiffReport): string {
  if (report.lines.length === 0) {
    return chalk.dim('No RuleKey differences found.');
  }
  return report.lines.map(colorLine).join('\n');
}
