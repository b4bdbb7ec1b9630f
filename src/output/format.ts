import { Diagnostic } from '../types';
import {
  getDiagnosticCounts,
  getSuggestion,
  groupByFile,
  sortDiagnostics,
} from '../parser/diagnostics';

export interface FormatOptions {
  /** Include the file name in the location (off under a per-file header) */
  includeFile?: boolean;
  /** Print remedy hints below diagnostics */
  suggestions?: boolean;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}

/**
 * Location text, e.g. "main.tex:12", "lines 5--7" or "main.tex (at the end)"
 */
export function formatLocation(diagnostic: Diagnostic, includeFile = true): string {
  const file = includeFile ? diagnostic.file : null;

  if (diagnostic.atEndOfInput) {
    return file ? `${file} (at the end)` : 'at the end';
  }

  if (diagnostic.line === null) {
    return file ?? '';
  }

  const hasRange = diagnostic.endLine !== undefined && diagnostic.endLine !== diagnostic.line;
  const lines = hasRange ? `${diagnostic.line}--${diagnostic.endLine}` : `${diagnostic.line}`;
  if (file) {
    return `${file}:${lines}`;
  }
  return hasRange ? `lines ${lines}` : `line ${lines}`;
}

/**
 * Render one diagnostic as a single line
 */
export function formatDiagnostic(diagnostic: Diagnostic, options: FormatOptions = {}): string {
  const label = diagnostic.severity === 'error' ? 'Error' : 'Warning';
  const location = formatLocation(diagnostic, options.includeFile ?? true);
  return location ? `${label} ${location}: ${diagnostic.message}` : `${label}: ${diagnostic.message}`;
}

/**
 * Human-readable report grouped by source file
 */
export function formatReport(diagnostics: Diagnostic[], options: FormatOptions = {}): string {
  if (diagnostics.length === 0) {
    return 'No problems found.';
  }

  const lines: string[] = [];
  const grouped = groupByFile(sortDiagnostics(diagnostics));

  for (const [file, fileDiagnostics] of grouped) {
    lines.push(`File: ${file}`);
    lines.push('');

    for (const diagnostic of fileDiagnostics) {
      lines.push(formatDiagnostic(diagnostic, { includeFile: false }));
      const suggestion = options.suggestions ? getSuggestion(diagnostic) : null;
      if (suggestion) {
        lines.push(`  Hint: ${suggestion}`);
      }
    }

    lines.push('');
  }

  const counts = getDiagnosticCounts(diagnostics);
  lines.push(`Summary: ${plural(counts.errors, 'error')}, ${plural(counts.warnings, 'warning')}`);

  return lines.join('\n');
}

export interface LogReport {
  /** Path of the log the diagnostics came from */
  log: string;
  diagnostics: Diagnostic[];
}

/**
 * Machine-readable report, one entry per log
 */
export function formatJson(reports: LogReport[]): string {
  return JSON.stringify(
    reports.map((report) => ({
      log: report.log,
      diagnostics: report.diagnostics,
      summary: getDiagnosticCounts(report.diagnostics),
    })),
    null,
    2
  );
}
