import { UNKNOWN_FILE } from '../constants';
import { Diagnostic } from '../types';

/**
 * Diagnostic suggestions based on error codes
 */
const SUGGESTIONS: Partial<Record<Diagnostic['code'], string>> = {
  UNDEFINED_CONTROL_SEQUENCE: 'Check for typos in command name or missing \\usepackage',
  TOO_MANY_BRACES: 'Remove the extra } or add the missing {',
  MISSING_MATH_MODE: 'Wrap the expression in $...$ or escape the character, e.g. \\_',
  RUNAWAY_ARGUMENT: 'Add the missing } to close the argument',
  UNDERFULL_HBOX: 'Consider adjusting text or using \\hfill',
  OVERFULL_HBOX: 'Consider rewording or allowing hyphenation',
  MISSING_PACKAGE: 'Install with: tlmgr install <package-name>',
  INVALID_OPTION: 'Check the package documentation for supported options',
  EXTRA_ALIGNMENT_TAB: 'Match the number of & in each row to the column specification',
  UNDEFINED_REFERENCE: 'Run compilation again to update references, or check the label exists',
  UNDEFINED_CITATION: 'Check that this key exists in your .bib file',
};

/**
 * Get a suggestion for a diagnostic based on its code
 */
export function getSuggestion(diagnostic: Diagnostic): string | null {
  return SUGGESTIONS[diagnostic.code] ?? null;
}

/**
 * Enhance diagnostics with suggestions
 */
export function enhanceDiagnostics(diagnostics: Diagnostic[]): Diagnostic[] {
  return diagnostics.map((d) => {
    const suggestion = getSuggestion(d);
    if (suggestion) {
      return {
        ...d,
        message: `${d.message}\n${suggestion}`,
      };
    }
    return d;
  });
}

/**
 * Group diagnostics by file
 */
export function groupByFile(diagnostics: Diagnostic[]): Map<string, Diagnostic[]> {
  const grouped = new Map<string, Diagnostic[]>();

  for (const d of diagnostics) {
    const file = d.file ?? UNKNOWN_FILE;
    const existing = grouped.get(file);
    if (existing) {
      existing.push(d);
    } else {
      grouped.set(file, [d]);
    }
  }

  return grouped;
}

/**
 * Rank of a diagnostic's position within its file: unlocated first, then by
 * line, then problems reported at the end of input
 */
function locationRank(d: Diagnostic): number {
  if (d.atEndOfInput) return Infinity;
  return d.line ?? -Infinity;
}

/**
 * Sort diagnostics by file, then location, then severity (errors first)
 */
export function sortDiagnostics(diagnostics: Diagnostic[]): Diagnostic[] {
  const severityOrder = { error: 0, warning: 1 };

  return [...diagnostics].sort((a, b) => {
    if (a.file !== b.file) {
      return (a.file ?? '').localeCompare(b.file ?? '');
    }

    const rankA = locationRank(a);
    const rankB = locationRank(b);
    if (rankA !== rankB) {
      return rankA < rankB ? -1 : 1;
    }

    return severityOrder[a.severity] - severityOrder[b.severity];
  });
}

/**
 * Drop diagnostics that repeat an earlier one
 */
export function dedupeDiagnostics(diagnostics: Diagnostic[]): Diagnostic[] {
  const seen = new Set<string>();
  const result: Diagnostic[] = [];

  for (const d of diagnostics) {
    const key = `${d.code}:${d.file ?? ''}:${d.line ?? ''}:${d.message}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(d);
  }

  return result;
}

/**
 * Get summary counts of diagnostics
 */
export function getDiagnosticCounts(diagnostics: Diagnostic[]): {
  errors: number;
  warnings: number;
} {
  return {
    errors: diagnostics.filter((d) => d.severity === 'error').length,
    warnings: diagnostics.filter((d) => d.severity === 'warning').length,
  };
}
