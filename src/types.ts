/**
 * Diagnostic severity levels
 */
export type DiagnosticSeverity = 'error' | 'warning';

/**
 * Identifiers of the detection rules, in their default registration order
 */
export const RULE_CODES = [
  'UNDEFINED_CONTROL_SEQUENCE',
  'TOO_MANY_BRACES',
  'MISSING_MATH_MODE',
  'RUNAWAY_ARGUMENT',
  'UNDERFULL_HBOX',
  'OVERFULL_HBOX',
  'MISSING_PACKAGE',
  'INVALID_OPTION',
  'EXTRA_ALIGNMENT_TAB',
  'UNDEFINED_REFERENCE',
  'UNDEFINED_CITATION',
  'LATEX_WARNING',
  'GENERIC_ERROR',
] as const;

export type RuleCode = (typeof RULE_CODES)[number];

/**
 * One physical line of the log
 */
export interface LogLine {
  /** 1-indexed position in the log */
  readonly number: number;
  readonly text: string;
}

/**
 * Range of log lines consumed by a rule match
 */
export interface MatchSpan {
  /** Index of the first consumed line */
  start: number;
  /** Index one past the last consumed line */
  end: number;
  /** Named substrings captured by the rule */
  captures: Record<string, string>;
}

/**
 * What a rule sees when it renders a match
 */
export interface RuleContext {
  lines: readonly LogLine[];
  /** Innermost open source file when the match started */
  file: string | null;
}

/**
 * A recognizer for one category of compiler complaint
 */
export interface Rule {
  code: RuleCode;
  severity: DiagnosticSeverity;
  description: string;
  /** Returns the consumed span when the log at `start` matches, otherwise null */
  tryMatch(lines: readonly LogLine[], start: number): MatchSpan | null;
  render(span: MatchSpan, context: RuleContext): Diagnostic;
}

/**
 * Structured diagnostic from log parsing
 */
export interface Diagnostic {
  /** Rule that produced the diagnostic, or PARSE_FAILED */
  code: RuleCode | 'PARSE_FAILED';
  severity: DiagnosticSeverity;
  /** Source file the compiler was reading, null if unknown */
  file: string | null;
  /** Source line number (1-indexed), null if unknown */
  line: number | null;
  /** Last source line for diagnostics covering a range */
  endLine?: number;
  /** The compiler reported the problem when input ran out */
  atEndOfInput?: boolean;
  /** Short human-readable message */
  message: string;
  /** Original log excerpt for context */
  rawText: string;
  /** Log line the match started on */
  logLine: number;
}

export type OutputFormat = 'pretty' | 'json';

/**
 * Fully resolved checker settings
 */
export interface CheckerSettings {
  /** Ordered set of active rules */
  rules: RuleCode[];
  /** Rules removed from the active set */
  disabledRules: RuleCode[];
  /** Report underfull/overfull boxes */
  showBadboxWarnings: boolean;
  /** Column at which the compiler wraps its log output */
  maxLineLength: number;
  /** Directory relative file names are resolved against (empty = keep as logged) */
  projectRoot: string;
  format: OutputFormat;
  /** Append remedy hints to the report */
  suggestions: boolean;
}

/**
 * Default checker settings
 */
export const DEFAULT_SETTINGS: CheckerSettings = {
  rules: [...RULE_CODES],
  disabledRules: [],
  showBadboxWarnings: true,
  maxLineLength: 79, // TeX's max_print_line
  projectRoot: '',
  format: 'pretty',
  suggestions: false,
};
