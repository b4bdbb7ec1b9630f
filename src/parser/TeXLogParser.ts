import { RAW_LOG_EXCERPT_LENGTH } from '../constants';
import { DEFAULT_SETTINGS, Diagnostic, Rule, RuleCode } from '../types';
import { createRules } from './rules';
import { scanLog, toLogLines } from './RuleEngine';

export interface TeXLogParserOptions {
  /** Active rules in registration order (default: all) */
  rules?: readonly RuleCode[];
  /** Absolute path to project root for path resolution */
  projectRoot?: string;
  /** Column at which the compiler wraps log lines */
  maxLineLength?: number;
}

/**
 * Parser for TeX/LaTeX log files
 * Extracts structured diagnostics from compiler output
 */
export class TeXLogParser {
  private rules: Rule[];
  private projectRoot: string;
  private maxLineLength: number;

  constructor(options: TeXLogParserOptions = {}) {
    this.maxLineLength = options.maxLineLength ?? DEFAULT_SETTINGS.maxLineLength;
    this.projectRoot = options.projectRoot ?? '';
    this.rules = createRules(options.rules ?? DEFAULT_SETTINGS.rules, {
      maxLineLength: this.maxLineLength,
    });
  }

  /**
   * Codes of the active rules, in order
   */
  get activeRules(): RuleCode[] {
    return this.rules.map((rule) => rule.code);
  }

  /**
   * Parse a TeX log file and extract diagnostics
   * @param logContent Raw log file content
   * @returns Diagnostics in log order
   */
  parse(logContent: string): Diagnostic[] {
    try {
      return [...this.scan(logContent)];
    } catch (error) {
      // Fallback: return single diagnostic with raw log
      console.error('TeX log parsing failed:', error);
      return [{
        code: 'PARSE_FAILED',
        severity: 'error',
        file: null,
        line: null,
        message: 'Log parsing failed - showing raw output',
        rawText: logContent.slice(0, RAW_LOG_EXCERPT_LENGTH),
        logLine: 1,
      }];
    }
  }

  /**
   * Lazily scan log content
   */
  scan(logContent: string): Generator<Diagnostic, void, undefined> {
    return scanLog(toLogLines(logContent), this.rules, {
      maxLineLength: this.maxLineLength,
      projectRoot: this.projectRoot,
    });
  }
}
