import {
  BADNESS_IGNORABLE,
  BADNESS_NOT_AS_BAD,
  MAX_BOX_DETAIL_LINES,
  MAX_CONTEXT_LINES,
} from '../constants';
import {
  DEFAULT_SETTINGS,
  Diagnostic,
  LogLine,
  MatchSpan,
  Rule,
  RuleCode,
  RuleContext,
} from '../types';
import * as patterns from './patterns';

export interface RuleOptions {
  /** Column at which the compiler wraps log lines */
  maxLineLength?: number;
}

interface LineMarker {
  /** Index one past the marker and its continuation line */
  end: number;
  line: number;
  text: string;
}

interface DiagnosticFields {
  message: string;
  line: number | null;
  endLine?: number;
  atEndOfInput?: boolean;
}

/**
 * TeX prints the unread rest of the source line below the "l.<N>" line,
 * indented past the part already read.
 */
function markerEnd(lines: readonly LogLine[], index: number): number {
  if (index + 1 < lines.length && /^\s/.test(lines[index + 1].text)) {
    return index + 2;
  }
  return index + 1;
}

/**
 * Find the "l.<N>" marker that follows an error line. Gives up at the next
 * error or after MAX_CONTEXT_LINES lines.
 */
function findLineMarker(lines: readonly LogLine[], from: number): LineMarker | null {
  const limit = Math.min(from + MAX_CONTEXT_LINES, lines.length);
  for (let j = from; j < limit; j++) {
    const text = lines[j].text;
    const match = text.match(patterns.LINE_NUMBER);
    if (match) {
      return {
        end: markerEnd(lines, j),
        line: parseInt(match[1], 10),
        text: match[2] ?? '',
      };
    }
    if (patterns.ERROR.test(text)) {
      return null;
    }
  }
  return null;
}

function buildDiagnostic(
  rule: Pick<Rule, 'code' | 'severity'>,
  span: MatchSpan,
  context: RuleContext,
  fields: DiagnosticFields
): Diagnostic {
  const diagnostic: Diagnostic = {
    code: rule.code,
    severity: rule.severity,
    file: context.file,
    line: fields.line,
    message: fields.message,
    rawText: context.lines
      .slice(span.start, span.end)
      .map((l) => l.text)
      .join('\n')
      .trimEnd(),
    logLine: context.lines[span.start].number,
  };
  if (fields.endLine !== undefined) {
    diagnostic.endLine = fields.endLine;
  }
  if (fields.atEndOfInput) {
    diagnostic.atEndOfInput = true;
  }
  return diagnostic;
}

function lineOrNull(value: string | undefined): number | null {
  return value ? parseInt(value, 10) : null;
}

export function classifyBadness(badness: number): string {
  if (badness < BADNESS_IGNORABLE) return 'ignorable';
  if (badness < BADNESS_NOT_AS_BAD) return 'not as bad';
  return 'very bad';
}

/**
 * Match a box warning header and the box excerpt TeX prints below it,
 * which ends with a " []" line.
 */
function matchBox(
  lines: readonly LogLine[],
  start: number,
  header: RegExp
): { match: RegExpMatchArray; end: number; excerpt: string } | null {
  const match = lines[start].text.match(header);
  if (!match) return null;

  let terminator = -1;
  const limit = Math.min(start + 1 + MAX_BOX_DETAIL_LINES, lines.length);
  for (let j = start + 1; j < limit; j++) {
    const text = lines[j].text;
    if (patterns.BOX_TERMINATOR.test(text)) {
      terminator = j;
      break;
    }
    // An empty box prints one blank line before its terminator
    const blankBody = text.trim() === '' && j > start + 1;
    if (blankBody || patterns.ERROR.test(text) || patterns.BOX_HEADER.test(text)) {
      break;
    }
  }

  if (terminator < 0) {
    return { match, end: start + 1, excerpt: '' };
  }

  // The first token is the font switch, e.g. "[]\OT1/cmr/m/n/10"
  const excerpt = lines
    .slice(start + 1, terminator)
    .map((l) => l.text)
    .join('')
    .trim()
    .replace(/^\S+\s*/, '');

  return { match, end: terminator + 1, excerpt };
}

/**
 * Join a warning with the lines the compiler wrapped it onto and with its
 * "(<package>)" continuation lines.
 */
function collectWarning(
  lines: readonly LogLine[],
  start: number,
  maxLineLength: number,
  continuationPrefix: string | null
): { end: number; text: string } {
  let text = lines[start].text;
  let j = start + 1;
  while (j < lines.length) {
    const next = lines[j].text;
    if (lines[j - 1].text.length === maxLineLength) {
      text += next;
    } else if (continuationPrefix && next.startsWith(continuationPrefix)) {
      text += ' ' + next.slice(continuationPrefix.length).trim();
    } else {
      break;
    }
    j++;
  }
  return { end: j, text: text.replace(/\s+/g, ' ').trim() };
}

function undefinedControlSequence(): Rule {
  return {
    code: 'UNDEFINED_CONTROL_SEQUENCE',
    severity: 'error',
    description: 'A control sequence that is not defined',
    tryMatch(lines, start) {
      if (!patterns.UNDEFINED_CONTROL.test(lines[start].text)) return null;
      const marker = findLineMarker(lines, start + 1);
      if (!marker) return null;

      // TeX breaks the context line right after the offending token
      const commands = marker.text.match(patterns.CONTROL_SEQUENCE);
      if (!commands) return null;

      return {
        start,
        end: marker.end,
        captures: { command: commands[commands.length - 1], line: String(marker.line) },
      };
    },
    render(span, context) {
      return buildDiagnostic(this, span, context, {
        message: `Unknown command ${span.captures.command}.`,
        line: lineOrNull(span.captures.line),
      });
    },
  };
}

function tooManyBraces(): Rule {
  return {
    code: 'TOO_MANY_BRACES',
    severity: 'error',
    description: 'A closing curly brace without an opening one',
    tryMatch(lines, start) {
      if (!patterns.TOO_MANY_BRACES.test(lines[start].text)) return null;
      const marker = findLineMarker(lines, start + 1);
      if (!marker || !marker.text.trim()) return null;
      return {
        start,
        end: marker.end,
        captures: { context: marker.text.trim(), line: String(marker.line) },
      };
    },
    render(span, context) {
      return buildDiagnostic(this, span, context, {
        message: `Number of curly braces near ${span.captures.context} does not match.`,
        line: lineOrNull(span.captures.line),
      });
    },
  };
}

/**
 * TeX complains about a missing "$" twice, once where math should have
 * started and once where it ends. Returns the index past the second
 * complaint when it follows at `from`, otherwise `from`.
 */
function closingComplaintEnd(lines: readonly LogLine[], from: number): number {
  let j = from;
  while (j < lines.length && lines[j].text.trim() === '') {
    j++;
  }
  if (j >= lines.length || !patterns.MISSING_DOLLAR.test(lines[j].text)) {
    return from;
  }
  const marker = findLineMarker(lines, j + 1);
  return marker ? marker.end : from;
}

function missingMathMode(): Rule {
  return {
    code: 'MISSING_MATH_MODE',
    severity: 'error',
    description: 'Math-only input used outside math mode',
    tryMatch(lines, start) {
      if (start + 3 >= lines.length) return null;
      if (
        !patterns.MISSING_DOLLAR.test(lines[start].text) ||
        !patterns.INSERTED_TEXT.test(lines[start + 1].text) ||
        !patterns.INSERTED_DOLLAR.test(lines[start + 2].text)
      ) {
        return null;
      }

      // The closing "Missing $" of a pair has no source text on its l. line
      const marker = lines[start + 3].text.match(patterns.LINE_NUMBER);
      const input = marker?.[2]?.trim();
      if (!marker || !input) return null;

      return {
        start,
        end: closingComplaintEnd(lines, markerEnd(lines, start + 3)),
        captures: { input, line: marker[1] },
      };
    },
    render(span, context) {
      return buildDiagnostic(this, span, context, {
        message: `String ${span.captures.input} is valid only in math mode.`,
        line: lineOrNull(span.captures.line),
      });
    },
  };
}

function runawayArgument(): Rule {
  return {
    code: 'RUNAWAY_ARGUMENT',
    severity: 'error',
    description: 'A command argument missing its closing curly brace',
    tryMatch(lines, start): MatchSpan | null {
      if (!patterns.RUNAWAY_ARGUMENT.test(lines[start].text)) return null;

      // One to three lines of the runaway argument precede the error
      for (let j = start + 2; j <= start + 4 && j < lines.length; j++) {
        const text = lines[j].text;

        const paragraphEnded = text.match(patterns.PARAGRAPH_ENDED);
        if (paragraphEnded) {
          const marker = findLineMarker(lines, j + 1);
          if (!marker) return null;
          // The marker points at the blank line that ended the paragraph
          return {
            start,
            end: marker.end,
            captures: { command: paragraphEnded[1], line: String(marker.line - 1) },
          };
        }

        const fileEnded = text.match(patterns.FILE_ENDED);
        if (fileEnded) {
          return { start, end: j + 1, captures: { command: fileEnded[1], atEnd: 'true' } };
        }

        if (patterns.ERROR.test(text)) return null;
      }
      return null;
    },
    render(span, context) {
      return buildDiagnostic(this, span, context, {
        message: `Command ${span.captures.command} was not properly ended with curly brace.`,
        line: lineOrNull(span.captures.line),
        atEndOfInput: span.captures.atEnd === 'true',
      });
    },
  };
}

function underfullHBox(): Rule {
  return {
    code: 'UNDERFULL_HBOX',
    severity: 'warning',
    description: 'A line that cannot be stretched enough',
    tryMatch(lines, start) {
      const box = matchBox(lines, start, patterns.UNDERFULL_HBOX);
      if (!box) return null;
      const { match } = box;
      return {
        start,
        end: box.end,
        captures: {
          badness: match[1],
          startLine: match[2] ?? match[4] ?? '',
          endLine: match[3] ?? '',
          excerpt: box.excerpt,
        },
      };
    },
    render(span, context) {
      const { badness, excerpt, startLine, endLine } = span.captures;
      const problem = `badness ${badness}, ${classifyBadness(parseInt(badness, 10))}`;
      return buildDiagnostic(this, span, context, {
        message: excerpt
          ? `Due to ${excerpt} the line cannot be stretched enough (${problem}).`
          : `Line cannot be stretched enough (${problem}).`,
        line: lineOrNull(startLine),
        endLine: lineOrNull(endLine) ?? undefined,
      });
    },
  };
}

function overfullHBox(): Rule {
  return {
    code: 'OVERFULL_HBOX',
    severity: 'warning',
    description: 'A line that overflows the maximum width',
    tryMatch(lines, start) {
      const box = matchBox(lines, start, patterns.OVERFULL_HBOX);
      if (!box) return null;
      const { match } = box;
      return {
        start,
        end: box.end,
        captures: {
          amount: match[1],
          startLine: match[2] ?? match[4] ?? '',
          endLine: match[3] ?? '',
          excerpt: box.excerpt,
        },
      };
    },
    render(span, context) {
      const { amount, excerpt, startLine, endLine } = span.captures;
      return buildDiagnostic(this, span, context, {
        message: excerpt
          ? `Text after ${excerpt} (displayed hyphenated) overflows the line end by ${amount}.`
          : `Line overflows the line end by ${amount}.`,
        line: lineOrNull(startLine),
        endLine: lineOrNull(endLine) ?? undefined,
      });
    },
  };
}

function missingPackage(): Rule {
  return {
    code: 'MISSING_PACKAGE',
    severity: 'error',
    description: 'A package that is not installed',
    tryMatch(lines, start) {
      const match = lines[start].text.match(patterns.MISSING_PACKAGE);
      if (!match) return null;
      return { start, end: start + 1, captures: { package: match[1] } };
    },
    render(span, context) {
      return buildDiagnostic(this, span, context, {
        message: `Missing package ${span.captures.package}.`,
        line: null,
      });
    },
  };
}

function invalidOption(): Rule {
  return {
    code: 'INVALID_OPTION',
    severity: 'error',
    description: 'An option the package or class does not know',
    tryMatch(lines, start) {
      const match = lines[start].text.match(patterns.INVALID_OPTION);
      if (!match) return null;
      return {
        start,
        end: start + 1,
        captures: { option: match[1], kind: match[2], name: match[3] },
      };
    },
    render(span, context) {
      const { option, kind, name } = span.captures;
      return buildDiagnostic(this, span, context, {
        message: `Invalid option ${option} of ${kind} ${name}.`,
        line: null,
      });
    },
  };
}

function extraAlignmentTab(): Rule {
  return {
    code: 'EXTRA_ALIGNMENT_TAB',
    severity: 'error',
    description: "A row with more &'s than the aligned environment has columns",
    tryMatch(lines, start) {
      const text = lines[start].text;
      let kind: string;
      if (patterns.EXTRA_ALIGNMENT_TAB.test(text)) {
        kind = 'extra';
      } else if (patterns.MISPLACED_ALIGNMENT_TAB.test(text)) {
        kind = 'misplaced';
      } else {
        return null;
      }

      const marker = findLineMarker(lines, start + 1);
      if (!marker || !marker.text.trim()) return null;
      return {
        start,
        end: marker.end,
        captures: { kind, context: marker.text.trim(), line: String(marker.line) },
      };
    },
    render(span, context) {
      const { kind, context: near } = span.captures;
      return buildDiagnostic(this, span, context, {
        message:
          kind === 'extra'
            ? `There are more &'s than columns in an aligned environment (table, etc.) near ${near}.`
            : `Alignment tab & used outside an aligned environment near ${near}.`,
        line: lineOrNull(span.captures.line),
      });
    },
  };
}

function undefinedReference(options: Required<RuleOptions>): Rule {
  return {
    code: 'UNDEFINED_REFERENCE',
    severity: 'warning',
    description: 'A reference to a label that does not exist',
    tryMatch(lines, start) {
      if (!lines[start].text.startsWith('LaTeX Warning: Reference')) return null;
      const warning = collectWarning(lines, start, options.maxLineLength, null);
      const match = warning.text.match(patterns.UNDEFINED_REF);
      if (!match) return null;
      const inputLine = warning.text.match(patterns.INPUT_LINE);
      return {
        start,
        end: warning.end,
        captures: { label: match[1], line: inputLine?.[1] ?? '' },
      };
    },
    render(span, context) {
      return buildDiagnostic(this, span, context, {
        message: `Undefined reference '${span.captures.label}'.`,
        line: lineOrNull(span.captures.line),
      });
    },
  };
}

function undefinedCitation(options: Required<RuleOptions>): Rule {
  return {
    code: 'UNDEFINED_CITATION',
    severity: 'warning',
    description: 'A citation key missing from the bibliography',
    tryMatch(lines, start) {
      if (!lines[start].text.startsWith('LaTeX Warning: Citation')) return null;
      const warning = collectWarning(lines, start, options.maxLineLength, null);
      const match = warning.text.match(patterns.UNDEFINED_CITATION);
      if (!match) return null;
      const inputLine = warning.text.match(patterns.INPUT_LINE);
      return {
        start,
        end: warning.end,
        captures: { key: match[1], line: inputLine?.[1] ?? '' },
      };
    },
    render(span, context) {
      return buildDiagnostic(this, span, context, {
        message: `Undefined citation '${span.captures.key}'.`,
        line: lineOrNull(span.captures.line),
      });
    },
  };
}

function latexWarning(options: Required<RuleOptions>): Rule {
  return {
    code: 'LATEX_WARNING',
    severity: 'warning',
    description: 'Any other LaTeX, package or class warning',
    tryMatch(lines, start) {
      const first = lines[start].text.match(patterns.WARNING);
      if (!first) return null;
      const name = first[2];
      const warning = collectWarning(
        lines,
        start,
        options.maxLineLength,
        name ? `(${name})` : null
      );
      const match = warning.text.match(patterns.WARNING);
      if (!match) return null;
      const inputLine = warning.text.match(patterns.INPUT_LINE);
      return {
        start,
        end: warning.end,
        captures: {
          kind: match[1] ?? '',
          name: match[2] ?? '',
          message: match[3],
          line: inputLine?.[1] ?? '',
        },
      };
    },
    render(span, context) {
      const { kind, name, message } = span.captures;
      return buildDiagnostic(this, span, context, {
        message: kind ? `${kind} ${name}: ${message}` : message,
        line: lineOrNull(span.captures.line),
      });
    },
  };
}

function genericError(): Rule {
  return {
    code: 'GENERIC_ERROR',
    severity: 'error',
    description: 'Any other error the compiler reports with "!"',
    tryMatch(lines, start) {
      const text = lines[start].text;
      const match = text.match(patterns.ERROR);
      if (!match || patterns.EMERGENCY_STOP.test(text)) return null;
      const marker = findLineMarker(lines, start + 1);
      return {
        start,
        end: marker ? marker.end : start + 1,
        captures: { message: match[1].trim(), line: marker ? String(marker.line) : '' },
      };
    },
    render(span, context) {
      return buildDiagnostic(this, span, context, {
        message: span.captures.message,
        line: lineOrNull(span.captures.line),
      });
    },
  };
}

const RULE_FACTORIES: Record<RuleCode, (options: Required<RuleOptions>) => Rule> = {
  UNDEFINED_CONTROL_SEQUENCE: undefinedControlSequence,
  TOO_MANY_BRACES: tooManyBraces,
  MISSING_MATH_MODE: missingMathMode,
  RUNAWAY_ARGUMENT: runawayArgument,
  UNDERFULL_HBOX: underfullHBox,
  OVERFULL_HBOX: overfullHBox,
  MISSING_PACKAGE: missingPackage,
  INVALID_OPTION: invalidOption,
  EXTRA_ALIGNMENT_TAB: extraAlignmentTab,
  UNDEFINED_REFERENCE: undefinedReference,
  UNDEFINED_CITATION: undefinedCitation,
  LATEX_WARNING: latexWarning,
  GENERIC_ERROR: genericError,
};

/**
 * Instantiate rules in the given order. Duplicates keep their first position.
 */
export function createRules(codes: readonly RuleCode[], options: RuleOptions = {}): Rule[] {
  const resolved: Required<RuleOptions> = {
    maxLineLength: options.maxLineLength ?? DEFAULT_SETTINGS.maxLineLength,
  };
  return [...new Set(codes)].map((code) => RULE_FACTORIES[code](resolved));
}

export function isRuleCode(value: unknown): value is RuleCode {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(RULE_FACTORIES, value);
}
