/**
 * Regex patterns for parsing TeX logs
 */

/** Main error line starting with "!" */
export const ERROR = /^!\s*(.+)$/;

/** Line number indicator "l.XXX" */
export const LINE_NUMBER = /^l\.(\d+)(?:\s(.*))?$/;

/** Control word or control symbol */
export const CONTROL_SEQUENCE = /\\(?:[A-Za-z@]+|[^A-Za-z@\s])/g;

/** Undefined control sequence */
export const UNDEFINED_CONTROL = /^!\s*Undefined\s+control\s+sequence\./;

/** Missing opening brace */
export const TOO_MANY_BRACES = /^!\s*Too\s+many\s+\}'s\./;

/** Math-only input outside math mode */
export const MISSING_DOLLAR = /^!\s*Missing\s+\$\s+inserted\./;
export const INSERTED_TEXT = /^<inserted text>\s*$/;
export const INSERTED_DOLLAR = /^.*\$\s*$/;

/** Missing closing brace */
export const RUNAWAY_ARGUMENT = /^Runaway\s+argument\?/;
export const PARAGRAPH_ENDED = /^!\s*Paragraph\s+ended\s+before\s+(\S+)\s+was\s+complete\./;
export const FILE_ENDED = /^!\s*File\s+ended\s+while\s+scanning\s+use\s+of\s+(\S+)\./;

/** Overfull/Underfull hbox warnings */
export const UNDERFULL_HBOX =
  /^Underfull\s+\\hbox\s+\(badness\s+(\d+)\)\s+(?:(?:in\s+paragraph|in\s+alignment)\s+at\s+lines\s+(\d+)--(\d+)|detected\s+at\s+line\s+(\d+))/;
export const OVERFULL_HBOX =
  /^Overfull\s+\\hbox\s+\(([\d.]+pt)\s+too\s+wide\)\s+(?:(?:in\s+paragraph|in\s+alignment)\s+at\s+lines\s+(\d+)--(\d+)|detected\s+at\s+line\s+(\d+))/;
export const BOX_HEADER = /^(?:Over|Under)full\s+\\[hv]box/;
export const BOX_TERMINATOR = /^\s*\[\]\s*$/;

/** Missing package */
export const MISSING_PACKAGE = /^!\s*LaTeX\s+Error:\s*File\s+`([^`']+)\.sty'\s+not\s+found\./;

/** Unknown option passed to a package or class */
export const INVALID_OPTION = /^!\s*LaTeX\s+Error:\s*Unknown\s+option\s+`([^']+)'\s+for\s+(package|class)\s+`([^']+)'\./;

/** Too many or misplaced &'s */
export const EXTRA_ALIGNMENT_TAB = /^!\s*Extra\s+alignment\s+tab\s+has\s+been\s+changed\s+to\s+\\cr\./;
export const MISPLACED_ALIGNMENT_TAB = /^!\s*Misplaced\s+alignment\s+tab\s+character\s+&\./;

/** Undefined reference */
export const UNDEFINED_REF = /^LaTeX\s+Warning:\s*Reference\s+`([^']+)'\s+on\s+page\s+\d+\s+undefined/;

/** Undefined citation */
export const UNDEFINED_CITATION = /^LaTeX\s+Warning:\s*Citation\s+`([^']+)'\s+on\s+page\s+\d+\s+undefined/;

/** LaTeX, package or class warning */
export const WARNING = /^(?:LaTeX|(Package|Class)\s+(\S+))\s+Warning:\s*(.+)$/;

/** Emergency stop indicator */
export const EMERGENCY_STOP = /^!\s*(?:Emergency\s+stop|==>\s*Fatal\s+error)/;

/** Input line number in warnings */
export const INPUT_LINE = /on\s+input\s+line\s+(\d+)/;

/** Start of a path-like token: absolute, relative or drive-letter */
export const PATH_PREFIX = /^(?:\/|\.{1,2}\/|~\/|[A-Za-z]:[\\/])/;

/** Token ending in a file extension */
export const FILE_EXTENSION = /\.[A-Za-z][A-Za-z0-9]*$/;
