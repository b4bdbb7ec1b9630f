/**
 * Config file looked up in the working directory
 */
export const CONFIG_FILE = '.texlogrc.json';

export const TOOL_NAME = 'texlog-lint';
export const VERSION = '0.1.0';

/**
 * How far past an error line the parser looks for its "l.<N>" marker
 */
export const MAX_CONTEXT_LINES = 10;

/**
 * How far past a box warning the parser looks for the " []" terminator
 */
export const MAX_BOX_DETAIL_LINES = 8;

/**
 * Badness thresholds for underfull boxes
 */
export const BADNESS_IGNORABLE = 2000;
export const BADNESS_NOT_AS_BAD = 6000;

/**
 * Rules that report underfull/overfull boxes
 */
export const BADBOX_RULES = ['UNDERFULL_HBOX', 'OVERFULL_HBOX'] as const;

/**
 * Group name for diagnostics without a source file
 */
export const UNKNOWN_FILE = 'unknown';

/**
 * Characters of raw log kept when parsing fails
 */
export const RAW_LOG_EXCERPT_LENGTH = 2000;
