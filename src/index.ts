export { TeXLogParser, TeXLogParserOptions } from './parser/TeXLogParser';
export { scanLog, toLogLines } from './parser/RuleEngine';
export { FileContextTracker, FileContextTrackerOptions } from './parser/FileContextTracker';
export { createRules, isRuleCode, classifyBadness, RuleOptions } from './parser/rules';
export {
  dedupeDiagnostics,
  enhanceDiagnostics,
  getDiagnosticCounts,
  getSuggestion,
  groupByFile,
  sortDiagnostics,
} from './parser/diagnostics';
export { CheckerConfigFile, CheckerConfigLoader } from './config/CheckerConfig';
export { formatDiagnostic, formatJson, formatLocation, formatReport, LogReport } from './output/format';
export * from './types';
