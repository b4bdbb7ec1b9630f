import { Diagnostic, LogLine, Rule } from '../types';
import { FileContextTracker, FileContextTrackerOptions } from './FileContextTracker';

/**
 * Split raw log content into numbered lines
 */
export function toLogLines(content: string): LogLine[] {
  if (!content) return [];
  return content.split(/\r\n|\n|\r/).map((text, index) => ({ number: index + 1, text }));
}

/**
 * Scan log lines with an ordered set of rules.
 *
 * At each position the first rule that matches wins and its whole span is
 * skipped; lines no rule claims go to the file-context tracker. Each call
 * owns its own tracker, so scans never share state.
 */
export function* scanLog(
  lines: readonly LogLine[],
  activeRules: readonly Rule[],
  options: FileContextTrackerOptions = {}
): Generator<Diagnostic, void, undefined> {
  const tracker = new FileContextTracker(options);
  let cursor = 0;

  while (cursor < lines.length) {
    let matched = false;

    for (const rule of activeRules) {
      const span = rule.tryMatch(lines, cursor);
      if (!span || span.end <= cursor) {
        continue;
      }

      tracker.flush();
      yield rule.render(span, { lines, file: tracker.currentFile() });
      cursor = span.end;
      matched = true;
      break;
    }

    if (!matched) {
      tracker.observe(lines[cursor]);
      cursor++;
    }
  }
}
