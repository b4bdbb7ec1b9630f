import * as path from 'path';
import { DEFAULT_SETTINGS, LogLine } from '../types';
import * as patterns from './patterns';

export interface FileContextTrackerOptions {
  /** Column at which the compiler wraps log lines */
  maxLineLength?: number;
  /** Resolve relative file names against this directory */
  projectRoot?: string;
}

/**
 * Tracks which source file the compiler is reading.
 *
 * TeX writes `(file` when it opens a file and `)` when it closes it, but
 * parentheses also appear in ordinary chatter such as `(badness 10000)`.
 * Every `(` therefore pushes an entry, named when the following token looks
 * like a file and anonymous otherwise, and every `)` pops one.
 */
export class FileContextTracker {
  private stack: Array<string | null> = [];
  private pendingToken: string | null = null;
  private maxLineLength: number;
  private projectRoot: string;

  constructor(options: FileContextTrackerOptions = {}) {
    this.maxLineLength = options.maxLineLength ?? DEFAULT_SETTINGS.maxLineLength;
    this.projectRoot = options.projectRoot ?? '';
  }

  /**
   * Feed one log line into the tracker
   */
  observe(line: LogLine): void {
    const text = line.text;
    let i = 0;

    // A file name cut by the compiler's line wrapping continues here
    if (this.pendingToken !== null) {
      const end = this.tokenEnd(text, 0);
      const token = this.pendingToken + text.slice(0, end);
      this.pendingToken = null;
      if (this.isWrapped(text, end)) {
        this.pendingToken = token;
        return;
      }
      this.openGroup(token);
      i = end;
    }

    while (i < text.length) {
      const ch = text[i];
      if (ch === '(') {
        const end = this.tokenEnd(text, i + 1);
        const token = text.slice(i + 1, end);
        if (this.isWrapped(text, end)) {
          this.pendingToken = token;
          return;
        }
        this.openGroup(token);
        i = end;
      } else {
        if (ch === ')') {
          // Excess closes leave the stack empty
          this.stack.pop();
        }
        i++;
      }
    }
  }

  /**
   * Open a file name held back for a wrapped continuation. Called when the
   * next line belongs to an error or warning rather than to the name.
   */
  flush(): void {
    if (this.pendingToken !== null) {
      this.openGroup(this.pendingToken);
      this.pendingToken = null;
    }
  }

  /**
   * Innermost open file, or null when no file is open
   */
  currentFile(): string | null {
    for (let j = this.stack.length - 1; j >= 0; j--) {
      const entry = this.stack[j];
      if (entry !== null) {
        return entry;
      }
    }
    return null;
  }

  /**
   * Number of open parenthesis groups, named or not
   */
  depth(): number {
    return this.stack.length;
  }

  private tokenEnd(text: string, from: number): number {
    let end = from;
    while (end < text.length && !/[\s()]/.test(text[end])) {
      end++;
    }
    return end;
  }

  private isWrapped(text: string, tokenEnd: number): boolean {
    return tokenEnd === text.length && text.length === this.maxLineLength;
  }

  private openGroup(token: string): void {
    this.stack.push(this.isFileName(token) ? this.normalize(token) : null);
  }

  private isFileName(token: string): boolean {
    if (!token) return false;
    return patterns.PATH_PREFIX.test(token) || patterns.FILE_EXTENSION.test(token);
  }

  private normalize(fileName: string): string {
    if (this.projectRoot) {
      return path.isAbsolute(fileName) ? fileName : path.resolve(this.projectRoot, fileName);
    }
    return fileName.replace(/^(?:\.\/)+/, '');
  }
}
