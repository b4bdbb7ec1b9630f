import * as fs from 'fs';
import * as path from 'path';
import { FileContextTracker } from '../../src/parser/FileContextTracker';
import { toLogLines } from '../../src/parser/RuleEngine';

function observeAll(tracker: FileContextTracker, lines: string[]): void {
  lines.forEach((text, index) => tracker.observe({ number: index + 1, text }));
}

describe('FileContextTracker', () => {
  test('starts with no open file', () => {
    const tracker = new FileContextTracker();

    expect(tracker.currentFile()).toBeNull();
    expect(tracker.depth()).toBe(0);
  });

  test('pushes and pops files on one line', () => {
    const tracker = new FileContextTracker();

    observeAll(tracker, ['(a.tex (b.tex text']);
    expect(tracker.currentFile()).toBe('b.tex');

    observeAll(tracker, [')  more text']);
    expect(tracker.currentFile()).toBe('a.tex');

    observeAll(tracker, [')']);
    expect(tracker.currentFile()).toBeNull();
  });

  test('keeps parenthesised chatter from closing a file', () => {
    const tracker = new FileContextTracker();

    observeAll(tracker, [
      '(./main.tex',
      'Underfull \\hbox (badness 10000) in paragraph at lines 5--7',
      'Overfull \\hbox (35.0259pt too wide) in paragraph at lines 8--9',
      'File: size10.clo 2022/07/02 v1.4n Standard LaTeX file (size option)',
    ]);

    expect(tracker.currentFile()).toBe('main.tex');
    expect(tracker.depth()).toBe(1);
  });

  test('reports the innermost named file inside anonymous groups', () => {
    const tracker = new FileContextTracker();

    observeAll(tracker, ['(./main.tex (see below']);

    expect(tracker.depth()).toBe(2);
    expect(tracker.currentFile()).toBe('main.tex');
  });

  test('ignores closing parentheses on an empty stack', () => {
    const tracker = new FileContextTracker();

    expect(() => observeAll(tracker, [')))', '(a.tex', '))))'])).not.toThrow();
    expect(tracker.depth()).toBe(0);

    observeAll(tracker, ['(b.tex']);
    expect(tracker.currentFile()).toBe('b.tex');
  });

  test('handles closing parentheses split across lines', () => {
    const tracker = new FileContextTracker();

    observeAll(tracker, ['(a.tex (b.tex (c.tex', ')', ')']);

    expect(tracker.currentFile()).toBe('a.tex');
  });

  test('continues a file name the compiler wrapped onto the next line', () => {
    const tracker = new FileContextTracker({ maxLineLength: 20 });

    observeAll(tracker, ['(./chapters/appendix']);
    expect(tracker.currentFile()).toBeNull();

    observeAll(tracker, ['.tex']);
    expect(tracker.currentFile()).toBe('chapters/appendix.tex');
  });

  test('opens a held-back file name on flush', () => {
    const tracker = new FileContextTracker({ maxLineLength: 20 });

    observeAll(tracker, ['(./chapters/appendix']);
    tracker.flush();
    tracker.flush();

    expect(tracker.currentFile()).toBe('chapters/appendix');
    expect(tracker.depth()).toBe(1);
  });

  test('does not join tokens on lines shorter than the wrap column', () => {
    const tracker = new FileContextTracker({ maxLineLength: 20 });

    observeAll(tracker, ['(./short.tex', 'tail']);

    expect(tracker.currentFile()).toBe('short.tex');
  });

  test('recognises absolute paths and paths without extensions', () => {
    const tracker = new FileContextTracker();

    observeAll(tracker, ['(/usr/share/texmf/tex/latex/base/article.cls (./figures/plot']);

    expect(tracker.currentFile()).toBe('figures/plot');
  });

  test('resolves relative names against the project root', () => {
    const tracker = new FileContextTracker({ projectRoot: '/test/project' });

    observeAll(tracker, ['(./main.tex (/abs/other.tex']);
    expect(tracker.currentFile()).toBe('/abs/other.tex');

    observeAll(tracker, [')']);
    expect(tracker.currentFile()).toBe(path.resolve('/test/project', 'main.tex'));
  });

  test('closes every group of a complete build log', () => {
    const tracker = new FileContextTracker();
    const log = fs.readFileSync(path.join(__dirname, 'fixtures', 'clean.log'), 'utf-8');
    const lines = toLogLines(log);

    lines.slice(0, 7).forEach((line) => tracker.observe(line));
    expect(tracker.currentFile()).toBe('/usr/share/texlive/texmf-dist/tex/latex/base/article.cls');

    lines.slice(7).forEach((line) => tracker.observe(line));
    expect(tracker.depth()).toBe(0);
    expect(tracker.currentFile()).toBeNull();
  });
});
