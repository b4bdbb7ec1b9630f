import { formatReport, getDiagnosticCounts, TeXLogParser } from '../src';

describe('public API', () => {
  test('parses and formats a log through the package entry point', () => {
    const log = [
      '(./paper.tex',
      "LaTeX Warning: Citation `knuth84' on page 2 undefined on input line 31.",
      '',
      '! Undefined control sequence.',
      'l.44 \\emphh',
      '            {text}',
      ')',
    ].join('\n');

    const diagnostics = new TeXLogParser().parse(log);

    expect(getDiagnosticCounts(diagnostics)).toEqual({ errors: 1, warnings: 1 });
    expect(formatReport(diagnostics)).toBe(
      [
        'File: paper.tex',
        '',
        "Warning line 31: Undefined citation 'knuth84'.",
        'Error line 44: Unknown command \\emphh.',
        '',
        'Summary: 1 error, 1 warning',
      ].join('\n')
    );
  });
});
