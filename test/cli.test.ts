import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseArgs, resolveSettings, run } from '../src/cli';
import { CONFIG_FILE, VERSION } from '../src/constants';
import { RULE_CODES } from '../src/types';

const fixturesDir = path.join(__dirname, 'parser', 'fixtures');

describe('parseArgs', () => {
  test('collects log files and flags', () => {
    const args = parseArgs(['a.log', '--no-badboxes', '--format', 'json', 'b.log']);

    expect(args.files).toEqual(['a.log', 'b.log']);
    expect(args.noBadboxes).toBe(true);
    expect(args.format).toBe('json');
  });

  test('parses rule lists', () => {
    const args = parseArgs([
      '--rules',
      'GENERIC_ERROR, UNDEFINED_CITATION',
      '--disable',
      'LATEX_WARNING',
      '--disable',
      'OVERFULL_HBOX',
    ]);

    expect(args.rules).toEqual(['GENERIC_ERROR', 'UNDEFINED_CITATION']);
    expect(args.disable).toEqual(['LATEX_WARNING', 'OVERFULL_HBOX']);
  });

  test('parses the wrap column', () => {
    expect(parseArgs(['--max-line-length', '100']).maxLineLength).toBe(100);
  });

  test('rejects unknown rules', () => {
    expect(() => parseArgs(['--disable', 'NO_SUCH_RULE'])).toThrow(
      `Unknown rule 'NO_SUCH_RULE'. Available rules: ${RULE_CODES.join(', ')}`
    );
  });

  test('rejects files that are not logs', () => {
    expect(() => parseArgs(['main.tex'])).toThrow('Not a log file: main.tex');
  });

  test('rejects bad flag values', () => {
    expect(() => parseArgs(['--format', 'xml'])).toThrow("--format must be 'pretty' or 'json'");
    expect(() => parseArgs(['--max-line-length', '0'])).toThrow(
      '--max-line-length requires a positive integer'
    );
    expect(() => parseArgs(['--config'])).toThrow('--config requires a file path');
  });

  test('rejects unknown options', () => {
    expect(() => parseArgs(['--colour'])).toThrow('Unknown argument: --colour');
  });
});

describe('resolveSettings', () => {
  test('applies command-line overrides to the defaults', async () => {
    const args = parseArgs(['--project-root', 'thesis', '--disable', 'LATEX_WARNING']);

    const settings = await resolveSettings(args, fixturesDir);

    expect(settings.projectRoot).toBe(path.resolve(fixturesDir, 'thesis'));
    expect(settings.disabledRules).toEqual(['LATEX_WARNING']);
    expect(settings.format).toBe('pretty');
  });

  test('fails on a missing explicit config file', async () => {
    await expect(resolveSettings(parseArgs(['--config', 'nope.json']), fixturesDir)).rejects.toThrow(
      'Config file not found: nope.json'
    );
  });
});

describe('run', () => {
  let output: string[];
  let tmpDir: string;

  beforeEach(() => {
    output = [];
    jest.spyOn(console, 'log').mockImplementation((message: unknown) => {
      output.push(String(message));
    });
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'texlog-lint-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test('prints the version', async () => {
    expect(await run(['--version'], fixturesDir)).toBe(0);
    expect(output).toEqual([VERSION]);
  });

  test('lists rules in matching order', async () => {
    expect(await run(['--list-rules'], fixturesDir)).toBe(0);

    expect(output).toHaveLength(RULE_CODES.length);
    expect(output[0]).toBe('UNDEFINED_CONTROL_SEQUENCE (error) - A control sequence that is not defined');
  });

  test('reports errors and exits with 1', async () => {
    expect(await run(['simple-error.log'], fixturesDir)).toBe(1);

    expect(output).toEqual([
      'File: main.tex\n\nError line 15: Unknown command \\foo.\n\nSummary: 1 error, 0 warnings',
    ]);
  });

  test('exits with 0 when only warnings remain', async () => {
    expect(await run(['badboxes.log'], fixturesDir)).toBe(0);
    expect(output[0]).toMatch(/Summary: 0 errors, 2 warnings$/);
  });

  test('drops box warnings with --no-badboxes', async () => {
    expect(await run(['badboxes.log', '--no-badboxes'], fixturesDir)).toBe(0);
    expect(output).toEqual(['No problems found.']);
  });

  test('labels each report when several logs are checked', async () => {
    await run(['clean.log', 'badboxes.log', '--rules', 'GENERIC_ERROR'], fixturesDir);

    expect(output).toEqual([
      'Log: clean.log',
      '',
      'No problems found.',
      '',
      'Log: badboxes.log',
      '',
      'No problems found.',
    ]);
  });

  test('prints one JSON document for several logs', async () => {
    const code = await run(['simple-error.log', 'clean.log', '--format', 'json'], fixturesDir);

    expect(code).toBe(1);
    expect(output).toHaveLength(1);
    expect(JSON.parse(output[0])).toEqual([
      {
        log: 'simple-error.log',
        diagnostics: [
          {
            code: 'UNDEFINED_CONTROL_SEQUENCE',
            severity: 'error',
            file: 'main.tex',
            line: 15,
            message: 'Unknown command \\foo.',
            rawText: '! Undefined control sequence.\nl.15 \\foo',
            logLine: 10,
          },
        ],
        summary: { errors: 1, warnings: 0 },
      },
      { log: 'clean.log', diagnostics: [], summary: { errors: 0, warnings: 0 } },
    ]);
  });

  test('adds hints to JSON messages with --suggestions', async () => {
    await run(['simple-error.log', '--format', 'json', '--suggestions'], fixturesDir);

    expect(output[0]).toContain(
      '"message": "Unknown command \\\\foo.\\nCheck for typos in command name or missing \\\\usepackage"'
    );
  });

  test('reads the config file from the working directory', async () => {
    fs.copyFileSync(path.join(fixturesDir, 'simple-error.log'), path.join(tmpDir, 'build.log'));
    fs.writeFileSync(
      path.join(tmpDir, CONFIG_FILE),
      JSON.stringify({ disabledRules: ['UNDEFINED_CONTROL_SEQUENCE'] })
    );

    expect(await run(['build.log'], tmpDir)).toBe(1);
    expect(output).toEqual([
      'File: main.tex\n\nError line 15: Undefined control sequence.\n\nSummary: 1 error, 0 warnings',
    ]);
  });

  test('writes the effective settings with --init', async () => {
    expect(await run(['--init', '--no-badboxes', '--format', 'json'], tmpDir)).toBe(0);

    const configPath = path.join(tmpDir, CONFIG_FILE);
    expect(fs.readFileSync(configPath, 'utf-8')).toBe(
      '{\n  "showBadboxWarnings": false,\n  "format": "json"\n}\n'
    );
    expect(output).toEqual([`Wrote ${configPath}`]);
  });

  test('fails without log files', async () => {
    await expect(run([], tmpDir)).rejects.toThrow('No log files were passed');
  });

  test('fails on an unreadable log', async () => {
    await expect(run(['missing.log'], tmpDir)).rejects.toThrow(/^Cannot read missing\.log: /);
  });
});
