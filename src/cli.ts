#!/usr/bin/env node
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import { CheckerConfigFile, CheckerConfigLoader } from './config/CheckerConfig';
import { CONFIG_FILE, TOOL_NAME, VERSION } from './constants';
import { formatJson, formatReport, LogReport } from './output/format';
import { dedupeDiagnostics, enhanceDiagnostics } from './parser/diagnostics';
import { createRules, isRuleCode } from './parser/rules';
import { TeXLogParser } from './parser/TeXLogParser';
import { CheckerSettings, OutputFormat, RULE_CODES, RuleCode } from './types';

export interface CliArgs {
  files: string[];
  config?: string;
  format?: OutputFormat;
  rules?: RuleCode[];
  disable: RuleCode[];
  noBadboxes: boolean;
  projectRoot?: string;
  maxLineLength?: number;
  suggestions: boolean;
  listRules: boolean;
  init: boolean;
  help: boolean;
  version: boolean;
}

export function parseArgs(raw: string[]): CliArgs {
  const args: CliArgs = {
    files: [],
    disable: [],
    noBadboxes: false,
    suggestions: false,
    listRules: false,
    init: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < raw.length; i += 1) {
    const arg = raw[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
      continue;
    }

    if (arg === '--version' || arg === '-v') {
      args.version = true;
      continue;
    }

    if (arg === '--list-rules') {
      args.listRules = true;
      continue;
    }

    if (arg === '--init') {
      args.init = true;
      continue;
    }

    if (arg === '--no-badboxes') {
      args.noBadboxes = true;
      continue;
    }

    if (arg === '--suggestions') {
      args.suggestions = true;
      continue;
    }

    if (arg === '--config') {
      const value = raw[i + 1];
      if (!value) {
        throw new Error('--config requires a file path');
      }
      args.config = value;
      i += 1;
      continue;
    }

    if (arg === '--format') {
      const value = raw[i + 1];
      if (value !== 'pretty' && value !== 'json') {
        throw new Error("--format must be 'pretty' or 'json'");
      }
      args.format = value;
      i += 1;
      continue;
    }

    if (arg === '--rules') {
      args.rules = parseRuleList(raw[i + 1], arg);
      i += 1;
      continue;
    }

    if (arg === '--disable') {
      args.disable.push(...parseRuleList(raw[i + 1], arg));
      i += 1;
      continue;
    }

    if (arg === '--project-root') {
      const value = raw[i + 1];
      if (!value) {
        throw new Error('--project-root requires a directory');
      }
      args.projectRoot = value;
      i += 1;
      continue;
    }

    if (arg === '--max-line-length') {
      const value = Number(raw[i + 1]);
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error('--max-line-length requires a positive integer');
      }
      args.maxLineLength = value;
      i += 1;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    if (!arg.endsWith('.log')) {
      throw new Error(`Not a log file: ${arg}`);
    }

    args.files.push(arg);
  }

  return args;
}

function parseRuleList(value: string | undefined, flag: string): RuleCode[] {
  if (!value) {
    throw new Error(`${flag} requires a comma-separated list of rule codes`);
  }

  return value
    .split(',')
    .map((code) => code.trim())
    .filter(Boolean)
    .map((code) => {
      if (!isRuleCode(code)) {
        throw new Error(`Unknown rule '${code}'. Available rules: ${RULE_CODES.join(', ')}`);
      }
      return code;
    });
}

/**
 * Combine the config file with command-line overrides
 */
export async function resolveSettings(args: CliArgs, cwd: string): Promise<CheckerSettings> {
  let fileConfig: CheckerConfigFile | null;
  if (args.config) {
    const configPath = path.resolve(cwd, args.config);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${args.config}`);
    }
    fileConfig = await CheckerConfigLoader.loadConfigFile(configPath);
  } else {
    fileConfig = await CheckerConfigLoader.loadConfig(cwd);
  }

  const settings = CheckerConfigLoader.mergeWithDefaults(fileConfig);
  const projectRoot = args.projectRoot ?? settings.projectRoot;

  return {
    ...settings,
    rules: args.rules ?? settings.rules,
    disabledRules: [...settings.disabledRules, ...args.disable],
    showBadboxWarnings: args.noBadboxes ? false : settings.showBadboxWarnings,
    maxLineLength: args.maxLineLength ?? settings.maxLineLength,
    projectRoot: projectRoot ? path.resolve(cwd, projectRoot) : '',
    format: args.format ?? settings.format,
    suggestions: args.suggestions || settings.suggestions,
  };
}

/**
 * Run the checker and return the process exit code
 */
export async function run(argv: string[], cwd: string = process.cwd()): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    printHelp();
    return 0;
  }

  if (args.version) {
    console.log(VERSION);
    return 0;
  }

  if (args.listRules) {
    for (const rule of createRules(RULE_CODES)) {
      console.log(`${rule.code} (${rule.severity}) - ${rule.description}`);
    }
    return 0;
  }

  const settings = await resolveSettings(args, cwd);

  if (args.init) {
    const saved = await CheckerConfigLoader.saveConfig(
      cwd,
      CheckerConfigLoader.extractFileConfig(settings)
    );
    if (!saved) {
      throw new Error(`Cannot write ${CONFIG_FILE}`);
    }
    console.log(`Wrote ${CheckerConfigLoader.configPath(cwd)}`);
    return 0;
  }

  if (args.files.length === 0) {
    throw new Error('No log files were passed');
  }

  const parser = new TeXLogParser({
    rules: CheckerConfigLoader.resolveActiveRules(settings),
    projectRoot: settings.projectRoot,
    maxLineLength: settings.maxLineLength,
  });

  const reports: LogReport[] = [];
  for (const file of args.files) {
    const content = await readLog(path.resolve(cwd, file), file);
    reports.push({ log: file, diagnostics: dedupeDiagnostics(parser.parse(content)) });
  }

  if (settings.format === 'json') {
    const printable = settings.suggestions
      ? reports.map((r) => ({ ...r, diagnostics: enhanceDiagnostics(r.diagnostics) }))
      : reports;
    console.log(formatJson(printable));
  } else {
    reports.forEach((report, index) => {
      if (reports.length > 1) {
        console.log(`Log: ${report.log}`);
        console.log('');
      }
      console.log(formatReport(report.diagnostics, { suggestions: settings.suggestions }));
      // don't add new line after last log
      if (index < reports.length - 1) {
        console.log('');
      }
    });
  }

  const hasErrors = reports.some((r) => r.diagnostics.some((d) => d.severity === 'error'));
  return hasErrors ? 1 : 0;
}

async function readLog(absolutePath: string, displayName: string): Promise<string> {
  try {
    return await fs.readFile(absolutePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read ${displayName}: ${reason}`);
  }
}

function printHelp(): void {
  console.log(`${TOOL_NAME} ${VERSION}

Usage:
  ${TOOL_NAME} [options] <file.log>...
  ${TOOL_NAME} --list-rules
  ${TOOL_NAME} --init [options]

Options:
  --config <file>          Read settings from <file> instead of ./${CONFIG_FILE}
  --format <mode>          Output format: pretty | json (default: pretty)
  --rules <A,B,...>        Active rules, in matching order
  --disable <A,B,...>      Rules to switch off
  --no-badboxes            Do not report underfull/overfull boxes
  --project-root <dir>     Resolve file names against <dir>
  --max-line-length <n>    Column the compiler wraps its log at (default: 79)
  --suggestions            Print a hint below each diagnostic
  --list-rules             Show available rules
  --init                   Write the effective settings to ./${CONFIG_FILE}
  -h, --help               Show help
  -v, --version            Show version`);
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`${TOOL_NAME}: ${message}`);
      process.exitCode = 2;
    });
}
