import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import * as path from 'path';
import { BADBOX_RULES, CONFIG_FILE } from '../constants';
import { isRuleCode } from '../parser/rules';
import { CheckerSettings, DEFAULT_SETTINGS, OutputFormat, RuleCode } from '../types';

/**
 * Configuration file schema
 */
export interface CheckerConfigFile {
  /** Ordered set of active rules, replacing the default order */
  rules?: RuleCode[];
  /** Rules to switch off */
  disabledRules?: RuleCode[];
  /** Report underfull/overfull boxes */
  showBadboxWarnings?: boolean;
  /** Column at which the compiler wraps log lines */
  maxLineLength?: number;
  /** Directory relative file names are resolved against */
  projectRoot?: string;
  /** Report format */
  format?: OutputFormat;
  /** Append remedy hints */
  suggestions?: boolean;
}

const OUTPUT_FORMATS: OutputFormat[] = ['pretty', 'json'];

/**
 * Handles loading and saving checker configuration files
 */
export class CheckerConfigLoader {
  /**
   * Path of the config file inside a directory
   */
  static configPath(dir: string): string {
    return path.join(dir, CONFIG_FILE);
  }

  /**
   * Check if a directory has a config file
   */
  static hasConfigFile(dir: string): boolean {
    return fsSync.existsSync(this.configPath(dir));
  }

  /**
   * Load configuration from the config file in a directory
   * Returns null if no config file exists
   */
  static async loadConfig(dir: string): Promise<CheckerConfigFile | null> {
    return this.loadConfigFile(this.configPath(dir));
  }

  /**
   * Load configuration from an explicit file path
   * Returns null if the file is missing or unreadable
   */
  static async loadConfigFile(configPath: string): Promise<CheckerConfigFile | null> {
    try {
      const content = await fs.readFile(configPath, 'utf-8');
      const config: unknown = JSON.parse(content);
      return this.validateConfig(config);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null; // File doesn't exist
      }
      console.error(`Error loading config from ${configPath}:`, error);
      return null;
    }
  }

  /**
   * Save configuration to the config file in a directory
   */
  static async saveConfig(dir: string, config: CheckerConfigFile): Promise<boolean> {
    const configPath = this.configPath(dir);

    try {
      const content = JSON.stringify(config, null, 2);
      await fs.writeFile(configPath, content + '\n', 'utf-8');
      return true;
    } catch (error) {
      console.error(`Error saving config to ${configPath}:`, error);
      return false;
    }
  }

  /**
   * Merge file config with defaults to create full CheckerSettings
   */
  static mergeWithDefaults(fileConfig: CheckerConfigFile | null): CheckerSettings {
    return {
      rules: fileConfig?.rules ?? [...DEFAULT_SETTINGS.rules],
      disabledRules: fileConfig?.disabledRules ?? [],
      showBadboxWarnings: fileConfig?.showBadboxWarnings ?? DEFAULT_SETTINGS.showBadboxWarnings,
      maxLineLength: fileConfig?.maxLineLength ?? DEFAULT_SETTINGS.maxLineLength,
      projectRoot: fileConfig?.projectRoot || DEFAULT_SETTINGS.projectRoot,
      format: fileConfig?.format ?? DEFAULT_SETTINGS.format,
      suggestions: fileConfig?.suggestions ?? DEFAULT_SETTINGS.suggestions,
    };
  }

  /**
   * Extract saveable config from settings
   */
  static extractFileConfig(settings: CheckerSettings): CheckerConfigFile {
    const fileConfig: CheckerConfigFile = {};

    // Only include non-default values
    if (settings.rules.join(',') !== DEFAULT_SETTINGS.rules.join(',')) {
      fileConfig.rules = settings.rules;
    }
    if (settings.disabledRules.length > 0) {
      fileConfig.disabledRules = settings.disabledRules;
    }
    if (settings.showBadboxWarnings !== DEFAULT_SETTINGS.showBadboxWarnings) {
      fileConfig.showBadboxWarnings = settings.showBadboxWarnings;
    }
    if (settings.maxLineLength !== DEFAULT_SETTINGS.maxLineLength) {
      fileConfig.maxLineLength = settings.maxLineLength;
    }
    if (settings.projectRoot) {
      fileConfig.projectRoot = settings.projectRoot;
    }
    if (settings.format !== DEFAULT_SETTINGS.format) {
      fileConfig.format = settings.format;
    }
    if (settings.suggestions !== DEFAULT_SETTINGS.suggestions) {
      fileConfig.suggestions = settings.suggestions;
    }

    return fileConfig;
  }

  /**
   * Ordered rule codes the scan should run with
   */
  static resolveActiveRules(settings: CheckerSettings): RuleCode[] {
    const disabled = new Set<RuleCode>(settings.disabledRules);
    if (!settings.showBadboxWarnings) {
      BADBOX_RULES.forEach((code) => disabled.add(code));
    }
    return settings.rules.filter((code) => !disabled.has(code));
  }

  /**
   * Validate and sanitize config file contents
   */
  private static validateConfig(raw: unknown): CheckerConfigFile {
    const validated: CheckerConfigFile = {};
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      return validated;
    }
    const config: Record<string, unknown> = Object.fromEntries(Object.entries(raw));

    if (Array.isArray(config.rules)) {
      validated.rules = config.rules.filter(isRuleCode);
    }

    if (Array.isArray(config.disabledRules)) {
      validated.disabledRules = config.disabledRules.filter(isRuleCode);
    }

    if (typeof config.showBadboxWarnings === 'boolean') {
      validated.showBadboxWarnings = config.showBadboxWarnings;
    }

    const maxLineLength = config.maxLineLength;
    if (typeof maxLineLength === 'number' && Number.isInteger(maxLineLength) && maxLineLength > 0) {
      validated.maxLineLength = maxLineLength;
    }

    if (typeof config.projectRoot === 'string') {
      validated.projectRoot = config.projectRoot;
    }

    const format = config.format;
    if (typeof format === 'string') {
      const known = OUTPUT_FORMATS.find((f) => f === format);
      if (known) {
        validated.format = known;
      }
    }

    if (typeof config.suggestions === 'boolean') {
      validated.suggestions = config.suggestions;
    }

    return validated;
  }
}
