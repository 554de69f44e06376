import fs from 'fs-extra';
import path from 'path';
import InvalidConfigOption from '../common/errors/invalid-config-option';
import InvalidConfigValue from '../common/errors/invalid-config-value';
import LocalPaths from '../paths';
import { Dictionary } from '../resource-manager/utils/dictionary';

export type LogLevel = 'info' | 'debug';

const LOG_LEVELS: LogLevel[] = ['info', 'debug'];

export const NUMERIC_OPTIONS = ['parallelism', 'max_attempts', 'base_delay_ms', 'max_delay_ms', 'ready_timeout_ms', 'poll_interval_ms'] as const;
export type NumericOption = typeof NUMERIC_OPTIONS[number];

export const CONFIG_OPTIONS = ['log_level', 'state_dir', ...NUMERIC_OPTIONS] as const;
export type ConfigOption = typeof CONFIG_OPTIONS[number];

const isConfigOption = (option: string): option is ConfigOption => CONFIG_OPTIONS.some(name => name === option);
const isNumericOption = (option: string): option is NumericOption => NUMERIC_OPTIONS.some(name => name === option);
const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some(level => level === value);

export default class AppConfig {
  private config_dir: string;
  log_level: LogLevel;
  /** Relative paths resolve against the working directory */
  state_dir: string;
  parallelism: number;
  max_attempts: number;
  base_delay_ms: number;
  max_delay_ms: number;
  ready_timeout_ms: number;
  poll_interval_ms: number;

  constructor(config_dir: string, payload?: Dictionary<unknown>) {
    this.config_dir = config_dir;

    // Set defaults
    this.log_level = 'info';
    this.state_dir = LocalPaths.DEFAULT_STATE_DIR;
    this.parallelism = 4;
    this.max_attempts = 5;
    this.base_delay_ms = 500;
    this.max_delay_ms = 10000;
    this.ready_timeout_ms = 300000;
    this.poll_interval_ms = 2000;

    // Override defaults with persisted values, ignoring anything unknown
    for (const [option, value] of Object.entries(payload || {})) {
      if (isConfigOption(option) && (typeof value === 'string' || typeof value === 'number')) {
        this.set(option, `${value}`);
      }
    }
  }

  getConfigDir(): string {
    return this.config_dir;
  }

  get(option: string): string | number {
    if (!isConfigOption(option)) {
      throw new InvalidConfigOption(option);
    }
    return this[option];
  }

  set(option: string, value: string): void {
    if (!isConfigOption(option)) {
      throw new InvalidConfigOption(option);
    }

    if (isNumericOption(option)) {
      const number = Number(value);
      const minimum = option === 'parallelism' || option === 'max_attempts' ? 1 : 0;
      if (value.trim() === '' || !Number.isInteger(number) || number < minimum) {
        throw new InvalidConfigValue(option, value, `an integer >= ${minimum}`);
      }
      this[option] = number;
    } else if (option === 'log_level') {
      if (!isLogLevel(value)) {
        throw new InvalidConfigValue(option, value, LOG_LEVELS.join(' or '));
      }
      this.log_level = value;
    } else {
      if (!value) {
        throw new InvalidConfigValue(option, value, 'a path');
      }
      this.state_dir = value;
    }
  }

  save(): void {
    const config_file = path.join(this.config_dir, LocalPaths.CLI_CONFIG_FILENAME);
    fs.ensureDirSync(this.config_dir);
    fs.writeJSONSync(config_file, this, { spaces: 2 });
  }

  toJSON(): Dictionary<string | number> {
    return {
      log_level: this.log_level,
      state_dir: this.state_dir,
      parallelism: this.parallelism,
      max_attempts: this.max_attempts,
      base_delay_ms: this.base_delay_ms,
      max_delay_ms: this.max_delay_ms,
      ready_timeout_ms: this.ready_timeout_ms,
      poll_interval_ms: this.poll_interval_ms,
    };
  }
}
