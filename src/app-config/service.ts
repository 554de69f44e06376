import fs from 'fs-extra';
import path from 'path';
import { createEngine, Engine, EngineOptions } from '../engine';
import LocalPaths from '../paths';
import AppConfig from './config';

export default class AppService {
  config: AppConfig;
  version: string;

  static create(config_dir: string, version: string): AppService {
    return new AppService(config_dir, version);
  }

  constructor(config_dir: string, version: string) {
    this.config = new AppConfig(config_dir);
    this.version = version;
    if (config_dir) {
      const config_file = path.join(config_dir, LocalPaths.CLI_CONFIG_FILENAME);
      if (fs.existsSync(config_file)) {
        const payload = fs.readJSONSync(config_file);
        this.config = new AppConfig(config_dir, payload);
      }
    }
  }

  saveConfig(): void {
    this.config.save();
  }

  getStateDir(override?: string): string {
    return path.resolve(override || this.config.state_dir);
  }

  createEngine(options: Omit<EngineOptions, 'config' | 'state_dir'> & { state_dir?: string } = {}): Engine {
    return createEngine({ ...options, config: this.config, state_dir: this.getStateDir(options.state_dir) });
  }
}
