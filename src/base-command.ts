import { Command, Config, Flags } from '@oclif/core';
import chalk from 'chalk';
import AppService from './app-config/service';
import { ExitCode } from './common/exit-codes';
import { Logger } from './common/logger';
import { prettyValidationErrors } from './common/validation';
import { ConfigError, ValidationErrors } from './resource-manager/utils/errors';

interface CommandError extends Error {
  oclif?: { exit?: number };
}

export default abstract class BaseCommand extends Command {
  app: AppService;

  static flags = {
    'state-dir': Flags.string({
      description: 'Directory holding the state file and the local provider data. Defaults to the state_dir config option.',
    }),
  };

  constructor(argv: string[], config: Config) {
    super(argv, config);
    this.app = AppService.create(process.env.TIERFORM_CONFIG_DIR || this.config.configDir, this.config.version);
  }

  /**
   * Bridges engine logs to the command output. Debug lines only show with log_level debug.
   */
  protected get logger(): Logger {
    return {
      log: (message) => this.log(message),
      warn: (message) => this.warn(message),
      debug: (message) => {
        if (this.app.config.log_level === 'debug') {
          this.log(chalk.gray(message));
        } else {
          this.debug(message);
        }
      },
    };
  }

  async catch(error: CommandError): Promise<void> {
    if (error.oclif && error.oclif.exit === 0) return;

    if (error.stack) {
      error.stack = [...new Set(error.stack.split('\n'))].join('\n');
    }

    if (error instanceof ValidationErrors) {
      prettyValidationErrors(error);
      this.error('Invalid declaration', { exit: ExitCode.FATAL_CONFIG_ERROR });
    }

    if (error instanceof ConfigError) {
      this.error(chalk.red(error.message), { exit: ExitCode.FATAL_CONFIG_ERROR });
    }

    if (!error.oclif) {
      console.error(chalk.red(error.message));
    }
    // Oclif supers go as the return
    return super.catch(error);
  }
}
