import { Args } from '@oclif/core';
import BaseCommand from '../../base-command';

export default class ConfigGet extends BaseCommand {
  static description = 'Get the value of a CLI config option';

  static flags = {
    ...BaseCommand.flags,
  };

  static args = {
    option: Args.string({
      required: true,
      description: 'Name of a config option',
    }),
  };

  async run(): Promise<void> {
    const { args } = await this.parse(ConfigGet);
    this.log(`${this.app.config.get(args.option)}`);
  }
}
