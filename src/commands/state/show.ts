import { Args } from '@oclif/core';
import BaseCommand from '../../base-command';
import { TierformError } from '../../resource-manager/utils/errors';

export default class StateShow extends BaseCommand {
  static description = 'Print the state record of one resource';

  static examples = [
    'tierform state:show web_asg',
  ];

  static flags = {
    ...BaseCommand.flags,
  };

  static args = {
    resource: Args.string({
      description: 'Resource id',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(StateShow);

    const engine = this.app.createEngine({ state_dir: flags['state-dir'], logger: this.logger });
    const record = await engine.state.get(args.resource);
    if (!record) {
      throw new TierformError(`${args.resource} is not recorded in state`);
    }
    this.log(JSON.stringify(record, null, 2));
  }
}
