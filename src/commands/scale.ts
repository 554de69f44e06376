import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import BaseCommand from '../base-command';

export default class Scale extends BaseCommand {
  static description = 'Set the desired capacity of an applied autoscaling group';

  static examples = [
    'tierform scale web_asg --desired 4',
  ];

  static flags = {
    ...BaseCommand.flags,
    desired: Flags.integer({
      description: 'Number of desired group members',
      required: true,
      min: 0,
    }),
  };

  static args = {
    group: Args.string({
      description: 'Id of the autoscaling_group resource',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Scale);

    const engine = this.app.createEngine({ state_dir: flags['state-dir'], logger: this.logger });
    const change = await engine.capacity.setDesiredCapacity(args.group, flags.desired, { reason: 'manual' });
    this.log(chalk.green(`Scaled ${change.group_id} from ${change.previous_capacity} to ${change.desired_capacity}`));
    for (const id of change.launched) this.log(`  + ${id}`);
    for (const id of change.terminated) this.log(`  - ${id}`);
  }
}
