import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import { AutoscalingController, EvaluationResult } from '../autoscaling/controller';
import BaseCommand from '../base-command';
import { buildDeclarationFromPath } from '../resource-manager/spec/builder';
import { TierformError } from '../resource-manager/utils/errors';

export default class Autoscale extends BaseCommand {
  static description = 'Run the target-tracking controller for every scaling policy in a declaration file';

  static examples = [
    'tierform autoscale',
    'tierform autoscale ./web-tier --once',
  ];

  static flags = {
    ...BaseCommand.flags,
    once: Flags.boolean({
      description: 'Evaluate every policy once and exit',
      default: false,
    }),
  };

  static args = {
    declaration: Args.string({
      description: 'Path to a tierform.yml file or a directory containing one',
      default: '.',
    }),
  };

  protected formatResult(result: EvaluationResult): string {
    const observed = result.observed === undefined ? 'n/a' : `${result.observed}`;
    return `${result.group_id}: ${result.decision} (observed ${observed}, capacity ${result.current_capacity} -> ${result.desired_capacity})`;
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Autoscale);

    const declaration = buildDeclarationFromPath(args.declaration);
    if (declaration.policies.length === 0) {
      throw new TierformError(`${declaration.source_path} declares no scaling_policies`);
    }

    const engine = this.app.createEngine({ state_dir: flags['state-dir'], logger: this.logger });
    const controllers = declaration.policies.map(policy => new AutoscalingController(policy, {
      capacity: engine.capacity,
      metrics: engine.metrics,
      health: engine.health,
      logger: this.logger,
    }));

    if (flags.once) {
      for (const controller of controllers) {
        this.log(this.formatResult(await controller.evaluateOnce()));
      }
      return;
    }

    for (const controller of controllers) {
      controller.start();
      this.log(chalk.blue(`Tracking ${controller.policy.metric} of ${controller.policy.group_id} at ${controller.policy.target_value} every ${controller.policy.evaluation_interval}s`));
    }
    await new Promise<void>(resolve => process.once('SIGINT', () => resolve()));
    this.log('Stopping controllers');
    await Promise.all(controllers.map(controller => controller.stop()));
  }
}
