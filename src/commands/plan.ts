import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import BaseCommand from '../base-command';
import { ExitCode } from '../common/exit-codes';
import { renderPlan } from '../common/plan-output';
import { planHasChanges } from '../resource-manager/plan';
import { buildDeclarationFromPath } from '../resource-manager/spec/builder';

export default class Plan extends BaseCommand {
  static description = 'Show the changes needed to reconcile provisioned resources with a declaration file';

  static examples = [
    'tierform plan',
    'tierform plan ./web-tier --detailed-exitcode',
  ];

  static flags = {
    ...BaseCommand.flags,
    refresh: Flags.boolean({
      description: 'Read every recorded resource back from the provider before planning',
      default: false,
    }),
    'detailed-exitcode': Flags.boolean({
      description: `Exit with ${ExitCode.NO_CHANGES} when there is nothing to apply`,
      default: false,
    }),
  };

  static args = {
    declaration: Args.string({
      description: 'Path to a tierform.yml file or a directory containing one',
      default: '.',
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Plan);

    const declaration = buildDeclarationFromPath(args.declaration);
    const engine = this.app.createEngine({ state_dir: flags['state-dir'], logger: this.logger });
    if (flags.refresh) {
      const refreshed = await engine.reconciler.refresh();
      for (const id of refreshed.removed) this.log(chalk.yellow(`${id} no longer exists and will be created again`));
      for (const id of refreshed.drifted) this.log(chalk.yellow(`${id} has drifted from its last applied attributes`));
    }

    const plan = await engine.reconciler.plan(declaration.resources);
    this.log(renderPlan(plan));
    if (flags['detailed-exitcode'] && !planHasChanges(plan)) {
      this.exit(ExitCode.NO_CHANGES);
    }
  }
}
