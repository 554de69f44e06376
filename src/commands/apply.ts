import { Args, Flags, ux } from '@oclif/core';
import chalk from 'chalk';
import inquirer from 'inquirer';
import BaseCommand from '../base-command';
import { ExitCode } from '../common/exit-codes';
import { renderApplySummary, renderItemResult, renderPlan } from '../common/plan-output';
import { Engine } from '../engine';
import { ApplyResult } from '../resource-manager/apply';
import { Plan, planHasChanges } from '../resource-manager/plan';
import { buildDeclarationFromPath } from '../resource-manager/spec/builder';

export abstract class ApplyCommand extends BaseCommand {
  static flags = {
    ...BaseCommand.flags,
    'auto-approve': Flags.boolean({
      description: 'Skip the confirmation prompt',
      default: false,
    }),
    parallelism: Flags.integer({
      description: 'Maximum number of resources applied at the same time. Defaults to the parallelism config option.',
      min: 1,
    }),
    'detailed-exitcode': Flags.boolean({
      description: `Exit with ${ExitCode.NO_CHANGES} when there is nothing to apply`,
      default: false,
    }),
  };

  protected async approvePlan(auto_approve: boolean): Promise<boolean> {
    if (auto_approve) {
      return true;
    }
    if (!process.stdin.isTTY) {
      this.error('--auto-approve is required when not running in a terminal');
    }
    const confirmation = await inquirer.prompt<{ apply: boolean }>([{
      type: 'confirm',
      name: 'apply',
      message: 'Would you like to apply these changes?',
    }]);
    if (!confirmation.apply) {
      this.warn('Apply cancelled');
      return false;
    }
    return true;
  }

  /**
   * Shows the plan, asks for approval and applies it. Ctrl+C stops scheduling new items; items already running
   * finish first.
   */
  protected async runPlan(engine: Engine, plan: Plan, flags: { 'auto-approve': boolean; parallelism?: number; 'detailed-exitcode': boolean }): Promise<void> {
    this.log(renderPlan(plan));
    if (!planHasChanges(plan)) {
      if (flags['detailed-exitcode']) {
        this.exit(ExitCode.NO_CHANGES);
      }
      return;
    }

    this.log('');
    if (!(await this.approvePlan(flags['auto-approve']))) {
      return;
    }

    const controller = new AbortController();
    const onInterrupt = () => {
      this.warn('Interrupted, waiting for running items to finish');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    let result: ApplyResult;
    try {
      ux.action.start(chalk.blue('Applying'));
      result = await engine.reconciler.apply(plan, {
        parallelism: flags.parallelism || this.app.config.parallelism,
        signal: controller.signal,
        onItemComplete: (item) => this.log(renderItemResult(item)),
      });
    } finally {
      ux.action.stop();
      process.removeListener('SIGINT', onInterrupt);
    }

    this.log(renderApplySummary(result));
    if (result.status !== 'succeeded') {
      this.exit(ExitCode.APPLY_PARTIAL_FAILURE);
    }
  }
}

export default class Apply extends ApplyCommand {
  static description = 'Reconcile provisioned resources with a declaration file';

  static examples = [
    'tierform apply',
    'tierform apply ./web-tier/tierform.yml --auto-approve',
    'tierform apply --refresh --parallelism 8',
  ];

  static flags = {
    ...ApplyCommand.flags,
    refresh: Flags.boolean({
      description: 'Read every recorded resource back from the provider before planning',
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
    const { args, flags } = await this.parse(Apply);

    const declaration = buildDeclarationFromPath(args.declaration);
    const engine = this.app.createEngine({ state_dir: flags['state-dir'], logger: this.logger });
    if (flags.refresh) {
      const refreshed = await engine.reconciler.refresh();
      for (const id of refreshed.removed) this.log(chalk.yellow(`${id} no longer exists and will be created again`));
      for (const id of refreshed.drifted) this.log(chalk.yellow(`${id} has drifted from its last applied attributes`));
    }

    const plan = await engine.reconciler.plan(declaration.resources);
    await this.runPlan(engine, plan, flags);
  }
}
