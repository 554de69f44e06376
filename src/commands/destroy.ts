import { ApplyCommand } from './apply';

export default class Destroy extends ApplyCommand {
  static description = 'Destroy every resource recorded in state, dependents first';

  static examples = [
    'tierform destroy',
    'tierform destroy --auto-approve --state-dir ./.tierform',
  ];

  static flags = {
    ...ApplyCommand.flags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Destroy);

    const engine = this.app.createEngine({ state_dir: flags['state-dir'], logger: this.logger });
    const plan = await engine.reconciler.plan([]);
    await this.runPlan(engine, plan, flags);
  }
}
