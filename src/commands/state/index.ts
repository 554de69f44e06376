import BaseCommand from '../../base-command';
import Table from '../../base-table';

export default class StateList extends BaseCommand {
  static description = 'List the resources recorded in state';

  static flags = {
    ...BaseCommand.flags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(StateList);

    const engine = this.app.createEngine({ state_dir: flags['state-dir'], logger: this.logger });
    const records = await engine.state.list();
    if (records.length === 0) {
      this.log('No resources recorded in state.');
      return;
    }

    const table = new Table({ head: ['Resource', 'Type', 'Provider ID', 'Owner', 'Last applied'] });
    for (const record of records.sort((a, b) => a.resource_id.localeCompare(b.resource_id))) {
      table.push([record.resource_id, record.resource_type, record.provider_assigned_id, record.owner || '', record.last_applied_at]);
    }
    this.log(table.toString());
  }
}
