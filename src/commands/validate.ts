import { Args } from '@oclif/core';
import chalk from 'chalk';
import BaseCommand from '../base-command';
import { buildResourceGraph } from '../resource-manager/graph/builder';
import { buildDeclarationFromPath } from '../resource-manager/spec/builder';

export default class Validate extends BaseCommand {
  static description = 'Validate a declaration file: schema, references and dependency cycles';

  static examples = [
    'tierform validate',
    'tierform validate ./web-tier/tierform.yml ./api-tier',
  ];

  static flags = {
    ...BaseCommand.flags,
  };

  static strict = false;

  static args = {
    declarations: Args.string({
      description: 'Paths to tierform.yml files or directories containing one. Multiple paths are accepted.',
    }),
  };

  async run(): Promise<void> {
    const { argv } = await this.parse(Validate);

    const paths = argv.length ? argv : ['.'];
    for (const declaration_path of paths) {
      const declaration = buildDeclarationFromPath(`${declaration_path}`);
      const graph = buildResourceGraph(declaration.resources);
      this.log(chalk.green(`✓ ${declaration.source_path}: ${graph.nodes.length} resources, ${declaration.policies.length} scaling policies`));
    }
  }
}
