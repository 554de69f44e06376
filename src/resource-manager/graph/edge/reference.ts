import { DependencyEdge } from '.';

/**
 * Created for every `${{ resources.<to>.<output> }}` placeholder found in the attributes of `from`
 */
export class ReferenceEdge extends DependencyEdge {
  __type = 'reference';

  attribute_path: string;
  output: string;

  constructor(from: string, to: string, attribute_path: string, output: string) {
    super(from, to);
    this.attribute_path = attribute_path;
    this.output = output;
  }

  toString(): string {
    return `${this.__type}: ${this.from}[${this.attribute_path}] -> ${this.to}.${this.output}`;
  }

  get ref(): string {
    return `${this.__type}.${this.from}.${this.attribute_path}.${this.to}.${this.output}`;
  }
}
