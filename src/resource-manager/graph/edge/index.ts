export abstract class DependencyEdge {
  abstract __type: string;

  /** The dependent resource */
  from: string;
  /** The resource it depends on */
  to: string;

  constructor(from: string, to: string) {
    this.from = from;
    this.to = to;
  }

  toString(): string {
    return `${this.__type}: ${this.from} -> ${this.to}`;
  }

  get ref(): string {
    return `${this.__type}.${this.from}.${this.to}`;
  }
}
