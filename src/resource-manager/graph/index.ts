import { CycleError } from '../utils/errors';
import { DependencyEdge } from './edge';
import { ResourceNode } from './node';

export class ResourceGraphMutable {
  nodes: ResourceNode[] = [];
  edges: DependencyEdge[] = [];

  protected __nodes_map?: Map<string, ResourceNode>;
  protected __edges_map?: Map<string, DependencyEdge>;
  protected __apply_order?: string[];

  addNode(node: ResourceNode): ResourceNode {
    if (!this.nodes_map.has(node.ref)) {
      this.nodes.push(node);
      this.nodes_map.set(node.ref, node);
      this.__apply_order = undefined;
    }
    return node;
  }

  addEdge(edge: DependencyEdge): DependencyEdge {
    if (edge.from === edge.to) {
      throw new Error(`Edge cannot be self referential: ${edge.toString()}`);
    }

    if (!this.edges_map.has(edge.ref)) {
      // Ensure the nodes exist in the pool
      this.getNodeByRef(edge.from);
      this.getNodeByRef(edge.to);

      this.edges.push(edge);
      this.edges_map.set(edge.ref, edge);
      this.__apply_order = undefined;
    }
    return edge;
  }

  get nodes_map(): Map<string, ResourceNode> {
    if (!this.__nodes_map) {
      this.__nodes_map = new Map();
      for (const node of this.nodes) {
        this.__nodes_map.set(node.ref, node);
      }
    }
    return this.__nodes_map;
  }

  get edges_map(): Map<string, DependencyEdge> {
    if (!this.__edges_map) {
      this.__edges_map = new Map();
      for (const edge of this.edges) {
        this.__edges_map.set(edge.ref, edge);
      }
    }
    return this.__edges_map;
  }

  getNodeByRef(ref: string): ResourceNode {
    const node = this.nodes_map.get(ref);
    if (!node)
      throw new Error(`Node not found for ref: ${ref}`);
    return node;
  }

  /**
   * Direct dependencies of a node
   */
  getDownstreamNodes(node: ResourceNode): ResourceNode[] {
    const nodes = new Map<string, ResourceNode>();
    for (const edge of this.edges) {
      if (edge.from === node.ref) {
        nodes.set(edge.to, this.getNodeByRef(edge.to));
      }
    }
    return [...nodes.values()];
  }

  /**
   * Direct dependents of a node
   */
  getUpstreamNodes(node: ResourceNode): ResourceNode[] {
    const nodes = new Map<string, ResourceNode>();
    for (const edge of this.edges) {
      if (edge.to === node.ref) {
        nodes.set(edge.from, this.getNodeByRef(edge.from));
      }
    }
    return [...nodes.values()];
  }

  getDependsOn(ref: string): string[] {
    return this.getDownstreamNodes(this.getNodeByRef(ref)).map(node => node.ref);
  }

  /**
   * Every node that directly or transitively depends on `ref`, in apply order
   */
  getTransitiveDependents(ref: string): string[] {
    const seen = new Set<string>();
    const queue = [ref];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const dependent of this.getUpstreamNodes(this.getNodeByRef(current))) {
        if (!seen.has(dependent.ref)) {
          seen.add(dependent.ref);
          queue.push(dependent.ref);
        }
      }
    }
    return this.getApplyOrder(seen);
  }

  /**
   * Every node `ref` directly or transitively depends on, in apply order
   */
  getTransitiveDependencies(ref: string): string[] {
    const seen = new Set<string>();
    const queue = [ref];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const dependency of this.getDownstreamNodes(this.getNodeByRef(current))) {
        if (!seen.has(dependency.ref)) {
          seen.add(dependency.ref);
          queue.push(dependency.ref);
        }
      }
    }
    return this.getApplyOrder(seen);
  }

  /**
   * Topological order, dependencies first. Ties between independent nodes keep their insertion order so plans
   * are reproducible. Passing a subset filters the cached full order rather than sorting again.
   */
  getApplyOrder(subset?: Iterable<string>): string[] {
    if (!this.__apply_order) {
      this.__apply_order = this.sort();
    }
    if (!subset) {
      return [...this.__apply_order];
    }
    const refs = new Set(subset);
    return this.__apply_order.filter(ref => refs.has(ref));
  }

  getDestroyOrder(subset?: Iterable<string>): string[] {
    return this.getApplyOrder(subset).reverse();
  }

  validate(): void {
    this.getApplyOrder();
  }

  protected sort(): string[] {
    const position = new Map(this.nodes.map((node, index) => [node.ref, index]));
    const remaining = new Map<string, Set<string>>();
    const dependents = new Map<string, string[]>();
    for (const node of this.nodes) {
      remaining.set(node.ref, new Set());
      dependents.set(node.ref, []);
    }
    for (const edge of this.edges) {
      remaining.get(edge.from)?.add(edge.to);
    }
    for (const [ref, dependencies] of remaining.entries()) {
      for (const dependency of dependencies) {
        dependents.get(dependency)?.push(ref);
      }
    }

    const byPosition = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0);
    const ready = this.nodes.filter(node => remaining.get(node.ref)?.size === 0).map(node => node.ref);
    const order: string[] = [];
    while (ready.length > 0) {
      ready.sort(byPosition);
      const next = ready.shift();
      if (next === undefined) break;
      order.push(next);
      for (const dependent of dependents.get(next) || []) {
        const dependencies = remaining.get(dependent);
        dependencies?.delete(next);
        if (dependencies?.size === 0) {
          ready.push(dependent);
        }
      }
    }

    if (order.length !== this.nodes.length) {
      const sorted = new Set(order);
      throw new CycleError(this.findCycle(this.nodes.map(node => node.ref).filter(ref => !sorted.has(ref))));
    }
    return order;
  }

  protected findCycle(candidates: string[]): string[] {
    const visited = new Set<string>();
    const stack: string[] = [];
    const on_stack = new Set<string>();

    const visit = (ref: string): string[] | undefined => {
      visited.add(ref);
      stack.push(ref);
      on_stack.add(ref);
      for (const dependency of this.getDownstreamNodes(this.getNodeByRef(ref))) {
        if (on_stack.has(dependency.ref)) {
          return stack.slice(stack.indexOf(dependency.ref));
        }
        if (!visited.has(dependency.ref)) {
          const cycle = visit(dependency.ref);
          if (cycle) return cycle;
        }
      }
      stack.pop();
      on_stack.delete(ref);
      return undefined;
    };

    for (const ref of candidates) {
      if (!visited.has(ref)) {
        const cycle = visit(ref);
        if (cycle) return cycle;
      }
    }
    return candidates;
  }
}

export type ResourceGraph = Readonly<ResourceGraphMutable>;
