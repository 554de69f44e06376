import { Resource } from '../resource';
import { ConfigError, UnresolvedReferenceError } from '../utils/errors';
import { findReferences } from '../utils/interpolation';
import { ResourceGraph, ResourceGraphMutable } from '.';
import { DependsOnEdge } from './edge/depends-on';
import { ReferenceEdge } from './edge/reference';
import { ResourceNode } from './node';

/**
 * Builds the dependency graph for a set of resources and rejects it up front when a reference can't be resolved
 * or the references form a cycle.
 */
export const buildResourceGraph = (resources: Resource[]): ResourceGraph => {
  const graph = new ResourceGraphMutable();
  for (const resource of resources) {
    if (graph.nodes_map.has(resource.id)) {
      throw new ConfigError(`Resource ${resource.id} is declared more than once`);
    }
    graph.addNode(new ResourceNode(resource));
  }

  for (const resource of resources) {
    for (const reference of findReferences(resource.attributes)) {
      if (reference.resource_id === resource.id) {
        throw new ConfigError(`Resource ${resource.id} cannot reference itself (attributes.${reference.path})`);
      }
      if (!graph.nodes_map.has(reference.resource_id)) {
        throw new UnresolvedReferenceError(resource.id, `resources.${reference.resource_id}.${reference.output}`);
      }
      graph.addEdge(new ReferenceEdge(resource.id, reference.resource_id, reference.path, reference.output));
    }

    for (const dependency of resource.depends_on) {
      if (dependency === resource.id) {
        throw new ConfigError(`Resource ${resource.id} cannot depend on itself`);
      }
      if (!graph.nodes_map.has(dependency)) {
        throw new UnresolvedReferenceError(resource.id, dependency);
      }
      graph.addEdge(new DependsOnEdge(resource.id, dependency));
    }
  }

  graph.validate();
  return graph;
};
