import { isDeepStrictEqual } from 'util';
import { buildResourceGraph } from '../graph/builder';
import { Resource } from '../resource';
import { isControllerManagedAttribute, isImmutableAttribute, ResourceType } from '../schema/resource-types';
import { StateRecord } from '../state';
import { Dictionary } from '../utils/dictionary';
import { getPath, ReferenceLookup, UNKNOWN } from '../utils/interpolation';
import { AttributeChange, Plan, PlanAction, PlanItem } from '.';
import { lookupOutput, resolveAttributes, ResolvedAttributes } from './resolve';

export const diffAttributes = (type: ResourceType, before: Dictionary<unknown>, after: ResolvedAttributes): AttributeChange[] => {
  const keys = [...new Set([...Object.keys(before), ...Object.keys(after.values)])].sort();
  const changes: AttributeChange[] = [];
  for (const key of keys) {
    if (isControllerManagedAttribute(type, key)) {
      continue;
    }
    const known_after_apply = after.unknown.has(key);
    if (known_after_apply || !isDeepStrictEqual(before[key], after.values[key])) {
      changes.push({ path: key, before: before[key], after: after.values[key], known_after_apply });
    }
  }
  return changes;
};

const sameMembers = (a: string[], b: string[]): boolean => {
  return a.length === b.length && a.every(value => b.includes(value));
};

const orderDestroys = (records: StateRecord[]): StateRecord[] => {
  const ids = new Set(records.map(record => record.resource_id));
  const graph = buildResourceGraph(records.map(record => ({
    id: record.resource_id,
    type: record.resource_type,
    attributes: {},
    depends_on: record.depends_on.filter(dependency => ids.has(dependency)),
  })));
  const by_id = new Map(records.map(record => [record.resource_id, record]));
  return graph.getDestroyOrder().flatMap(id => by_id.get(id) || []);
};

/**
 * Diffs the declared resources against applied state. Declared resources come first in apply order, followed by
 * destroys of recorded resources that are no longer declared in reverse dependency order.
 */
export const computePlan = (desired: Resource[], records: StateRecord[]): Plan => {
  const graph = buildResourceGraph(desired);
  const records_map = new Map(records.map(record => [record.resource_id, record]));

  // Resources created or replaced by this plan: their outputs don't exist yet
  const pending_ids = new Set<string>();
  const pending_updates = new Map<string, ResolvedAttributes>();

  const lookup: ReferenceLookup = (resource_id, output) => {
    if (pending_ids.has(resource_id)) {
      return UNKNOWN;
    }
    const update = pending_updates.get(resource_id);
    const [attribute] = output.split('.');
    if (update && output !== 'id' && attribute in update.values) {
      return update.unknown.has(attribute) ? UNKNOWN : getPath(update.values, output);
    }
    const record = records_map.get(resource_id);
    return record ? lookupOutput(record, output) : UNKNOWN;
  };

  const items: PlanItem[] = [];
  for (const id of graph.getApplyOrder()) {
    const resource = graph.getNodeByRef(id).resource;
    const record = records_map.get(id);
    const resolved = resolveAttributes(resource.attributes, lookup);

    let action: PlanAction;
    let diff: AttributeChange[];
    let replace_reasons: string[] = [];
    if (!record) {
      action = 'create';
      diff = diffAttributes(resource.type, {}, resolved);
      pending_ids.add(id);
    } else {
      diff = diffAttributes(resource.type, record.last_applied_attributes, resolved);
      replace_reasons = record.resource_type === resource.type ?
        diff.filter(change => isImmutableAttribute(resource.type, change.path)).map(change => change.path) :
        ['type'];

      if (replace_reasons.length) {
        action = 'replace';
        pending_ids.add(id);
      } else if (diff.length || !sameMembers(record.depends_on, graph.getDependsOn(id))) {
        action = 'update';
        pending_updates.set(id, resolved);
      } else {
        action = 'no-op';
      }
    }

    items.push({
      resource_id: id,
      resource_type: resource.type,
      action,
      diff,
      depends_on: graph.getDependsOn(id),
      previous_depends_on: record?.depends_on || [],
      replace_reasons,
      deposed_ids: record?.deposed_ids || [],
      resource,
    });
  }

  const removed = records.filter(record => {
    if (record.owner) {
      // Members go away with their group, or when the group is (re)created and launches fresh members
      return !graph.nodes_map.has(record.owner) || pending_ids.has(record.owner);
    }
    return !graph.nodes_map.has(record.resource_id);
  });

  for (const record of orderDestroys(removed)) {
    items.push({
      resource_id: record.resource_id,
      resource_type: record.resource_type,
      action: 'destroy',
      diff: Object.keys(record.last_applied_attributes).sort().map(key => ({
        path: key,
        before: record.last_applied_attributes[key],
        after: undefined,
        known_after_apply: false,
      })),
      depends_on: [],
      previous_depends_on: record.depends_on,
      replace_reasons: [],
      deposed_ids: record.deposed_ids,
      owner: record.owner,
    });
  }

  return { items, created_at: new Date() };
};
