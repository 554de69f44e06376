import { StateRecord } from '../state';
import { Dictionary } from '../utils/dictionary';
import { ConfigError } from '../utils/errors';
import { getPath, resolveReferences, ReferenceLookup, UNKNOWN } from '../utils/interpolation';

/**
 * `id` is the provider-assigned id; anything else is looked up in the provider outputs first and then in the applied
 * attributes.
 */
export const lookupOutput = (record: StateRecord, output: string): unknown => {
  if (output === 'id') {
    return record.provider_assigned_id;
  }
  const value = getPath(record.outputs, output);
  if (value !== undefined) {
    return value;
  }
  const attribute = getPath(record.last_applied_attributes, output);
  if (attribute === undefined) {
    throw new ConfigError(`resources.${record.resource_id}.${output} is not an output of ${record.resource_id}`);
  }
  return attribute;
};

export interface ResolvedAttributes {
  values: Dictionary<unknown>;
  /** Top-level attributes that still contain a reference that can't be resolved yet */
  unknown: Set<string>;
}

export const resolveAttributes = (attributes: Dictionary<unknown>, lookup: ReferenceLookup): ResolvedAttributes => {
  const values: Dictionary<unknown> = {};
  const unknown = new Set<string>();
  for (const [key, value] of Object.entries(attributes)) {
    const resolved = resolveReferences(value, lookup);
    values[key] = resolved.value;
    if (!resolved.known) {
      unknown.add(key);
    }
  }
  return { values, unknown };
};

/**
 * Lookup against applied state only; used at apply time, when every dependency has already been written.
 */
export const stateLookup = (records: Map<string, StateRecord>): ReferenceLookup => {
  return (resource_id, output) => {
    const record = records.get(resource_id);
    if (!record) {
      return UNKNOWN;
    }
    return lookupOutput(record, output);
  };
};
