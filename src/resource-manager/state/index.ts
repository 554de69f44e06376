import { ResourceType } from '../schema/resource-types';
import { Dictionary } from '../utils/dictionary';
import { KeyedMutex } from '../utils/keyed-mutex';

/** ISO-8601 times of the last capacity changes of a group, kept across controller runs for its cooldowns */
export interface ScalingActivity {
  last_scale_out_at?: string;
  last_change_at?: string;
}

export interface StateRecord {
  resource_id: string;
  resource_type: ResourceType;
  /** Attributes as sent to the provider, with every reference resolved */
  last_applied_attributes: Dictionary<unknown>;
  outputs: Dictionary<unknown>;
  provider_assigned_id: string;
  /** ISO-8601 */
  last_applied_at: string;
  /** Resolved dependencies at apply time, used to order destroys of resources no longer declared */
  depends_on: string[];
  owner?: string;
  /** Provider ids of replaced objects that still have to be destroyed */
  deposed_ids: string[];
  scaling_activity?: ScalingActivity;
}

export interface StateStore {
  get(resource_id: string): Promise<StateRecord | undefined>;
  list(): Promise<StateRecord[]>;
  put(record: StateRecord): Promise<void>;
  delete(resource_id: string): Promise<void>;
  /**
   * Runs `fn` holding the lock for one resource, so that reading its record, applying it and writing the new record
   * happen atomically with respect to other writers of the same resource.
   */
  withLock<T>(resource_id: string, fn: () => Promise<T>): Promise<T>;
}

export abstract class BaseStateStore implements StateStore {
  protected locks = new KeyedMutex();

  abstract get(resource_id: string): Promise<StateRecord | undefined>;
  abstract list(): Promise<StateRecord[]>;
  abstract put(record: StateRecord): Promise<void>;
  abstract delete(resource_id: string): Promise<void>;

  withLock<T>(resource_id: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(resource_id, fn);
  }
}

export const cloneRecord = (record: StateRecord): StateRecord => JSON.parse(JSON.stringify(record));
