import { ResourceType } from '../schema/resource-types';
import { Dictionary } from '../utils/dictionary';

export type ResourceStatus = 'pending' | 'ready' | 'failed';

export interface ProvisionResult {
  provider_assigned_id: string;
  outputs: Dictionary<unknown>;
}

export interface ObservedResource {
  provider_assigned_id: string;
  attributes: Dictionary<unknown>;
  outputs: Dictionary<unknown>;
}

/**
 * A cloud backend. Calls are at-least-once and eventually consistent: a created object may report `pending` for a
 * while, and transient failures surface as ProviderErrors whose `transient` flag is set.
 */
export interface ResourceProvider {
  create(type: ResourceType, resource_id: string, attributes: Dictionary<unknown>): Promise<ProvisionResult>;
  read(type: ResourceType, provider_assigned_id: string): Promise<ObservedResource | undefined>;
  update(type: ResourceType, provider_assigned_id: string, attributes: Dictionary<unknown>): Promise<ProvisionResult>;
  delete(type: ResourceType, provider_assigned_id: string): Promise<void>;
  status(type: ResourceType, provider_assigned_id: string): Promise<ResourceStatus>;
}
