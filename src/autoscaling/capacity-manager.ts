import { createDebugLogger, Logger } from '../common/logger';
import { ItemExecutor } from '../resource-manager/apply/executor';
import { PlanItem } from '../resource-manager/plan';
import { ResourceType } from '../resource-manager/schema/resource-types';
import { StateRecord, StateStore } from '../resource-manager/state';
import { Dictionary } from '../resource-manager/utils/dictionary';
import { TierformError } from '../resource-manager/utils/errors';
import { KeyedMutex } from '../resource-manager/utils/keyed-mutex';
import { Refs } from '../resource-manager/utils/refs';
import { clamp, healthByMember } from './policy';
import { selectMembersForRemoval } from './selection';
import { DEFAULT_HEALTH_CHECK_GRACE_PERIOD, HealthSignal, LoadBalancerHealthSource, ScalableGroup } from './types';

export interface CapacityChange {
  group_id: string;
  previous_capacity: number;
  desired_capacity: number;
  launched: string[];
  terminated: string[];
}

export interface CapacityManagerOptions {
  health?: LoadBalancerHealthSource;
  logger?: Logger;
  now?: () => number;
}

export interface SetCapacityOptions {
  reason?: string;
  /** Health already fetched by the caller; otherwise the health source is asked */
  health?: HealthSignal[];
}

// Launch template attributes copied onto every member
const MEMBER_TEMPLATE_ATTRIBUTES = ['image_id', 'instance_type', 'subnet_id', 'user_data', 'security_group_ids'];

const asCount = (value: unknown, name: string, group_id: string): number => {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new TierformError(`${group_id}: ${name} must be a non-negative integer, got ${JSON.stringify(value)}`);
  }
  return value;
};

const parseTimestamp = (value?: string): number | undefined => {
  const parsed = value === undefined ? NaN : Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
};

/**
 * The only writer of a group's desired capacity. Capacity changes become create and destroy items for `instance`
 * members, executed through the same item executor as declared resources and serialized per group.
 */
export class CapacityManager {
  protected locks = new KeyedMutex();
  protected logger: Logger;
  protected now: () => number;
  private sequence = 0;

  constructor(protected state: StateStore, protected executor: ItemExecutor, protected options: CapacityManagerOptions = {}) {
    this.logger = options.logger || createDebugLogger('capacity');
    this.now = options.now || Date.now;
  }

  async describe(group_id: string): Promise<ScalableGroup> {
    const record = await this.getGroupRecord(group_id);
    return this.toScalableGroup(record, await this.state.list());
  }

  async setDesiredCapacity(group_id: string, desired_capacity: number, options: SetCapacityOptions = {}): Promise<CapacityChange> {
    return this.locks.runExclusive(group_id, async () => {
      const group = await this.describe(group_id);
      if (!Number.isInteger(desired_capacity) || desired_capacity < group.min_size || desired_capacity > group.max_size) {
        throw new TierformError(`Desired capacity ${desired_capacity} for ${group_id} is outside of [${group.min_size}, ${group.max_size}]`);
      }
      this.logger.log(`${group_id}: desired capacity ${group.desired_capacity} -> ${desired_capacity}${options.reason ? ` (${options.reason})` : ''}`);
      return this.converge(group_id, desired_capacity, options.health);
    });
  }

  /**
   * Brings the members in line with the recorded desired capacity, clamped to the current bounds. Runs after every
   * apply of the group.
   */
  async sync(group_id: string): Promise<CapacityChange> {
    return this.locks.runExclusive(group_id, async () => {
      const group = await this.describe(group_id);
      return this.converge(group_id, clamp(group.desired_capacity, group.min_size, group.max_size));
    });
  }

  /**
   * Records a capacity change made by a controller on the group record, so cooldowns hold across processes.
   */
  async recordScalingActivity(group_id: string, scale_out: boolean, at: number): Promise<void> {
    await this.state.withLock(group_id, async () => {
      const record = await this.getGroupRecord(group_id);
      const timestamp = new Date(at).toISOString();
      await this.state.put({
        ...record,
        scaling_activity: {
          ...record.scaling_activity,
          last_change_at: timestamp,
          ...(scale_out ? { last_scale_out_at: timestamp } : {}),
        },
      });
    });
  }

  /** Hook for the reconciler */
  onApplied = async (item: PlanItem): Promise<void> => {
    if (item.resource_type === ResourceType.AUTOSCALING_GROUP && item.action !== 'destroy') {
      await this.sync(item.resource_id);
    }
  };

  protected async converge(group_id: string, desired_capacity: number, health_signals?: HealthSignal[]): Promise<CapacityChange> {
    let group_record = await this.getGroupRecord(group_id);
    const previous_capacity = this.toScalableGroup(group_record, await this.state.list()).desired_capacity;
    if (group_record.last_applied_attributes.desired_capacity !== desired_capacity) {
      group_record = await this.executor.patchAttributes(group_id, { desired_capacity });
    }

    const records = await this.state.list();
    const group = this.toScalableGroup(group_record, records);
    const change: CapacityChange = { group_id, previous_capacity, desired_capacity, launched: [], terminated: [] };

    const missing = desired_capacity - group.members.length;
    if (missing > 0) {
      const items = Array.from({ length: missing }, () => this.launchItem(group_record, records));
      await this.executeAll(items);
      change.launched = items.map(item => item.resource_id);
    } else if (missing < 0) {
      const signals = health_signals || await this.options.health?.getHealth(group_id) || [];
      const victims = selectMembersForRemoval(group.members, -missing, healthByMember(signals));
      const by_id = new Map(records.map(record => [record.resource_id, record]));
      await this.executeAll(victims.flatMap(member => {
        const record = by_id.get(member.id);
        return record ? [this.terminateItem(record)] : [];
      }));
      change.terminated = victims.map(member => member.id);
    }

    if (change.launched.length || change.terminated.length) {
      this.logger.debug(`${group_id}: launched [${change.launched.join(', ')}], terminated [${change.terminated.join(', ')}]`);
    }
    return change;
  }

  protected async executeAll(items: PlanItem[]): Promise<void> {
    const results = await Promise.allSettled(items.map(item => this.executor.execute(item)));
    const failures = results.flatMap(result => result.status === 'rejected' ? [result.reason] : []);
    if (failures.length > 0) {
      const first = failures[0];
      throw first instanceof Error ? first : new TierformError(String(first));
    }
  }

  protected launchItem(group: StateRecord, records: StateRecord[]): PlanItem {
    const launch_template_id = group.last_applied_attributes.launch_template_id;
    const template = records.find(record =>
      record.resource_type === ResourceType.LAUNCH_TEMPLATE && record.provider_assigned_id === launch_template_id);
    if (!template) {
      throw new TierformError(`${group.resource_id}: launch template ${JSON.stringify(launch_template_id)} has not been applied`);
    }

    const attributes: Dictionary<unknown> = {};
    for (const key of MEMBER_TEMPLATE_ATTRIBUTES) {
      if (template.last_applied_attributes[key] !== undefined) {
        attributes[key] = template.last_applied_attributes[key];
      }
    }
    attributes.launch_template_id = template.provider_assigned_id;
    attributes.group_id = group.provider_assigned_id;

    this.sequence += 1;
    const resource_id = Refs.safeRef(group.resource_id, `${group.provider_assigned_id}:${this.now()}:${this.sequence}`);
    const depends_on = [group.resource_id, template.resource_id];
    return {
      resource_id,
      resource_type: ResourceType.INSTANCE,
      action: 'create',
      diff: [],
      depends_on,
      previous_depends_on: [],
      replace_reasons: [],
      deposed_ids: [],
      owner: group.resource_id,
      resource: { id: resource_id, type: ResourceType.INSTANCE, attributes, depends_on },
    };
  }

  protected terminateItem(record: StateRecord): PlanItem {
    return {
      resource_id: record.resource_id,
      resource_type: record.resource_type,
      action: 'destroy',
      diff: [],
      depends_on: [],
      previous_depends_on: record.depends_on,
      replace_reasons: [],
      deposed_ids: record.deposed_ids,
      owner: record.owner,
    };
  }

  protected async getGroupRecord(group_id: string): Promise<StateRecord> {
    const record = await this.state.get(group_id);
    if (!record || record.resource_type !== ResourceType.AUTOSCALING_GROUP) {
      throw new TierformError(`${group_id} is not an applied autoscaling_group`);
    }
    return record;
  }

  protected toScalableGroup(record: StateRecord, records: StateRecord[]): ScalableGroup {
    const attributes = record.last_applied_attributes;
    const min_size = asCount(attributes.min_size, 'min_size', record.resource_id);
    const max_size = asCount(attributes.max_size, 'max_size', record.resource_id);
    const desired_capacity = attributes.desired_capacity === undefined ?
      min_size :
      asCount(attributes.desired_capacity, 'desired_capacity', record.resource_id);
    const health_check_grace_period = attributes.health_check_grace_period === undefined ?
      DEFAULT_HEALTH_CHECK_GRACE_PERIOD :
      asCount(attributes.health_check_grace_period, 'health_check_grace_period', record.resource_id);

    // Members launched for an earlier incarnation of the group no longer count
    const members = records
      .filter(member => member.owner === record.resource_id &&
        member.resource_type === ResourceType.INSTANCE &&
        member.last_applied_attributes.group_id === record.provider_assigned_id)
      .map(member => ({ id: member.resource_id, launched_at: new Date(member.last_applied_at) }))
      .sort((a, b) => a.launched_at.getTime() - b.launched_at.getTime() || a.id.localeCompare(b.id));

    const activity = record.scaling_activity;
    return {
      id: record.resource_id,
      desired_capacity,
      min_size,
      max_size,
      members,
      health_check_grace_period,
      last_scale_out_at: parseTimestamp(activity?.last_scale_out_at),
      last_change_at: parseTimestamp(activity?.last_change_at),
    };
  }
}
