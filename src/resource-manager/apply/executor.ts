import { isDeepStrictEqual } from 'util';
import { createDebugLogger, Logger } from '../../common/logger';
import { diffAttributes } from '../plan/planner';
import { PlanItem } from '../plan';
import { resolveAttributes, stateLookup } from '../plan/resolve';
import { ProvisionResult, ResourceProvider } from '../provider';
import { getResourceTypeSchema, ResourceType } from '../schema/resource-types';
import { StateRecord, StateStore } from '../state';
import { Dictionary } from '../utils/dictionary';
import { ProviderError, TierformError, TimeoutError } from '../utils/errors';
import { DEFAULT_RETRY_OPTIONS, RetryOptions, sleep, withRetry } from './retry';

export type ExecutionOutcome = 'succeeded' | 'unchanged';

export interface ExecutorOptions {
  retry: RetryOptions;
  ready_timeout_ms: number;
  poll_interval_ms: number;
  logger?: Logger;
  now?: () => number;
}

export const DEFAULT_EXECUTOR_OPTIONS: ExecutorOptions = {
  retry: DEFAULT_RETRY_OPTIONS,
  ready_timeout_ms: 300000,
  poll_interval_ms: 2000,
};

/**
 * Applies single plan items against the provider and records the result. Each item runs under its resource lock:
 * the state record is read again before any provider call so that work an earlier run already finished is skipped.
 */
export class ItemExecutor {
  protected logger: Logger;
  protected now: () => number;
  /** Objects created but not yet seen ready, so a retry waits on them instead of creating another */
  protected pending = new Map<string, ProvisionResult>();

  constructor(
    protected provider: ResourceProvider,
    protected state: StateStore,
    protected options: ExecutorOptions = DEFAULT_EXECUTOR_OPTIONS,
  ) {
    this.logger = options.logger || createDebugLogger('executor');
    this.now = options.now || Date.now;
  }

  async execute(item: PlanItem): Promise<ExecutionOutcome> {
    switch (item.action) {
      case 'no-op':
        return 'unchanged';
      case 'destroy':
        return this.state.withLock(item.resource_id, () => this.destroy(item));
      default:
        return this.state.withLock(item.resource_id, () => this.provision(item));
    }
  }

  /**
   * Destroys the objects a replacement left behind. Each id is dropped from the record as soon as it's gone.
   */
  async destroyDeposed(resource_id: string): Promise<ExecutionOutcome> {
    return this.state.withLock(resource_id, async () => {
      const record = await this.state.get(resource_id);
      if (!record || record.deposed_ids.length === 0) {
        return 'unchanged';
      }

      for (const deposed_id of record.deposed_ids) {
        this.logger.debug(`Destroying deposed ${record.resource_type} ${deposed_id} of ${resource_id}`);
        await this.retry(`${resource_id} (deposed ${deposed_id})`, () => this.provider.delete(record.resource_type, deposed_id));
        record.deposed_ids = record.deposed_ids.filter(id => id !== deposed_id);
        await this.state.put(record);
      }
      return 'succeeded';
    });
  }

  /**
   * Merges `patch` into the applied attributes of an existing resource and pushes them to the provider. Used for
   * attributes the declaration doesn't own, such as a group's desired capacity.
   */
  async patchAttributes(resource_id: string, patch: Dictionary<unknown>): Promise<StateRecord> {
    return this.state.withLock(resource_id, async () => {
      const record = await this.state.get(resource_id);
      if (!record) {
        throw new TierformError(`${resource_id} has not been applied`);
      }

      const attributes = { ...record.last_applied_attributes, ...patch };
      const result = await this.retry(resource_id, async () => {
        const updated = await this.provider.update(record.resource_type, record.provider_assigned_id, attributes);
        await this.waitReady(resource_id, record.resource_type, updated.provider_assigned_id);
        return updated;
      });

      const updated_record: StateRecord = {
        ...record,
        last_applied_attributes: attributes,
        outputs: result.outputs,
        last_applied_at: new Date(this.now()).toISOString(),
      };
      await this.state.put(updated_record);
      return updated_record;
    });
  }

  protected async resolve(item: PlanItem, previous?: StateRecord): Promise<Dictionary<unknown>> {
    if (!item.resource) {
      throw new TierformError(`Plan item ${item.resource_id} is missing its resource declaration`);
    }

    const records = new Map((await this.state.list()).map(record => [record.resource_id, record]));
    const resolved = resolveAttributes(item.resource.attributes, stateLookup(records));
    if (resolved.unknown.size > 0) {
      throw new TierformError(`${item.resource_id} references resources that have not been applied: ${[...resolved.unknown].join(', ')}`);
    }

    // The controller owns these once the resource exists
    if (previous && previous.resource_type === item.resource_type) {
      for (const key of getResourceTypeSchema(item.resource_type).controller_managed) {
        if (key in previous.last_applied_attributes) {
          resolved.values[key] = previous.last_applied_attributes[key];
        }
      }
    }
    return resolved.values;
  }

  protected async provision(item: PlanItem): Promise<ExecutionOutcome> {
    const previous = await this.state.get(item.resource_id);
    const attributes = await this.resolve(item, previous);

    if (previous && previous.resource_type === item.resource_type &&
      diffAttributes(item.resource_type, previous.last_applied_attributes, { values: attributes, unknown: new Set() }).length === 0) {
      this.logger.debug(`${item.resource_id} is already up to date`);
      const depends_on = [...item.depends_on];
      if (!isDeepStrictEqual([...previous.depends_on].sort(), [...depends_on].sort())) {
        await this.state.put({ ...previous, depends_on });
      }
      return 'unchanged';
    }

    let result: ProvisionResult;
    let deposed_ids = previous?.deposed_ids || [];
    if (previous && item.action === 'update') {
      result = await this.retry(item.resource_id, async () => {
        const updated = await this.provider.update(item.resource_type, previous.provider_assigned_id, attributes);
        await this.waitReady(item.resource_id, item.resource_type, updated.provider_assigned_id);
        return updated;
      });
    } else {
      if (previous && previous.resource_type !== item.resource_type) {
        // Deposed objects are destroyed with the record's type, so a type change can't leave one behind
        this.logger.debug(`Destroying ${previous.resource_type} ${previous.provider_assigned_id} before recreating ${item.resource_id} as ${item.resource_type}`);
        await this.retry(item.resource_id, () => this.provider.delete(previous.resource_type, previous.provider_assigned_id));
        await this.state.delete(item.resource_id);
      } else if (previous) {
        deposed_ids = [...deposed_ids, previous.provider_assigned_id];
      }
      result = await this.create(item.resource_id, item.resource_type, attributes);
    }

    await this.state.put({
      resource_id: item.resource_id,
      resource_type: item.resource_type,
      last_applied_attributes: attributes,
      outputs: result.outputs,
      provider_assigned_id: result.provider_assigned_id,
      last_applied_at: new Date(this.now()).toISOString(),
      depends_on: [...item.depends_on],
      owner: item.owner,
      deposed_ids,
      ...(previous?.scaling_activity && previous.resource_type === item.resource_type ? { scaling_activity: previous.scaling_activity } : {}),
    });
    return 'succeeded';
  }

  protected async create(resource_id: string, type: ResourceType, attributes: Dictionary<unknown>): Promise<ProvisionResult> {
    return this.retry(resource_id, async () => {
      let created = this.pending.get(resource_id);
      if (!created) {
        created = await this.provider.create(type, resource_id, attributes);
        this.pending.set(resource_id, created);
      } else {
        this.logger.debug(`Resuming readiness wait on ${created.provider_assigned_id} for ${resource_id}`);
      }

      try {
        await this.waitReady(resource_id, type, created.provider_assigned_id);
      } catch (err) {
        if (!(err instanceof TimeoutError)) {
          this.pending.delete(resource_id);
        }
        throw err;
      }
      this.pending.delete(resource_id);
      return created;
    });
  }

  protected async destroy(item: PlanItem): Promise<ExecutionOutcome> {
    const record = await this.state.get(item.resource_id);
    if (!record) {
      return 'unchanged';
    }

    for (const provider_assigned_id of [...record.deposed_ids, record.provider_assigned_id]) {
      await this.retry(item.resource_id, () => this.provider.delete(record.resource_type, provider_assigned_id));
    }
    await this.state.delete(item.resource_id);
    return 'succeeded';
  }

  protected async waitReady(resource_id: string, type: ResourceType, provider_assigned_id: string): Promise<void> {
    const deadline = this.now() + this.options.ready_timeout_ms;
    for (;;) {
      const status = await this.provider.status(type, provider_assigned_id);
      if (status === 'ready') {
        return;
      }
      if (status === 'failed') {
        throw new ProviderError(`${resource_id} (${provider_assigned_id}) entered a failed state`, 'ResourceFailed');
      }
      if (this.now() >= deadline) {
        throw new TimeoutError(resource_id, this.options.ready_timeout_ms);
      }
      await (this.options.retry.sleep || sleep)(this.options.poll_interval_ms);
    }
  }

  protected retry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      ...this.options.retry,
      onRetry: (err, attempt, delay_ms) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(`${label}: attempt ${attempt} failed (${message}), retrying in ${delay_ms}ms`);
        this.options.retry.onRetry?.(err, attempt, delay_ms);
      },
    });
  }
}
