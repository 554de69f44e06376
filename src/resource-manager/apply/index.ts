import pLimit from 'p-limit';
import { isDeepStrictEqual } from 'util';
import { createDebugLogger, Logger } from '../../common/logger';
import { Plan, PlanAction, PlanItem } from '../plan';
import { computePlan } from '../plan/planner';
import { ResourceProvider } from '../provider';
import { Resource } from '../resource';
import { StateStore } from '../state';
import { TierformError } from '../utils/errors';
import { ExecutionOutcome, ItemExecutor } from './executor';

export type ItemStatus = 'succeeded' | 'unchanged' | 'failed' | 'skipped' | 'cancelled';

export interface ItemResult {
  /** `<resource_id>`, or `<resource_id>:deposed` for the cleanup of replaced objects */
  task_id: string;
  resource_id: string;
  action: PlanAction | 'destroy-deposed';
  status: ItemStatus;
  error?: Error;
}

export interface ApplyResult {
  status: 'succeeded' | 'failed' | 'cancelled';
  items: ItemResult[];
}

export interface ApplyOptions {
  parallelism?: number;
  signal?: AbortSignal;
  onItemComplete?: (result: ItemResult) => void;
}

export interface RefreshResult {
  /** Gone from the provider; dropped from state so the next plan creates them again */
  removed: string[];
  /** Provider attributes differ from the last apply; written back to state */
  drifted: string[];
}

/**
 * Runs after an item succeeds, inside its worker slot. A hook error fails the item.
 */
export type AppliedHook = (item: PlanItem, outcome: ExecutionOutcome) => Promise<void>;

interface Task {
  id: string;
  item: PlanItem;
  deposed: boolean;
  prerequisites: Set<string>;
}

export const DEFAULT_PARALLELISM = 4;

const deposedTaskId = (resource_id: string) => `${resource_id}:deposed`;

/**
 * Expands a plan into tasks and their prerequisites. Destroys wait on everything that used to depend on the
 * destroyed resource, and the cleanup of a replaced object waits until everything now depending on its replacement
 * has been applied and everything that depended on it and is being removed is gone.
 */
export const buildTasks = (plan: Plan): Task[] => {
  const tasks: Task[] = [];
  const main_tasks = new Map<string, Task>();
  for (const item of plan.items) {
    const task: Task = { id: item.resource_id, item, deposed: false, prerequisites: new Set() };
    tasks.push(task);
    main_tasks.set(item.resource_id, task);
    if (item.action !== 'destroy' && (item.action === 'replace' || item.deposed_ids.length > 0)) {
      tasks.push({ id: deposedTaskId(item.resource_id), item, deposed: true, prerequisites: new Set([item.resource_id]) });
    }
  }
  const task_ids = new Set(tasks.map(task => task.id));

  for (const task of tasks) {
    const item = task.item;
    if (task.deposed) {
      for (const other of plan.items) {
        const forward_dependent = other.action !== 'destroy' && other.depends_on.includes(item.resource_id);
        // Removed resources may still reference the old object until they're gone
        const retired_dependent = other.action === 'destroy' &&
          (other.owner === item.resource_id || other.previous_depends_on.includes(item.resource_id));
        if (forward_dependent || retired_dependent) {
          task.prerequisites.add(other.resource_id);
        }
      }
    } else if (item.action === 'destroy') {
      for (const other of plan.items) {
        if (other.resource_id !== item.resource_id && other.previous_depends_on.includes(item.resource_id)) {
          task.prerequisites.add(other.resource_id);
          if (task_ids.has(deposedTaskId(other.resource_id))) {
            task.prerequisites.add(deposedTaskId(other.resource_id));
          }
        }
      }
      // Members of a replaced group stay in service until the new group is up
      const owner = item.owner ? main_tasks.get(item.owner) : undefined;
      if (owner && owner.item.action !== 'destroy') {
        task.prerequisites.add(owner.id);
      }
    } else {
      for (const dependency of item.depends_on) {
        if (main_tasks.has(dependency)) {
          task.prerequisites.add(dependency);
        }
      }
    }
  }
  return tasks;
};

export interface ReconcilerOptions {
  logger?: Logger;
  onApplied?: AppliedHook;
}

export class Reconciler {
  protected logger: Logger;

  constructor(
    protected provider: ResourceProvider,
    protected state: StateStore,
    protected executor: ItemExecutor,
    protected options: ReconcilerOptions = {},
  ) {
    this.logger = options.logger || createDebugLogger('reconciler');
  }

  async plan(desired: Resource[]): Promise<Plan> {
    return computePlan(desired, await this.state.list());
  }

  async apply(plan: Plan, options: ApplyOptions = {}): Promise<ApplyResult> {
    const tasks = buildTasks(plan);
    const tasks_map = new Map(tasks.map(task => [task.id, task]));
    const limit = pLimit(options.parallelism || DEFAULT_PARALLELISM);
    const results = new Map<string, ItemResult>();
    const runs = new Map<string, Promise<ItemStatus>>();
    const visiting = new Set<string>();

    const finish = (task: Task, status: ItemStatus, error?: Error): ItemStatus => {
      const result: ItemResult = {
        task_id: task.id,
        resource_id: task.item.resource_id,
        action: task.deposed ? 'destroy-deposed' : task.item.action,
        status,
        error,
      };
      results.set(task.id, result);
      options.onItemComplete?.(result);
      return status;
    };

    const execute = async (task: Task): Promise<ItemStatus> => {
      if (options.signal?.aborted) {
        return finish(task, 'cancelled');
      }
      try {
        const outcome = task.deposed ?
          await this.executor.destroyDeposed(task.item.resource_id) :
          await this.executor.execute(task.item);
        if (!task.deposed) {
          await this.options.onApplied?.(task.item, outcome);
        }
        return finish(task, outcome);
      } catch (err) {
        const error = err instanceof Error ? err : new TierformError(String(err));
        this.logger.warn(`${task.id} failed: ${error.message}`);
        return finish(task, 'failed', error);
      }
    };

    const run = (task_id: string): Promise<ItemStatus> => {
      const existing = runs.get(task_id);
      if (existing) {
        return existing;
      }
      const task = tasks_map.get(task_id);
      if (!task) {
        throw new TierformError(`Unknown apply task ${task_id}`);
      }
      if (visiting.has(task_id)) {
        throw new TierformError(`Apply tasks depend on each other: ${[...visiting, task_id].join(' -> ')}`);
      }

      visiting.add(task_id);
      const prerequisites = [...task.prerequisites].map(run);
      visiting.delete(task_id);

      const promise = Promise.all(prerequisites).then((statuses) => {
        if (statuses.some(status => status === 'failed' || status === 'skipped')) {
          return finish(task, 'skipped');
        }
        if (statuses.some(status => status === 'cancelled')) {
          return finish(task, 'cancelled');
        }
        return limit(() => execute(task));
      });
      runs.set(task_id, promise);
      return promise;
    };

    await Promise.all(tasks.map(task => run(task.id)));

    const items = tasks.flatMap(task => results.get(task.id) || []);
    let status: ApplyResult['status'] = 'succeeded';
    if (items.some(item => item.status === 'failed' || item.status === 'skipped')) {
      status = 'failed';
    } else if (items.some(item => item.status === 'cancelled')) {
      status = 'cancelled';
    }
    return { status, items };
  }

  /**
   * Reads every recorded resource back from the provider. Missing resources are dropped from state and changed
   * attributes are written back, so the next plan shows what it takes to correct them.
   */
  async refresh(): Promise<RefreshResult> {
    const result: RefreshResult = { removed: [], drifted: [] };
    for (const { resource_id } of await this.state.list()) {
      await this.state.withLock(resource_id, async () => {
        const record = await this.state.get(resource_id);
        if (!record) {
          return;
        }
        const observed = await this.provider.read(record.resource_type, record.provider_assigned_id);
        if (!observed) {
          this.logger.debug(`${resource_id} (${record.provider_assigned_id}) no longer exists`);
          await this.state.delete(resource_id);
          result.removed.push(resource_id);
        } else if (!isDeepStrictEqual(observed.attributes, record.last_applied_attributes) || !isDeepStrictEqual(observed.outputs, record.outputs)) {
          this.logger.debug(`${resource_id} drifted from its last applied attributes`);
          await this.state.put({ ...record, last_applied_attributes: observed.attributes, outputs: observed.outputs });
          result.drifted.push(resource_id);
        }
      });
    }
    return result;
  }
}
