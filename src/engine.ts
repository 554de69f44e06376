import path from 'path';
import AppConfig from './app-config/config';
import { CapacityManager } from './autoscaling/capacity-manager';
import { LocalHealthSource, LocalMetricSource } from './autoscaling/local-sources';
import { LoadBalancerHealthSource, MetricSource } from './autoscaling/types';
import { Logger } from './common/logger';
import LocalPaths from './paths';
import { Reconciler } from './resource-manager/apply';
import { ItemExecutor } from './resource-manager/apply/executor';
import { ResourceProvider } from './resource-manager/provider';
import { LocalProvider } from './resource-manager/provider/local-provider';
import { StateStore } from './resource-manager/state';
import { FileStateStore } from './resource-manager/state/file-store';

export interface Engine {
  state: StateStore;
  provider: ResourceProvider;
  executor: ItemExecutor;
  capacity: CapacityManager;
  reconciler: Reconciler;
  metrics: MetricSource;
  health: LoadBalancerHealthSource;
}

export interface EngineOptions {
  config: AppConfig;
  state_dir: string;
  logger?: Logger;
  provider?: ResourceProvider;
  state?: StateStore;
  metrics?: MetricSource;
  health?: LoadBalancerHealthSource;
  now?: () => number;
}

/**
 * Wires the reconciler and the capacity manager around one executor, so declared resources and group members go
 * through the same apply path. Backends default to the local ones under the state directory.
 */
export const createEngine = (options: EngineOptions): Engine => {
  const { config, state_dir, logger, now } = options;
  const state = options.state || new FileStateStore(path.join(state_dir, LocalPaths.STATE_FILENAME));
  const provider = options.provider || LocalProvider.forStateDir(state_dir);
  const metrics = options.metrics || LocalMetricSource.forStateDir(state_dir);
  const health = options.health || LocalHealthSource.forStateDir(state_dir);

  const executor = new ItemExecutor(provider, state, {
    retry: {
      max_attempts: config.max_attempts,
      base_delay_ms: config.base_delay_ms,
      max_delay_ms: config.max_delay_ms,
    },
    ready_timeout_ms: config.ready_timeout_ms,
    poll_interval_ms: config.poll_interval_ms,
    logger,
    now,
  });
  const capacity = new CapacityManager(state, executor, { health, logger, now });
  const reconciler = new Reconciler(provider, state, executor, { logger, onApplied: capacity.onApplied });

  return { state, provider, executor, capacity, reconciler, metrics, health };
};
