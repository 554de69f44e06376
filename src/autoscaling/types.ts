export enum MetricType {
  CPU_UTILIZATION = 'cpu_utilization',
  MEMORY_UTILIZATION = 'memory_utilization',
  REQUEST_COUNT_PER_TARGET = 'request_count_per_target',
}

export interface TargetTrackingPolicy {
  id: string;
  group_id: string;
  metric: MetricType;
  target_value: number;
  /** Seconds */
  scale_out_cooldown: number;
  /** Seconds */
  scale_in_cooldown: number;
  /** Seconds */
  evaluation_interval: number;
}

export interface ScalableGroupMember {
  id: string;
  launched_at: Date;
}

export interface ScalableGroup {
  id: string;
  desired_capacity: number;
  min_size: number;
  max_size: number;
  /** Oldest first */
  members: ScalableGroupMember[];
  /** Seconds */
  health_check_grace_period: number;
  /** Epoch ms */
  last_scale_out_at?: number;
  /** Epoch ms, scale-out or scale-in */
  last_change_at?: number;
}

export type HealthSignalSource = 'load-balancer' | 'instance-probe';

export interface HealthSignal {
  member_id: string;
  healthy: boolean;
  source: HealthSignalSource;
}

export interface MetricDatapoint {
  member_id: string;
  value: number;
}

export interface MetricQuery {
  group_id: string;
  metric: MetricType;
  member_ids: string[];
}

export interface MetricSource {
  /**
   * Per-member datapoints for the current evaluation interval.
   * Throws MetricUnavailableError when the backend can't answer.
   */
  getDatapoints(query: MetricQuery): Promise<MetricDatapoint[]>;
}

export interface LoadBalancerHealthSource {
  getHealth(group_id: string): Promise<HealthSignal[]>;
}

export enum ControllerPhase {
  IDLE = 'Idle',
  EVALUATING = 'Evaluating',
  SCALING = 'Scaling',
  COOLING = 'Cooling',
}

export const DEFAULT_SCALE_OUT_COOLDOWN = 60;
export const DEFAULT_SCALE_IN_COOLDOWN = 300;
export const DEFAULT_EVALUATION_INTERVAL = 60;
export const DEFAULT_HEALTH_CHECK_GRACE_PERIOD = 300;
