import { HealthSignal, MetricDatapoint, ScalableGroup, ScalableGroupMember } from './types';

// Keeps float noise such as 2 * 0.35 / 0.1 = 7.000000000000001 from rounding up
const EPSILON = 1e-9;

export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

/**
 * Target tracking: the capacity that would bring the per-member average back to the target, assuming load spreads
 * evenly across members.
 */
export const computeDesiredCapacity = (current_capacity: number, observed: number, target: number, min_size: number, max_size: number): number => {
  const raw = Math.ceil(current_capacity * observed / target - EPSILON);
  return clamp(raw, min_size, max_size);
};

/**
 * Members without any signal count as healthy. A member is unhealthy as soon as one source says so.
 */
export const healthByMember = (signals: HealthSignal[]): Map<string, boolean> => {
  const health = new Map<string, boolean>();
  for (const signal of signals) {
    health.set(signal.member_id, (health.get(signal.member_id) ?? true) && signal.healthy);
  }
  return health;
};

export const isInGracePeriod = (member: ScalableGroupMember, grace_period_seconds: number, now: number): boolean => {
  return now - member.launched_at.getTime() < grace_period_seconds * 1000;
};

export const eligibleMembers = (group: ScalableGroup, health: Map<string, boolean>, now: number): ScalableGroupMember[] => {
  return group.members.filter(member =>
    !isInGracePeriod(member, group.health_check_grace_period, now) && health.get(member.id) !== false);
};

export const averageMetric = (datapoints: MetricDatapoint[], member_ids: Iterable<string>): number | undefined => {
  const ids = new Set(member_ids);
  const values = datapoints.filter(datapoint => ids.has(datapoint.member_id)).map(datapoint => datapoint.value);
  if (values.length === 0) {
    return undefined;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};
