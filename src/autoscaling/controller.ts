import { createDebugLogger, Logger } from '../common/logger';
import { MetricUnavailableError } from '../resource-manager/utils/errors';
import { CapacityManager } from './capacity-manager';
import { averageMetric, computeDesiredCapacity, eligibleMembers, healthByMember } from './policy';
import { ControllerPhase, LoadBalancerHealthSource, MetricSource, ScalableGroup, TargetTrackingPolicy } from './types';

export type EvaluationDecision = 'scale-out' | 'scale-in' | 'none' | 'cooldown' | 'no-metric';

export interface EvaluationResult {
  group_id: string;
  decision: EvaluationDecision;
  current_capacity: number;
  desired_capacity: number;
  observed?: number;
}

export interface ControllerOptions {
  capacity: CapacityManager;
  metrics: MetricSource;
  health?: LoadBalancerHealthSource;
  logger?: Logger;
  now?: () => number;
}

/**
 * Target-tracking loop for one group. Ticks are chained with setTimeout so a slow evaluation delays the next one
 * instead of overlapping it.
 */
export class AutoscalingController {
  phase = ControllerPhase.IDLE;
  readonly policy: TargetTrackingPolicy;

  protected logger: Logger;
  protected now: () => number;

  private running = false;
  private timer?: NodeJS.Timeout;
  private current_tick?: Promise<void>;

  constructor(policy: TargetTrackingPolicy, protected options: ControllerOptions) {
    this.policy = policy;
    this.logger = options.logger || createDebugLogger(`controller:${policy.group_id}`);
    this.now = options.now || Date.now;
  }

  get is_running(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.schedule(0);
  }

  /**
   * Stops scheduling and waits for an evaluation in flight to finish
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.current_tick;
  }

  async evaluateOnce(): Promise<EvaluationResult> {
    this.phase = ControllerPhase.EVALUATING;
    try {
      const result = await this.evaluate();
      this.phase = result.decision === 'scale-out' || result.decision === 'scale-in' || result.decision === 'cooldown' ?
        ControllerPhase.COOLING :
        ControllerPhase.IDLE;
      return result;
    } catch (err) {
      this.phase = ControllerPhase.IDLE;
      throw err;
    }
  }

  protected async evaluate(): Promise<EvaluationResult> {
    const { group_id } = this.policy;
    const group = await this.options.capacity.describe(group_id);
    const signals = await this.options.health?.getHealth(group_id) || [];
    const now = this.now();
    const current_capacity = group.desired_capacity;
    const noMetric = (reason: string): EvaluationResult => {
      this.logger.warn(`${group_id}: ${reason}; keeping desired capacity at ${current_capacity}`);
      return { group_id, decision: 'no-metric', current_capacity, desired_capacity: current_capacity };
    };

    const eligible = eligibleMembers(group, healthByMember(signals), now);
    if (eligible.length === 0) {
      return noMetric('no healthy members past their grace period');
    }

    let observed: number | undefined;
    try {
      const datapoints = await this.options.metrics.getDatapoints({
        group_id,
        metric: this.policy.metric,
        member_ids: eligible.map(member => member.id),
      });
      observed = averageMetric(datapoints, eligible.map(member => member.id));
    } catch (err) {
      if (err instanceof MetricUnavailableError) {
        return noMetric(err.message);
      }
      throw err;
    }
    if (observed === undefined) {
      return noMetric(`no ${this.policy.metric} datapoints`);
    }

    const desired_capacity = computeDesiredCapacity(current_capacity, observed, this.policy.target_value, group.min_size, group.max_size);
    this.logger.debug(`${group_id}: ${this.policy.metric} ${observed} (target ${this.policy.target_value}), capacity ${current_capacity} -> ${desired_capacity}`);
    if (desired_capacity === current_capacity) {
      // An earlier change may have failed part-way through its launches or terminations
      if (group.members.length !== current_capacity) {
        this.logger.log(`${group_id}: ${group.members.length} members for desired capacity ${current_capacity}, converging`);
        this.phase = ControllerPhase.SCALING;
        await this.options.capacity.sync(group_id);
      }
      return { group_id, decision: 'none', current_capacity, desired_capacity, observed };
    }

    const scale_out = desired_capacity > current_capacity;
    if (this.inCooldown(group, scale_out, now)) {
      this.logger.debug(`${group_id}: ${scale_out ? 'scale-out' : 'scale-in'} to ${desired_capacity} blocked by cooldown`);
      return { group_id, decision: 'cooldown', current_capacity, desired_capacity: current_capacity, observed };
    }

    this.phase = ControllerPhase.SCALING;
    await this.options.capacity.setDesiredCapacity(group_id, desired_capacity, {
      reason: `${this.policy.id}: ${this.policy.metric} ${observed} vs target ${this.policy.target_value}`,
      health: signals,
    });
    await this.options.capacity.recordScalingActivity(group_id, scale_out, now);
    return { group_id, decision: scale_out ? 'scale-out' : 'scale-in', current_capacity, desired_capacity, observed };
  }

  /**
   * Cooldowns run from the times recorded on the group, so they also hold between separate `--once` runs.
   */
  protected inCooldown(group: ScalableGroup, scale_out: boolean, now: number): boolean {
    if (scale_out) {
      return group.last_scale_out_at !== undefined && now - group.last_scale_out_at < this.policy.scale_out_cooldown * 1000;
    }
    return group.last_change_at !== undefined && now - group.last_change_at < this.policy.scale_in_cooldown * 1000;
  }

  private schedule(delay_ms: number): void {
    this.timer = setTimeout(() => {
      this.current_tick = this.tick();
    }, delay_ms);
  }

  private async tick(): Promise<void> {
    try {
      await this.evaluateOnce();
    } catch (err) {
      this.logger.warn(`${this.policy.group_id}: evaluation failed: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      if (this.running) {
        this.schedule(this.policy.evaluation_interval * 1000);
      }
    }
  }
}
