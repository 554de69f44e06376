import { expect } from 'chai';
import sinon from 'sinon';
import { CapacityManager } from '../../src/autoscaling/capacity-manager';
import { AutoscalingController } from '../../src/autoscaling/controller';
import { ControllerPhase, MetricType, TargetTrackingPolicy } from '../../src/autoscaling/types';
import { ItemExecutor } from '../../src/resource-manager/apply/executor';
import { ResourceType } from '../../src/resource-manager/schema/resource-types';
import { MemoryStateStore } from '../../src/resource-manager/state/memory-store';
import { MetricUnavailableError, ProviderError } from '../../src/resource-manager/utils/errors';
import { FakeHealthSource, FakeMetricSource, FakeProvider, NO_WAIT_RETRY, stateRecord, WEB_TIER_NOW, webTierState } from '../utils/mocks';

const POLICY: TargetTrackingPolicy = {
  id: 'web_cpu',
  group_id: 'asg',
  metric: MetricType.CPU_UTILIZATION,
  target_value: 10,
  scale_out_cooldown: 60,
  scale_in_cooldown: 300,
  evaluation_interval: 60,
};

describe('AutoscalingController', () => {
  let provider: FakeProvider;
  let state: MemoryStateStore;
  let metrics: FakeMetricSource;
  let health: FakeHealthSource;
  let logger: { log: sinon.SinonSpy; warn: sinon.SinonSpy; debug: sinon.SinonSpy };
  let now: number;
  let capacity: CapacityManager;

  const setup = (group_attributes: Record<string, unknown> = {}, member_count = 2) => {
    provider = new FakeProvider();
    state = new MemoryStateStore(webTierState(provider, group_attributes, member_count));
    metrics = new FakeMetricSource();
    health = new FakeHealthSource();
    logger = { log: sinon.fake(), warn: sinon.fake(), debug: sinon.fake() };
    now = WEB_TIER_NOW;
    const clock = () => now;
    const executor = new ItemExecutor(provider, state, { retry: NO_WAIT_RETRY, ready_timeout_ms: 1000, poll_interval_ms: 1, now: clock });
    capacity = new CapacityManager(state, executor, { health, now: clock });
  };

  const controller = (policy: TargetTrackingPolicy = POLICY) => {
    return new AutoscalingController(policy, { capacity, metrics, health, logger, now: () => now });
  };

  it('scales out to bring the average back to the target', async () => {
    setup({ desired_capacity: 2 });
    metrics.values.set('m1', 40);
    metrics.values.set('m2', 40);
    const autoscaler = controller();

    const result = await autoscaler.evaluateOnce();

    expect(result).to.deep.equal({ group_id: 'asg', decision: 'scale-out', current_capacity: 2, desired_capacity: 8, observed: 40 });
    expect(autoscaler.phase).to.equal(ControllerPhase.COOLING);
    expect((await capacity.describe('asg')).members.length).to.equal(8);
    expect(metrics.queries[0]).to.deep.equal({ group_id: 'asg', metric: MetricType.CPU_UTILIZATION, member_ids: ['m1', 'm2'] });
  });

  it('holds capacity during the scale-out cooldown', async () => {
    setup({ desired_capacity: 2 });
    metrics.values.set('m1', 40);
    metrics.values.set('m2', 40);
    const autoscaler = controller();
    await autoscaler.evaluateOnce();

    now += 30 * 1000;
    metrics.values.set('m1', 90);
    metrics.values.set('m2', 90);
    const result = await autoscaler.evaluateOnce();

    expect(result).to.deep.equal({ group_id: 'asg', decision: 'cooldown', current_capacity: 8, desired_capacity: 8, observed: 90 });
    expect((await capacity.describe('asg')).desired_capacity).to.equal(8);

    now += 31 * 1000;
    expect((await autoscaler.evaluateOnce()).decision).to.equal('scale-out');
  });

  it('waits out the scale-in cooldown after any change', async () => {
    setup({ min_size: 1, desired_capacity: 4 }, 4);
    for (const id of ['m1', 'm2', 'm3', 'm4']) metrics.values.set(id, 5);
    const autoscaler = controller({ ...POLICY, target_value: 10 });

    const first = await autoscaler.evaluateOnce();
    expect(first).to.deep.equal({ group_id: 'asg', decision: 'scale-in', current_capacity: 4, desired_capacity: 2, observed: 5 });
    expect((await capacity.describe('asg')).members.map(member => member.id)).to.deep.equal(['m3', 'm4']);

    now += 120 * 1000;
    metrics.values.set('m3', 2);
    metrics.values.set('m4', 2);
    expect((await autoscaler.evaluateOnce()).decision).to.equal('cooldown');

    now += 181 * 1000;
    const third = await autoscaler.evaluateOnce();
    expect(third.decision).to.equal('scale-in');
    expect(third.desired_capacity).to.equal(1);
  });

  it('keeps cooldowns on the group between controller runs', async () => {
    setup({ desired_capacity: 2 });
    metrics.values.set('m1', 40);
    metrics.values.set('m2', 40);
    expect((await controller().evaluateOnce()).decision).to.equal('scale-out');
    expect((await state.get('asg'))?.scaling_activity).to.deep.equal({
      last_change_at: '2024-01-01T01:00:00.000Z',
      last_scale_out_at: '2024-01-01T01:00:00.000Z',
    });

    now += 60 * 1000;
    metrics.values.set('m1', 5);
    metrics.values.set('m2', 5);
    expect(await controller().evaluateOnce()).to.deep.equal({ group_id: 'asg', decision: 'cooldown', current_capacity: 8, desired_capacity: 8, observed: 5 });
    expect((await capacity.describe('asg')).members.length).to.equal(8);

    now += 241 * 1000;
    expect(await controller().evaluateOnce()).to.deep.equal({ group_id: 'asg', decision: 'scale-in', current_capacity: 8, desired_capacity: 4, observed: 5 });
    expect((await state.get('asg'))?.scaling_activity).to.deep.equal({
      last_change_at: '2024-01-01T01:05:01.000Z',
      last_scale_out_at: '2024-01-01T01:00:00.000Z',
    });
  });

  it('makes up members a failed launch left missing', async () => {
    setup({ desired_capacity: 2 });
    const create = sinon.stub(provider, 'create').callThrough();
    create.onFirstCall().rejects(new ProviderError('insufficient capacity', 'InsufficientInstanceCapacity'));
    metrics.values.set('m1', 40);
    metrics.values.set('m2', 40);
    const autoscaler = controller();

    const err = await autoscaler.evaluateOnce().catch((err: unknown) => err);
    expect(err).to.have.property('message', 'insufficient capacity');
    const group = await capacity.describe('asg');
    expect([group.desired_capacity, group.members.length]).to.deep.equal([8, 7]);

    now += 30 * 1000;
    metrics.values.set('m1', 10);
    metrics.values.set('m2', 10);
    const result = await autoscaler.evaluateOnce();

    expect(result).to.deep.equal({ group_id: 'asg', decision: 'none', current_capacity: 8, desired_capacity: 8, observed: 10 });
    expect((await capacity.describe('asg')).members.length).to.equal(8);
    expect(logger.log.calledWith('asg: 7 members for desired capacity 8, converging')).to.equal(true);
    expect(autoscaler.phase).to.equal(ControllerPhase.IDLE);
  });

  it('leaves capacity alone when the metric is on target', async () => {
    setup({ desired_capacity: 2 });
    metrics.values.set('m1', 10);
    metrics.values.set('m2', 10);
    const autoscaler = controller();

    expect((await autoscaler.evaluateOnce()).decision).to.equal('none');
    expect(autoscaler.phase).to.equal(ControllerPhase.IDLE);
  });

  it('logs and holds capacity when the metric is unavailable', async () => {
    setup({ desired_capacity: 2 });
    metrics.error = new MetricUnavailableError('asg', MetricType.CPU_UTILIZATION, 'backend offline');
    const autoscaler = controller();

    const result = await autoscaler.evaluateOnce();

    expect(result).to.deep.equal({ group_id: 'asg', decision: 'no-metric', current_capacity: 2, desired_capacity: 2 });
    expect(logger.warn.calledOnceWith('asg: Metric cpu_utilization unavailable for group asg: backend offline; keeping desired capacity at 2')).to.equal(true);
    expect(autoscaler.phase).to.equal(ControllerPhase.IDLE);
  });

  it('logs and holds capacity when no datapoints come back', async () => {
    setup({ desired_capacity: 2 });
    const autoscaler = controller();

    expect((await autoscaler.evaluateOnce()).decision).to.equal('no-metric');
    expect(logger.warn.calledOnceWith('asg: no cpu_utilization datapoints; keeping desired capacity at 2')).to.equal(true);
  });

  it('ignores members in their grace period and unhealthy members', async () => {
    setup({ desired_capacity: 3 }, 2);
    await state.put(stateRecord('m3', ResourceType.INSTANCE, {
      owner: 'asg',
      last_applied_attributes: { group_id: 'asg-0' },
      last_applied_at: new Date(WEB_TIER_NOW - 60 * 1000).toISOString(),
    }));
    health.signals = [{ member_id: 'm2', healthy: false, source: 'load-balancer' }];
    metrics.values.set('m1', 10);
    metrics.values.set('m2', 100);
    metrics.values.set('m3', 100);
    const autoscaler = controller();

    const result = await autoscaler.evaluateOnce();

    expect(metrics.queries[0].member_ids).to.deep.equal(['m1']);
    expect(result.observed).to.equal(10);
    expect(result.decision).to.equal('none');
  });

  it('does not query metrics when no member is eligible', async () => {
    setup({ desired_capacity: 2 });
    health.signals = [
      { member_id: 'm1', healthy: false, source: 'load-balancer' },
      { member_id: 'm2', healthy: false, source: 'instance-probe' },
    ];
    const autoscaler = controller();

    expect((await autoscaler.evaluateOnce()).decision).to.equal('no-metric');
    expect(metrics.queries).to.deep.equal([]);
  });

  it('returns to idle when an evaluation fails', async () => {
    setup();
    const autoscaler = controller({ ...POLICY, group_id: 'missing' });

    const err = await autoscaler.evaluateOnce().catch((err: unknown) => err);

    expect(err).to.have.property('message', 'missing is not an applied autoscaling_group');
    expect(autoscaler.phase).to.equal(ControllerPhase.IDLE);
  });

  it('evaluates on a timer until stopped', async () => {
    setup({ desired_capacity: 2 });
    metrics.values.set('m1', 10);
    metrics.values.set('m2', 10);
    const clock = sinon.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const autoscaler = controller();

    autoscaler.start();
    expect(autoscaler.is_running).to.equal(true);
    await clock.tickAsync(0);
    await clock.tickAsync(60 * 1000);
    await autoscaler.stop();

    expect(autoscaler.is_running).to.equal(false);
    expect(metrics.queries.length).to.equal(2);
    await clock.tickAsync(120 * 1000);
    expect(metrics.queries.length).to.equal(2);
  });
});
