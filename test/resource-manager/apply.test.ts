import { expect } from 'chai';
import { Reconciler } from '../../src/resource-manager/apply';
import { ExecutorOptions, ItemExecutor } from '../../src/resource-manager/apply/executor';
import { planHasChanges } from '../../src/resource-manager/plan';
import { Resource } from '../../src/resource-manager/resource';
import { ResourceType } from '../../src/resource-manager/schema/resource-types';
import { MemoryStateStore } from '../../src/resource-manager/state/memory-store';
import { ProviderError } from '../../src/resource-manager/utils/errors';
import { FakeProvider, NO_WAIT_RETRY, resource, stateRecord } from '../utils/mocks';

const EXECUTOR_OPTIONS: ExecutorOptions = {
  retry: NO_WAIT_RETRY,
  ready_timeout_ms: 1000,
  poll_interval_ms: 1,
  now: () => 0,
};

describe('reconciler', () => {
  let provider: FakeProvider;
  let state: MemoryStateStore;
  let reconciler: Reconciler;

  const setup = (options: ExecutorOptions = EXECUTOR_OPTIONS) => {
    reconciler = new Reconciler(provider, state, new ItemExecutor(provider, state, options));
  };

  beforeEach(() => {
    provider = new FakeProvider();
    state = new MemoryStateStore();
    setup();
  });

  const sg = resource('sg', ResourceType.SECURITY_GROUP, { name: 'web' });
  const rule = resource('rule', ResourceType.SECURITY_GROUP_RULE, { security_group_id: '${{ resources.sg.id }}', from_port: 80 });

  it('creates dependencies first and converges', async () => {
    const result = await reconciler.apply(await reconciler.plan([sg, rule]), { parallelism: 1 });

    expect(result.status).to.equal('succeeded');
    expect(result.items.map(item => [item.task_id, item.status])).to.deep.equal([['sg', 'succeeded'], ['rule', 'succeeded']]);
    expect(provider.events).to.deep.equal(['create:sg', 'ready:sg-1', 'create:rule', 'ready:rule-2']);

    const record = await state.get('rule');
    expect(record?.last_applied_attributes).to.deep.equal({ security_group_id: 'sg-1', from_port: 80 });
    expect(record?.depends_on).to.deep.equal(['sg']);

    expect(planHasChanges(await reconciler.plan([sg, rule]))).to.equal(false);
  });

  it('skips dependents of a failed item and still applies independent ones', async () => {
    const image = resource('image', ResourceType.IMAGE, { name_filter: 'web-*' });
    const ingress = resource('ingress', ResourceType.SECURITY_GROUP_RULE, { source_security_group_id: '${{ resources.image.id }}' });
    provider.failOn('create', 'image', new ProviderError('invalid name filter', 'InvalidParameterValue'));

    const result = await reconciler.apply(await reconciler.plan([image, sg, ingress]));

    expect(result.status).to.equal('failed');
    expect(result.items.map(item => [item.task_id, item.status])).to.deep.equal([
      ['image', 'failed'],
      ['sg', 'succeeded'],
      ['ingress', 'skipped'],
    ]);
    expect(result.items[0].error?.message).to.equal('invalid name filter');
    expect((await state.list()).map(record => record.resource_id)).to.deep.equal(['sg']);
  });

  it('retries transient provider errors', async () => {
    provider.failOn('create', 'sg', new ProviderError('rate exceeded', 'Throttling'));

    const result = await reconciler.apply(await reconciler.plan([sg]));

    expect(result.status).to.equal('succeeded');
    expect(provider.events).to.deep.equal(['create:sg', 'create:sg', 'ready:sg-1']);
  });

  it('resumes waiting on a created object after a readiness timeout', async () => {
    setup({ ...EXECUTOR_OPTIONS, ready_timeout_ms: 0 });
    provider.delayReady('sg', 2);

    const result = await reconciler.apply(await reconciler.plan([sg]));

    expect(result.status).to.equal('succeeded');
    expect(provider.idsOf('sg')).to.deep.equal(['sg-1']);
    expect(provider.events).to.deep.equal(['create:sg', 'ready:sg-1']);
  });

  describe('replacement', () => {
    const template_attributes = { image_id: 'ami-1', instance_type: 't3.micro' };
    const group_attributes = { min_size: 1, max_size: 2, launch_template_id: 'lt-0' };
    const template = resource('lt', ResourceType.LAUNCH_TEMPLATE, { image_id: 'ami-1', instance_type: 't3.large' });
    const group = resource('asg', ResourceType.AUTOSCALING_GROUP, { min_size: 1, max_size: 2, launch_template_id: '${{ resources.lt.id }}' });

    beforeEach(() => {
      provider.objects.set('lt-0', { type: ResourceType.LAUNCH_TEMPLATE, resource_id: 'lt', attributes: template_attributes, outputs: {} });
      provider.objects.set('asg-0', { type: ResourceType.AUTOSCALING_GROUP, resource_id: 'asg', attributes: group_attributes, outputs: {} });
      state = new MemoryStateStore([
        stateRecord('lt', ResourceType.LAUNCH_TEMPLATE, { last_applied_attributes: template_attributes }),
        stateRecord('asg', ResourceType.AUTOSCALING_GROUP, { last_applied_attributes: group_attributes, depends_on: ['lt'] }),
      ]);
      setup();
    });

    it('creates the replacement and updates dependents before destroying the old object', async () => {
      const result = await reconciler.apply(await reconciler.plan([template, group]), { parallelism: 1 });

      expect(result.status).to.equal('succeeded');
      expect(result.items.map(item => [item.task_id, item.action])).to.deep.equal([
        ['lt', 'replace'],
        ['lt:deposed', 'destroy-deposed'],
        ['asg', 'update'],
      ]);
      expect(provider.events).to.deep.equal(['create:lt', 'ready:lt-1', 'update:asg-0', 'ready:asg-0', 'delete:lt-0']);
      expect((await state.get('lt'))?.deposed_ids).to.deep.equal([]);
      expect((await state.get('asg'))?.last_applied_attributes.launch_template_id).to.equal('lt-1');
    });

    it('keeps the old object when a dependent fails', async () => {
      provider.failOn('update', 'asg', new ProviderError('launch template not supported', 'ValidationError'));

      const result = await reconciler.apply(await reconciler.plan([template, group]));

      expect(result.status).to.equal('failed');
      expect(result.items.map(item => [item.task_id, item.status])).to.deep.equal([
        ['lt', 'succeeded'],
        ['lt:deposed', 'skipped'],
        ['asg', 'failed'],
      ]);
      expect((await state.get('lt'))?.deposed_ids).to.deep.equal(['lt-0']);
      expect(provider.objects.has('lt-0')).to.equal(true);

      // The next plan still carries the deposed object
      const plan = await reconciler.plan([template, group]);
      expect(plan.items.map(item => [item.resource_id, item.action, item.deposed_ids])).to.deep.equal([
        ['lt', 'no-op', ['lt-0']],
        ['asg', 'update', []],
      ]);
    });
  });

  it('cancels work that has not started once the signal aborts', async () => {
    const image = resource('image', ResourceType.IMAGE, { name_filter: 'web-*' });
    const controller = new AbortController();

    const result = await reconciler.apply(await reconciler.plan([image, sg, rule]), {
      parallelism: 1,
      signal: controller.signal,
      onItemComplete: () => controller.abort(),
    });

    expect(result.status).to.equal('cancelled');
    expect(result.items.map(item => [item.task_id, item.status])).to.deep.equal([
      ['image', 'succeeded'],
      ['sg', 'cancelled'],
      ['rule', 'cancelled'],
    ]);
    expect(provider.events).to.deep.equal(['create:image', 'ready:image-1']);
  });

  it('destroys dependents before their dependencies', async () => {
    await reconciler.apply(await reconciler.plan([sg, rule]));
    provider.events = [];

    const result = await reconciler.apply(await reconciler.plan([]), { parallelism: 4 });

    expect(result.status).to.equal('succeeded');
    expect(provider.events).to.deep.equal(['delete:rule-2', 'delete:sg-1']);
    expect(await state.list()).to.deep.equal([]);
  });

  it('keeps a replaced object until removed dependents are gone', async () => {
    provider.objects.set('sg-0', { type: ResourceType.SECURITY_GROUP, resource_id: 'sg', attributes: { name: 'web' }, outputs: {} });
    provider.objects.set('rule-0', { type: ResourceType.SECURITY_GROUP_RULE, resource_id: 'rule', attributes: { security_group_id: 'sg-0' }, outputs: {} });
    state = new MemoryStateStore([
      stateRecord('sg', ResourceType.SECURITY_GROUP, { last_applied_attributes: { name: 'web' } }),
      stateRecord('rule', ResourceType.SECURITY_GROUP_RULE, { last_applied_attributes: { security_group_id: 'sg-0' }, depends_on: ['sg'] }),
    ]);
    setup();
    provider.slowDown('delete', 'rule', 20);

    const result = await reconciler.apply(await reconciler.plan([resource('sg', ResourceType.SECURITY_GROUP, { name: 'api' })]), { parallelism: 4 });

    expect(result.status).to.equal('succeeded');
    expect(result.items.map(item => [item.task_id, item.action])).to.deep.equal([
      ['sg', 'replace'],
      ['sg:deposed', 'destroy-deposed'],
      ['rule', 'destroy'],
    ]);
    expect(provider.events.slice(-2)).to.deep.equal(['deleted:rule-0', 'delete:sg-0']);
    expect([...provider.objects.keys()]).to.deep.equal(['sg-1']);
  });

  describe('worker pool', () => {
    it('never runs more items at once than the parallelism allows', async () => {
      const groups = ['a', 'b', 'c', 'd', 'e', 'f'].map(name => resource(`sg_${name}`, ResourceType.SECURITY_GROUP, { name }));
      for (const group of groups) {
        provider.slowDown('create', group.id, 10);
      }

      const result = await reconciler.apply(await reconciler.plan(groups), { parallelism: 2 });

      expect(result.status).to.equal('succeeded');
      expect(provider.max_in_flight).to.equal(2);
      expect(provider.in_flight).to.equal(0);
    });

    it('applies independent subtrees at the same time', async () => {
      const subtrees = ['a', 'b'].flatMap(name => [
        resource(`sg_${name}`, ResourceType.SECURITY_GROUP, { name }),
        resource(`rule_${name}`, ResourceType.SECURITY_GROUP_RULE, { security_group_id: `\${{ resources.sg_${name}.id }}` }),
      ]);
      for (const item of subtrees) {
        provider.slowDown('create', item.id, 10);
      }

      const result = await reconciler.apply(await reconciler.plan(subtrees), { parallelism: 4 });

      expect(result.status).to.equal('succeeded');
      expect(provider.max_in_flight).to.equal(2);
      const events = provider.events;
      expect(events.indexOf('create:sg_b')).to.be.lessThan(events.indexOf('created:sg_a'));
      expect(events.indexOf('create:rule_a')).to.be.greaterThan(events.indexOf('created:sg_a'));
      expect(events.indexOf('create:rule_b')).to.be.greaterThan(events.indexOf('created:sg_b'));
    });
  });

  it('treats an item already applied by an earlier run as unchanged', async () => {
    const executor = new ItemExecutor(provider, state, EXECUTOR_OPTIONS);
    const [item] = (await reconciler.plan([sg])).items;

    expect(await executor.execute(item)).to.equal('succeeded');
    expect(await executor.execute(item)).to.equal('unchanged');
    expect(provider.events).to.deep.equal(['create:sg', 'ready:sg-1']);
  });

  it('fails an item when the applied hook throws', async () => {
    reconciler = new Reconciler(provider, state, new ItemExecutor(provider, state, EXECUTOR_OPTIONS), {
      onApplied: async () => {
        throw new Error('hook failed');
      },
    });

    const result = await reconciler.apply(await reconciler.plan([sg]));

    expect(result.status).to.equal('failed');
    expect(result.items[0].error?.message).to.equal('hook failed');
  });

  it('refreshes state from the provider', async () => {
    await reconciler.apply(await reconciler.plan([sg, rule]));
    provider.objects.delete('rule-2');
    provider.objects.set('sg-1', { type: ResourceType.SECURITY_GROUP, resource_id: 'sg', attributes: { name: 'renamed' }, outputs: { arn: 'arn:fake:sg-1' } });

    expect(await reconciler.refresh()).to.deep.equal({ removed: ['rule'], drifted: ['sg'] });

    const plan = await reconciler.plan([sg, rule]);
    expect(plan.items.map(item => [item.resource_id, item.action])).to.deep.equal([['sg', 'replace'], ['rule', 'create']]);
  });
});

describe('item executor', () => {
  it('keeps controller-managed attributes from state', async () => {
    const provider = new FakeProvider();
    provider.objects.set('asg-0', {
      type: ResourceType.AUTOSCALING_GROUP,
      resource_id: 'asg',
      attributes: { min_size: 1, max_size: 4, desired_capacity: 3 },
      outputs: {},
    });
    const state = new MemoryStateStore([
      stateRecord('asg', ResourceType.AUTOSCALING_GROUP, { last_applied_attributes: { min_size: 1, max_size: 4, desired_capacity: 3 } }),
    ]);
    const executor = new ItemExecutor(provider, state, EXECUTOR_OPTIONS);
    const group: Resource = resource('asg', ResourceType.AUTOSCALING_GROUP, { min_size: 1, max_size: 6, desired_capacity: 1 });
    const reconciler = new Reconciler(provider, state, executor);

    const [item] = (await reconciler.plan([group])).items;
    expect(item.action).to.equal('update');
    expect(await executor.execute(item)).to.equal('succeeded');

    expect((await state.get('asg'))?.last_applied_attributes).to.deep.equal({ min_size: 1, max_size: 6, desired_capacity: 3 });
  });

  it('patches attributes of an applied resource', async () => {
    const provider = new FakeProvider();
    provider.objects.set('asg-0', { type: ResourceType.AUTOSCALING_GROUP, resource_id: 'asg', attributes: { min_size: 1 }, outputs: {} });
    const state = new MemoryStateStore([stateRecord('asg', ResourceType.AUTOSCALING_GROUP, { last_applied_attributes: { min_size: 1 } })]);
    const executor = new ItemExecutor(provider, state, { ...EXECUTOR_OPTIONS, now: () => Date.UTC(2024, 5, 1) });

    const record = await executor.patchAttributes('asg', { desired_capacity: 2 });

    expect(record.last_applied_attributes).to.deep.equal({ min_size: 1, desired_capacity: 2 });
    expect(record.last_applied_at).to.equal('2024-06-01T00:00:00.000Z');
    expect(provider.objects.get('asg-0')?.attributes).to.deep.equal({ min_size: 1, desired_capacity: 2 });
  });
});
