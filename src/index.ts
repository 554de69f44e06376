export { run } from '@oclif/core';
export * from './autoscaling/capacity-manager';
export * from './autoscaling/controller';
export * from './autoscaling/local-sources';
export * from './autoscaling/policy';
export * from './autoscaling/selection';
export * from './autoscaling/types';
export * from './common/exit-codes';
export * from './common/logger';
export * from './engine';
export * from './resource-manager/apply';
export * from './resource-manager/apply/executor';
export * from './resource-manager/apply/retry';
export * from './resource-manager/graph';
export * from './resource-manager/graph/builder';
export * from './resource-manager/plan';
export * from './resource-manager/plan/planner';
export * from './resource-manager/plan/resolve';
export * from './resource-manager/provider';
export * from './resource-manager/provider/local-provider';
export * from './resource-manager/resource';
export * from './resource-manager/schema/resource-types';
export * from './resource-manager/spec/builder';
export * from './resource-manager/state';
export * from './resource-manager/state/file-store';
export * from './resource-manager/state/memory-store';
export * from './resource-manager/utils/dictionary';
export * from './resource-manager/utils/errors';
export * from './resource-manager/utils/interpolation';
export * from './resource-manager/utils/keyed-mutex';
export * from './resource-manager/utils/refs';
