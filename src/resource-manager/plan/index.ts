import { Resource } from '../resource';
import { ResourceType } from '../schema/resource-types';

export type PlanAction = 'create' | 'update' | 'replace' | 'destroy' | 'no-op';

export interface AttributeChange {
  path: string;
  before: unknown;
  after: unknown;
  /** `after` contains a reference to something this plan creates or replaces */
  known_after_apply: boolean;
}

export interface PlanItem {
  readonly resource_id: string;
  readonly resource_type: ResourceType;
  readonly action: PlanAction;
  /** Ordered by attribute path */
  readonly diff: readonly AttributeChange[];
  /** Declared dependencies (references and depends_on); empty for destroys */
  readonly depends_on: readonly string[];
  /** Dependencies recorded in state when the resource was last applied */
  readonly previous_depends_on: readonly string[];
  /** Immutable attributes that force a replacement */
  readonly replace_reasons: readonly string[];
  /** Replaced provider objects left behind by an earlier apply that still have to be destroyed */
  readonly deposed_ids: readonly string[];
  readonly owner?: string;
  readonly resource?: Resource;
}

export interface Plan {
  readonly items: readonly PlanItem[];
  readonly created_at: Date;
}

export const planHasChanges = (plan: Plan): boolean => {
  return plan.items.some(item => item.action !== 'no-op' || item.deposed_ids.length > 0);
};

export const summarizePlan = (plan: Plan): Record<Exclude<PlanAction, 'no-op'>, number> => {
  const summary = { create: 0, update: 0, replace: 0, destroy: 0 };
  for (const item of plan.items) {
    if (item.action !== 'no-op') {
      summary[item.action] += 1;
    }
  }
  return summary;
};
