import { ScalableGroupMember } from './types';

/**
 * Picks `count` members to terminate on scale-in: unhealthy members first, then the oldest. `members` is expected
 * oldest first.
 */
export const selectMembersForRemoval = (members: ScalableGroupMember[], count: number, health: Map<string, boolean>): ScalableGroupMember[] => {
  const unhealthy = members.filter(member => health.get(member.id) === false);
  const healthy = members.filter(member => health.get(member.id) !== false);
  return [...unhealthy, ...healthy].slice(0, Math.max(0, count));
};
