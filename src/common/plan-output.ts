import chalk from 'chalk';
import { ApplyResult, ItemResult, ItemStatus } from '../resource-manager/apply';
import { AttributeChange, Plan, PlanItem, planHasChanges, summarizePlan } from '../resource-manager/plan';

const KNOWN_AFTER_APPLY = '(known after apply)';

const formatValue = (value: unknown): string => value === undefined ? 'null' : JSON.stringify(value);

const formatChange = (item: PlanItem, change: AttributeChange): string => {
  const after = change.known_after_apply ? KNOWN_AFTER_APPLY : formatValue(change.after);
  if (item.action === 'create') {
    return `      ${change.path}: ${after}`;
  }
  return `      ${change.path}: ${formatValue(change.before)} => ${after}`;
};

const formatItem = (item: PlanItem): string[] => {
  const label = `${item.resource_id} (${item.resource_type})`;
  const deposed = item.deposed_ids.length ? chalk.gray(` [deposed: ${item.deposed_ids.join(', ')}]`) : '';
  switch (item.action) {
    case 'create':
      return [chalk.green(`  + ${label}`), ...item.diff.map(change => formatChange(item, change))];
    case 'update':
      return [chalk.yellow(`  ~ ${label}`) + deposed, ...item.diff.map(change => formatChange(item, change))];
    case 'replace':
      return [
        chalk.magenta(`-/+ ${label}`) + chalk.gray(` forces replacement: ${item.replace_reasons.join(', ')}`) + deposed,
        ...item.diff.map(change => formatChange(item, change)),
      ];
    case 'destroy':
      return [chalk.red(`  - ${label}`) + deposed];
    default:
      return deposed ? [chalk.red(`  - ${label} deposed objects only`) + deposed] : [];
  }
};

export const renderPlan = (plan: Plan): string => {
  if (!planHasChanges(plan)) {
    return 'No changes. Infrastructure matches the declaration.';
  }
  const summary = summarizePlan(plan);
  const lines = plan.items.flatMap(formatItem);
  lines.push('', `Plan: ${summary.create} to create, ${summary.update} to update, ${summary.replace} to replace, ${summary.destroy} to destroy.`);
  return lines.join('\n');
};

const STATUS_COLORS: Record<ItemStatus, (text: string) => string> = {
  succeeded: chalk.green,
  unchanged: chalk.gray,
  failed: chalk.red,
  skipped: chalk.yellow,
  cancelled: chalk.yellow,
};

export const renderItemResult = (result: ItemResult): string => {
  const line = `${result.task_id}: ${result.action} ${result.status}`;
  return STATUS_COLORS[result.status](result.error ? `${line} (${result.error.message})` : line);
};

export const renderApplySummary = (result: ApplyResult): string => {
  const counts: Record<ItemStatus, number> = { succeeded: 0, unchanged: 0, failed: 0, skipped: 0, cancelled: 0 };
  for (const item of result.items) {
    counts[item.status] += 1;
  }
  const heading = result.status === 'succeeded' ? 'Apply complete' : `Apply ${result.status}`;
  return `${heading}: ${counts.succeeded} succeeded, ${counts.unchanged} unchanged, ${counts.failed} failed, ${counts.skipped} skipped, ${counts.cancelled} cancelled.`;
};
