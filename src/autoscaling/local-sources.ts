import fs from 'fs-extra';
import path from 'path';
import { Dictionary } from '../resource-manager/utils/dictionary';
import { MetricUnavailableError } from '../resource-manager/utils/errors';
import { HealthSignal, LoadBalancerHealthSource, MetricDatapoint, MetricQuery, MetricSource } from './types';

export const METRICS_FILENAME = 'metrics.json';
export const HEALTH_FILENAME = 'health.json';

const isDictionary = (value: unknown): value is Dictionary<unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * Reads `{ "<group>": { "<metric>": { "<member>": value } } }`. The file is read on every query so it can be edited
 * while the controller runs.
 */
export class LocalMetricSource implements MetricSource {
  constructor(readonly file_path: string) { }

  static forStateDir(state_dir: string): LocalMetricSource {
    return new LocalMetricSource(path.join(state_dir, METRICS_FILENAME));
  }

  async getDatapoints(query: MetricQuery): Promise<MetricDatapoint[]> {
    if (!(await fs.pathExists(this.file_path))) {
      throw new MetricUnavailableError(query.group_id, query.metric, `${this.file_path} does not exist`);
    }

    let contents: unknown;
    try {
      contents = await fs.readJSON(this.file_path);
    } catch (err) {
      throw new MetricUnavailableError(query.group_id, query.metric, err instanceof Error ? err.message : String(err));
    }

    const group = isDictionary(contents) ? contents[query.group_id] : undefined;
    const values = isDictionary(group) ? group[query.metric] : undefined;
    if (!isDictionary(values)) {
      throw new MetricUnavailableError(query.group_id, query.metric, 'no datapoints recorded');
    }

    const datapoints: MetricDatapoint[] = [];
    for (const member_id of query.member_ids) {
      const value = values[member_id];
      if (typeof value === 'number') {
        datapoints.push({ member_id, value });
      }
    }
    return datapoints;
  }
}

/**
 * Reads `{ "<group>": { "<member>": true | false } }`. No file means no signals.
 */
export class LocalHealthSource implements LoadBalancerHealthSource {
  constructor(readonly file_path: string) { }

  static forStateDir(state_dir: string): LocalHealthSource {
    return new LocalHealthSource(path.join(state_dir, HEALTH_FILENAME));
  }

  async getHealth(group_id: string): Promise<HealthSignal[]> {
    if (!(await fs.pathExists(this.file_path))) {
      return [];
    }
    const contents: unknown = await fs.readJSON(this.file_path);
    const group = isDictionary(contents) ? contents[group_id] : undefined;
    if (!isDictionary(group)) {
      return [];
    }
    return Object.entries(group)
      .filter((entry): entry is [string, boolean] => typeof entry[1] === 'boolean')
      .map(([member_id, healthy]): HealthSignal => ({ member_id, healthy, source: 'load-balancer' }));
  }
}
