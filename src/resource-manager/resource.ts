import { ResourceType } from './schema/resource-types';
import { Dictionary } from './utils/dictionary';

export interface Resource {
  id: string;
  type: ResourceType;
  attributes: Dictionary<unknown>;
  /** Explicit ordering constraints; references found in attributes are added by the graph */
  depends_on: string[];
  /** Set on group members, which are managed by their scalable group rather than by declarations */
  owner?: string;
}
