import { Resource } from '../../resource';
import { ResourceType } from '../../schema/resource-types';

export class ResourceNode {
  __type = 'resource';

  ref: string;
  resource: Resource;

  constructor(resource: Resource) {
    this.ref = resource.id;
    this.resource = resource;
  }

  get type(): ResourceType {
    return this.resource.type;
  }
}
