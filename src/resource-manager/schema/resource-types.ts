export enum ResourceType {
  IMAGE = 'image',
  SECURITY_GROUP = 'security_group',
  SECURITY_GROUP_RULE = 'security_group_rule',
  LAUNCH_TEMPLATE = 'launch_template',
  LOAD_BALANCER = 'load_balancer',
  TARGET_GROUP = 'target_group',
  LISTENER = 'listener',
  AUTOSCALING_GROUP = 'autoscaling_group',
  INSTANCE = 'instance',
}

export interface ResourceTypeSchema {
  /** Attributes whose change forces a replacement */
  immutable: string[];
  /** Attributes the autoscaling controller owns once the resource exists */
  controller_managed: string[];
  /** Serves load-balancer traffic, so replacements must be healthy before the old object goes away */
  serves_traffic: boolean;
}

const SCHEMAS: Record<ResourceType, ResourceTypeSchema> = {
  [ResourceType.IMAGE]: {
    immutable: ['name_filter', 'owners', 'architecture'],
    controller_managed: [],
    serves_traffic: false,
  },
  [ResourceType.SECURITY_GROUP]: {
    immutable: ['name', 'vpc_id'],
    controller_managed: [],
    serves_traffic: false,
  },
  [ResourceType.SECURITY_GROUP_RULE]: {
    immutable: ['security_group_id', 'type', 'protocol', 'from_port', 'to_port', 'cidr_blocks', 'source_security_group_id'],
    controller_managed: [],
    serves_traffic: false,
  },
  [ResourceType.LAUNCH_TEMPLATE]: {
    immutable: ['image_id', 'instance_type', 'name_prefix'],
    controller_managed: [],
    serves_traffic: true,
  },
  [ResourceType.LOAD_BALANCER]: {
    immutable: ['name', 'internal', 'load_balancer_type'],
    controller_managed: [],
    serves_traffic: true,
  },
  [ResourceType.TARGET_GROUP]: {
    immutable: ['name', 'port', 'protocol', 'vpc_id'],
    controller_managed: [],
    serves_traffic: true,
  },
  [ResourceType.LISTENER]: {
    immutable: ['load_balancer_arn', 'port', 'protocol'],
    controller_managed: [],
    serves_traffic: true,
  },
  [ResourceType.AUTOSCALING_GROUP]: {
    immutable: ['name'],
    controller_managed: ['desired_capacity'],
    serves_traffic: true,
  },
  [ResourceType.INSTANCE]: {
    immutable: ['image_id', 'instance_type', 'launch_template_id', 'subnet_id'],
    controller_managed: [],
    serves_traffic: true,
  },
};

export const getResourceTypeSchema = (type: ResourceType): ResourceTypeSchema => SCHEMAS[type];

export const isImmutableAttribute = (type: ResourceType, path: string): boolean => {
  const [attribute] = path.split('.');
  return SCHEMAS[type].immutable.includes(attribute);
};

export const isControllerManagedAttribute = (type: ResourceType, path: string): boolean => {
  const [attribute] = path.split('.');
  return SCHEMAS[type].controller_managed.includes(attribute);
};
