import { DependencyEdge } from '.';

export class DependsOnEdge extends DependencyEdge {
  __type = 'depends_on';
}
