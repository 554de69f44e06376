import { TierformError } from '../../resource-manager/utils/errors';

export default class InvalidConfigValue extends TierformError {
  constructor(option: string, value: string, expected: string) {
    super();
    this.name = 'invalid_config_value';
    this.message = `Invalid value "${value}" for ${option}: expected ${expected}.`;
  }
}
