import { TierformError } from '../../resource-manager/utils/errors';

export default class InvalidConfigOption extends TierformError {
  constructor(option: string) {
    super();
    this.name = 'invalid_config_option';
    this.message = `The CLI config option, "${option}", is not a valid option.`;
  }
}
