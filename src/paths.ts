export default class LocalPaths {
  static CLI_CONFIG_FILENAME = 'config.json';
  static STATE_FILENAME = 'state.json';
  static DEFAULT_STATE_DIR = '.tierform';
}
