export enum ExitCode {
  SUCCESS = 0,
  APPLY_PARTIAL_FAILURE = 1,
  FATAL_CONFIG_ERROR = 2,
  /** Only with --detailed-exitcode */
  NO_CHANGES = 3,
}
