export class TierformError extends Error { }

export class ValidationError {
  resource: string;
  path: string;
  message: string;
  value?: unknown;

  constructor(data: { resource: string, path: string; message: string; value?: unknown }) {
    this.resource = data.resource;
    this.path = data.path;
    this.message = data.message;
    this.value = data.value;
  }
}

/**
 * Fatal declaration problems. Nothing is applied once one of these is raised.
 */
export class ConfigError extends TierformError {
  constructor(message?: string) {
    super(message);
    this.name = 'config_error';
  }
}

export class ValidationErrors extends ConfigError {
  errors: ValidationError[];
  file?: { path: string; contents: string };

  constructor(errors: ValidationError[], file?: { path: string; contents: string }) {
    super();

    this.name = `ValidationErrors`;
    if (file) {
      this.name += `\nfile: ${file.path}`;
    }

    this.message = JSON.stringify(errors, null, 2);
    this.errors = errors;
    this.file = file;
  }
}

export class CycleError extends ConfigError {
  members: string[];

  constructor(members: string[]) {
    super(`Dependency cycle detected: ${[...members, members[0]].join(' -> ')}`);
    this.name = 'cycle_error';
    this.members = members;
  }
}

export class UnresolvedReferenceError extends ConfigError {
  constructor(resource_id: string, reference: string) {
    super(`Resource ${resource_id} references ${reference}, which is not declared`);
    this.name = 'unresolved_reference';
  }
}

export class ProviderError extends TierformError {
  static TRANSIENT_CODES = new Set(['Throttling', 'RequestLimitExceeded', 'NotFoundYet', 'ServiceUnavailable']);

  code: string;
  transient: boolean;

  constructor(message: string, code: string, transient = ProviderError.TRANSIENT_CODES.has(code)) {
    super(message);
    this.name = 'provider_error';
    this.code = code;
    this.transient = transient;
  }
}

export class TimeoutError extends ProviderError {
  constructor(resource_id: string, timeout_ms: number) {
    super(`${resource_id} did not become ready within ${timeout_ms}ms`, 'ReadyTimeout', true);
    this.name = 'timeout_error';
  }
}

export class MetricUnavailableError extends TierformError {
  constructor(group_id: string, metric: string, reason?: string) {
    super(`Metric ${metric} unavailable for group ${group_id}${reason ? `: ${reason}` : ''}`);
    this.name = 'metric_unavailable';
  }
}

export const isRetryable = (err: unknown): boolean => {
  return err instanceof ProviderError && err.transient;
};
