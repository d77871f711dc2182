/**
 * Error classes for the grooming pipeline
 *
 * - Upstream fetch failures (resort-local, cycle skipped)
 * - Delivery failures (nothing persisted, retried next tick)
 * - Consistency violations (programming errors, never swallowed)
 * - Optimistic locking conflicts on report writes
 * - Invalid configuration at bootstrap
 */

/**
 * Error thrown when a resort's grooming report cannot be fetched or parsed
 */
export class UpstreamFetchError extends Error {
  public readonly code = 'UPSTREAM_FETCH_FAILED';

  constructor(
    public readonly resortId: string,
    message: string,
    public readonly statusCode?: number
  ) {
    super(`Unable to fetch grooming report for resort ${resortId}: ${message}`);
    this.name = 'UpstreamFetchError';
    Object.setPrototypeOf(this, UpstreamFetchError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      resortId: this.resortId,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Error thrown when SNS does not confirm a publish
 */
export class DeliveryError extends Error {
  public readonly code = 'DELIVERY_FAILED';

  constructor(
    public readonly topicArn: string,
    message: string
  ) {
    super(`Delivery to ${topicArn} failed: ${message}`);
    this.name = 'DeliveryError';
    Object.setPrototypeOf(this, DeliveryError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      topicArn: this.topicArn,
    };
  }
}

/**
 * Error thrown when persisted state breaks a one-per-(resort, date) invariant
 */
export class ConsistencyViolationError extends Error {
  public readonly code = 'CONSISTENCY_VIOLATION';

  constructor(
    public readonly resortId: string,
    public readonly date: string,
    public readonly detail: string
  ) {
    super(`Consistency violation for resort ${resortId} on ${date}: ${detail}`);
    this.name = 'ConsistencyViolationError';
    Object.setPrototypeOf(this, ConsistencyViolationError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      resortId: this.resortId,
      date: this.date,
      detail: this.detail,
    };
  }
}

/**
 * Error thrown when another writer updated a report first
 */
export class ReportVersionConflictError extends Error {
  public readonly code = 'VERSION_CONFLICT';

  constructor(
    public readonly resortId: string,
    public readonly date: string,
    public readonly expectedVersion: number
  ) {
    super(
      `Version conflict on report ${resortId}/${date}: expected version ${expectedVersion}. ` +
        'The report was modified by another writer.'
    );
    this.name = 'ReportVersionConflictError';
    Object.setPrototypeOf(this, ReportVersionConflictError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      resortId: this.resortId,
      date: this.date,
      expectedVersion: this.expectedVersion,
    };
  }
}

/**
 * Error thrown when environment configuration is missing or invalid
 */
export class ConfigurationError extends Error {
  public readonly code = 'INVALID_CONFIGURATION';

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      issues: this.issues,
    };
  }
}
