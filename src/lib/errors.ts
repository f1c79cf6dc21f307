/**
 * Error classes for the quest notifier
 *
 * - FetchError: upstream unreachable or returned an unusable payload
 * - AuthError: upstream rejected our credentials (401/403)
 * - StoreError: the seen-quest table could not be read or written
 * - DeliveryError: one webhook send failed
 * - ConfigError: environment could not be parsed into AppConfig
 * - InvalidEventError: a direct-invoke event failed validation
 */

/**
 * Error thrown when the quest snapshot cannot be fetched or parsed
 */
export class FetchError extends Error {
  public readonly code = 'FETCH_FAILED';

  constructor(
    message: string,
    public readonly statusCode?: number,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'FetchError';
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

/**
 * Error thrown when the quest API rejects the configured credentials
 */
export class AuthError extends Error {
  public readonly code = 'AUTH_REJECTED';

  constructor(
    public readonly statusCode: number,
    public readonly credentialsPresent: boolean
  ) {
    super(
      `Quest API auth error (${statusCode}). Tokens may be ${credentialsPresent ? 'expired' : 'missing'}.`
    );
    this.name = 'AuthError';
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

/**
 * Error thrown when a seen-quest store operation fails
 */
export class StoreError extends Error {
  public readonly code = 'STORE_UNAVAILABLE';

  constructor(
    public readonly operation: string,
    public override readonly cause?: unknown
  ) {
    super(`Seen quest store operation "${operation}" failed: ${describeCause(cause)}`);
    this.name = 'StoreError';
    Object.setPrototypeOf(this, StoreError.prototype);
  }
}

/**
 * Error recorded when a single webhook delivery fails
 */
export class DeliveryError extends Error {
  public readonly code = 'DELIVERY_FAILED';

  constructor(
    public readonly destination: string,
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'DeliveryError';
    Object.setPrototypeOf(this, DeliveryError.prototype);
  }
}

/**
 * Error thrown when the environment does not describe a valid configuration
 */
export class ConfigError extends Error {
  public readonly code = 'INVALID_CONFIG';

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Error thrown when a direct-invoke handler receives a malformed event
 */
export class InvalidEventError extends Error {
  public readonly code = 'INVALID_EVENT';

  constructor(public readonly issues: string[]) {
    super(`Invalid event: ${issues.join('; ')}`);
    this.name = 'InvalidEventError';
    Object.setPrototypeOf(this, InvalidEventError.prototype);
  }
}

/**
 * Normalize a caught value into an Error for logging
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : 'Unknown error');
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? 'unknown cause' : String(cause);
}

/**
 * Webhook URLs embed their token in the path; keep only the first 50
 * characters when a URL has to appear in logs.
 */
export function redactWebhookUrl(url: string): string {
  return url.length > 50 ? `${url.slice(0, 50)}...` : url;
}
