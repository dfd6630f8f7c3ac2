/**
 * Error taxonomy
 *
 * Control calls throw these synchronously. Background loops record them on
 * the lifecycle monitor instead of rethrowing.
 */

export class ConfigurationError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export abstract class DeliveryError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string, public cause?: Error) {
    super(message);
  }
}

/** Collaborator temporarily unavailable; retried within the attempt bound. */
export class TransientDeliveryError extends DeliveryError {
  readonly retryable = true;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'TransientDeliveryError';
  }
}

/** Collaborator permanently rejected the event; never retried. */
export class TerminalDeliveryError extends DeliveryError {
  readonly retryable = false;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'TerminalDeliveryError';
  }
}

export class InternalTickError extends Error {
  constructor(
    message: string,
    public simDay: number,
    public simHour: number,
    public cause?: Error
  ) {
    super(message);
    this.name = 'InternalTickError';
  }
}

export class LifecycleError extends Error {
  constructor(message: string, public worker: string) {
    super(message);
    this.name = 'LifecycleError';
  }
}

/**
 * Map anything a sender threw onto the delivery taxonomy.
 * Connection and capacity problems are worth retrying; everything else is not.
 */
export function classifyDeliveryError(error: unknown): DeliveryError {
  if (error instanceof DeliveryError) return error;

  const cause = error instanceof Error ? error : new Error(String(error));
  const msg = cause.message.toLowerCase();
  const code = readErrorCode(error);

  const transient =
    code === 'SQLITE_BUSY' ||
    code === 'SQLITE_LOCKED' ||
    code === 'ECONNREFUSED' ||
    code === 'ECONNRESET' ||
    code === 'ETIMEDOUT' ||
    msg.includes('429') ||
    msg.includes('503') ||
    msg.includes('timeout') ||
    msg.includes('econnrefused') ||
    msg.includes('econnreset') ||
    msg.includes('network') ||
    msg.includes('temporarily') ||
    msg.includes('busy') ||
    msg.includes('locked');

  return transient
    ? new TransientDeliveryError(cause.message, cause)
    : new TerminalDeliveryError(cause.message, cause);
}

function readErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
