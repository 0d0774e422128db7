export class AppError extends Error {
  status: number;
  code: number;
  details?: Record<string, unknown>;

  constructor(status: number, code: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

/**
 * Delivery through the messaging API did not complete: network failure,
 * timeout, or a response that could not be understood.
 */
export class DeliveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeliveryError';
  }
}

/** The messaging API answered with a non-success status. */
export class TransportError extends DeliveryError {
  status: number;
  body: string;

  constructor(status: number, body: string) {
    super(`${status} ${body}`);
    this.name = 'TransportError';
    this.status = status;
    this.body = body;
  }
}

export function describeDeliveryError(err: unknown): string {
  if (err instanceof TransportError) {
    return `${err.status} ${err.body}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
