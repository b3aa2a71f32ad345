/**
 * @module @docpilot/tickets/errors
 */

export type TicketTrackerErrorKind = 'not_found' | 'access_denied' | 'rejected' | 'transient' | 'invalid_response';

export class TicketTrackerError extends Error {
  public readonly kind: TicketTrackerErrorKind;
  public readonly retryable: boolean;
  public readonly statusCode?: number;

  constructor(
    message: string,
    kind: TicketTrackerErrorKind,
    options: { statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'TicketTrackerError';
    this.kind = kind;
    this.retryable = kind === 'transient';
    this.statusCode = options.statusCode;
  }
}

export class FollowUpStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FollowUpStoreError';
  }
}
