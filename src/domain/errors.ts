export class PendingActionNotFoundError extends Error {
  constructor(readonly actionId: string) {
    super(`Pending action not found: ${actionId}`);
    this.name = "PendingActionNotFoundError";
  }
}

export class PendingActionClosedError extends Error {
  constructor(
    readonly actionId: string,
    readonly outcome: string
  ) {
    super(`Pending action ${actionId} is already ${outcome}`);
    this.name = "PendingActionClosedError";
  }
}

export class RegimeConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid regime configuration: ${issues.join("; ")}`);
    this.name = "RegimeConfigError";
  }
}

/** Raised when a caller stops waiting for a human decision; the action itself stays pending. */
export class DecisionWaitAbortedError extends Error {
  constructor(readonly actionId: string) {
    super(`Stopped waiting for a decision on ${actionId}`);
    this.name = "AbortError";
  }
}

export class ConversationNotFoundError extends Error {
  constructor(readonly buyerId: string) {
    super(`No conversation for buyer ${buyerId}`);
    this.name = "ConversationNotFoundError";
  }
}
