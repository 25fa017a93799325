/**
 * Holdgate Errors
 */

export class HoldgateError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InteractionNotFoundError extends HoldgateError {
  constructor(interactionId: string) {
    super('INTERACTION_NOT_FOUND', `Interaction ${interactionId} does not exist`);
  }
}

export class InvalidDecisionError extends HoldgateError {
  constructor(decision: unknown) {
    super('INVALID_DECISION', `Reviewer decision must be "approve" or "deny", got ${String(decision)}`);
  }
}

export class StoreError extends HoldgateError {
  readonly detail: unknown;

  constructor(message: string, detail?: unknown) {
    super('STORE_FAILURE', message);
    this.detail = detail;
  }
}
