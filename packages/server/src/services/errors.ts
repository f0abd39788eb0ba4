import type { KeyedConditions } from "@stratus/shared";

/** A request that cannot be attempted: bad template, bad ids or bounds. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** A remote call that failed in a way the caller cannot continue past. */
export class RemoteRequestError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = this.constructor.name;
    this.status = status;
  }
}

/**
 * A batch operation failed. Carries every condition accumulated during the
 * batch, grouped by template key.
 */
export class UnrecoverableProviderError extends Error {
  readonly conditions: KeyedConditions[];

  constructor(message: string, conditions: KeyedConditions[]) {
    super(message);
    this.name = this.constructor.name;
    this.conditions = conditions;
  }
}
