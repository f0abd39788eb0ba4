import type { FastifyBaseLogger } from "fastify";
import type { ConditionAccumulator } from "./conditions.js";
import type {
  OperationStatus,
  RemoteOperation,
  RemoteResult,
} from "./remote-client.js";

export type OperationFetcher = (
  operation: RemoteOperation,
) => Promise<RemoteResult<RemoteOperation>>;

export type Sleep = (ms: number) => Promise<void>;

export interface PollingPolicy {
  timeoutSeconds: number;
  maxIntervalSeconds: number;
}

export const DEFAULT_POLLING_POLICY: PollingPolicy = {
  timeoutSeconds: 180,
  maxIntervalSeconds: 8,
};

export const DONE_STATE: readonly OperationStatus[] = ["DONE"];
export const RUNNING_OR_DONE_STATES: readonly OperationStatus[] = ["RUNNING", "DONE"];

interface IdempotentError {
  operationType: string;
  code: string;
  description: string;
}

/** Operation errors that mean the desired end state already holds. */
const IDEMPOTENT_ERRORS: readonly IdempotentError[] = [
  { operationType: "insert", code: "RESOURCE_ALREADY_EXISTS", description: "resource already exists" },
  { operationType: "delete", code: "RESOURCE_NOT_FOUND", description: "resource already deleted" },
  { operationType: "delete", code: "RESOURCE_NOT_READY", description: "resource is already being deleted" },
];

function findIdempotentError(operationType: string, code: string): IdempotentError | undefined {
  const type = operationType.toLowerCase();
  return IDEMPOTENT_ERRORS.find((e) => e.operationType === type && e.code === code);
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Waits for asynchronous operations to reach one of a set of acceptable
 * states, backing off along the Fibonacci sequence (1, 1, 2, 3, 5, 8 …
 * seconds) up to the policy's max interval.
 */
export class OperationPoller {
  private fetchOperation: OperationFetcher;
  private log: FastifyBaseLogger;
  private policy: PollingPolicy;
  private sleep: Sleep;

  constructor(
    fetchOperation: OperationFetcher,
    log: FastifyBaseLogger,
    policy: PollingPolicy = DEFAULT_POLLING_POLICY,
    sleep: Sleep = defaultSleep,
  ) {
    this.fetchOperation = fetchOperation;
    this.log = log;
    this.policy = policy;
    this.sleep = sleep;
  }

  /**
   * Returns the refreshed operations that reached an acceptable state without
   * a real error. Errors, transport failures and a timeout are added to the
   * accumulator; nothing here throws for a remote failure.
   */
  async pollPendingOperations(
    pendingOperations: readonly RemoteOperation[],
    acceptableStates: readonly OperationStatus[],
    accumulator: ConditionAccumulator,
  ): Promise<RemoteOperation[]> {
    let pending = [...pendingOperations];
    const succeeded: RemoteOperation[] = [];

    let elapsedSeconds = 0;
    let intervalSeconds = 1;
    let increment = 0;

    while (pending.length > 0) {
      await this.sleep(intervalSeconds * 1000);
      elapsedSeconds += intervalSeconds;

      const stillPending: RemoteOperation[] = [];
      for (const operation of pending) {
        const result = await this.fetchOperation(operation);
        if (!result.ok) {
          accumulator.addError(null, result.error);
          stillPending.push(operation);
          continue;
        }

        const current = result.data;
        if (!acceptableStates.includes(current.status)) {
          stillPending.push(operation);
          continue;
        }

        if (this.recordErrors(current, accumulator)) {
          succeeded.push(current);
        }
      }
      pending = stillPending;

      if (pending.length > 0 && elapsedSeconds > this.policy.timeoutSeconds) {
        const names = pending.map((op) => op.name).join(", ");
        accumulator.addError(
          null,
          `Exceeded timeout of '${this.policy.timeoutSeconds}' seconds while polling for pending operations to complete: [${names}]`,
        );
        this.log.warn(
          { pending: pending.length, elapsedSeconds },
          "Gave up waiting for pending operations",
        );
        break;
      }

      const previous = increment;
      increment = intervalSeconds;
      intervalSeconds = Math.min(intervalSeconds + previous, this.policy.maxIntervalSeconds);
    }

    return succeeded;
  }

  /** Accumulates real errors; returns true when there were none. */
  private recordErrors(operation: RemoteOperation, accumulator: ConditionAccumulator): boolean {
    let clean = true;
    for (const error of operation.error?.errors ?? []) {
      const idempotent = findIdempotentError(operation.operationType, error.code);
      if (idempotent) {
        this.log.info(
          { operation: operation.name, target: operation.targetLink, code: error.code },
          `Ignoring operation error: ${idempotent.description}`,
        );
        continue;
      }
      accumulator.addError(null, error.message);
      clean = false;
    }
    return clean;
  }
}
