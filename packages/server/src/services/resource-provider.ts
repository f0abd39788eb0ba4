import type { FastifyBaseLogger } from "fastify";
import type { InstanceStateMap } from "@stratus/shared";
import type { ConditionAccumulator } from "./conditions.js";
import { InvalidRequestError } from "./errors.js";

/** Lifecycle operations every resource provider offers. */
export interface ResourceProvider<TTemplate, TInstance> {
  readonly resourceType: "compute" | "database";
  allocate(template: TTemplate, instanceIds: readonly string[], minCount: number): Promise<void>;
  find(template: TTemplate, instanceIds: readonly string[]): Promise<TInstance[]>;
  getInstanceState(template: TTemplate, instanceIds: readonly string[]): Promise<InstanceStateMap>;
  delete(template: TTemplate, instanceIds: readonly string[]): Promise<void>;
}

export function assertAllocationBounds(instanceIds: readonly string[], minCount: number): void {
  if (instanceIds.length === 0) {
    throw new InvalidRequestError("At least one instance id is required.");
  }
  const duplicates = instanceIds.filter((id, i) => instanceIds.indexOf(id) !== i);
  if (duplicates.length > 0) {
    throw new InvalidRequestError(`Instance ids must be unique, got duplicates: ${[...new Set(duplicates)].join(", ")}.`);
  }
  if (!Number.isInteger(minCount) || minCount < 0 || minCount > instanceIds.length) {
    throw new InvalidRequestError(
      `minCount must be an integer between 0 and ${instanceIds.length}, got ${minCount}.`,
    );
  }
}

export function unknownStates(instanceIds: readonly string[]): InstanceStateMap {
  const states: InstanceStateMap = {};
  for (const id of instanceIds) states[id] = "UNKNOWN";
  return states;
}

/** Logs every accumulated condition, one line each. */
export function logConditions(log: FastifyBaseLogger, accumulator: ConditionAccumulator): void {
  for (const { key, type, message } of accumulator.entries()) {
    log.info({ key, type }, message);
  }
}
