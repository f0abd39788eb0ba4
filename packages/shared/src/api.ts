import type { TemplateInput } from "./templates.js";
import type {
  ComputeInstanceInfo,
  DatabaseInstanceInfo,
  InstanceStateMap,
} from "./instances.js";
import type { KeyedConditions } from "./conditions.js";

/** POST /api/{compute,database}/allocate */
export interface AllocateRequest {
  template: TemplateInput;
  instanceIds: string[];
  minCount: number;
}

export interface AllocateResponse {
  ok: true;
}

/** POST /api/{compute,database}/{find,state,delete} */
export interface InstanceIdsRequest {
  template: TemplateInput;
  instanceIds: string[];
}

export interface ComputeFindResponse {
  instances: ComputeInstanceInfo[];
}

export interface DatabaseFindResponse {
  instances: DatabaseInstanceInfo[];
}

export interface InstanceStateResponse {
  states: InstanceStateMap;
}

export interface DeleteResponse {
  ok: true;
}

/** GET /api/status */
export interface StatusResponse {
  application: { name: string; version: string };
  projectId: string;
  region: string;
  imageAliases: string[];
  polling: { timeoutSeconds: number; maxIntervalSeconds: number };
}

/** Error body for every failing provider route. */
export interface ErrorResponse {
  error: string;
  conditions?: KeyedConditions[];
}
