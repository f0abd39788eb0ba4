export type InstanceStatus =
  | "PENDING"
  | "RUNNING"
  | "STOPPING"
  | "STOPPED"
  | "FAILED"
  | "UNKNOWN";

export interface ComputeInstanceInfo {
  id: string;
  name: string;
  status: InstanceStatus;
  machineType: string;
  zone: string;
  privateIpAddress: string | null;
  publicIpAddress: string | null;
  creationTimestamp: string | null;
}

export interface DatabaseInstanceInfo {
  id: string;
  name: string;
  status: InstanceStatus;
  tier: string;
  region: string;
  databaseVersion: string | null;
  ipAddress: string | null;
}

/** Instance id → status, one entry per requested id. */
export type InstanceStateMap = Record<string, InstanceStatus>;
