import {
  BearerRestTransport,
  type RemoteOperation,
  type RemoteResult,
} from "./remote-client.js";

// ---------------------------------------------------------------------------
// Compute Engine resource shapes (the subset this service reads and writes)
// ---------------------------------------------------------------------------

export interface AttachedDisk {
  boot?: boolean;
  autoDelete?: boolean;
  type?: "PERSISTENT" | "SCRATCH";
  mode?: "READ_WRITE" | "READ_ONLY";
  interface?: "SCSI" | "NVME";
  source?: string;
  initializeParams?: {
    sourceImage?: string;
    diskSizeGb?: number;
    diskType?: string;
  };
}

export interface AccessConfig {
  name: string;
  type: "ONE_TO_ONE_NAT";
  natIP?: string;
}

export interface NetworkInterface {
  network: string;
  subnetwork?: string;
  networkIP?: string;
  accessConfigs?: AccessConfig[];
}

export interface MetadataItem {
  key: string;
  value: string;
}

export interface Scheduling {
  preemptible: boolean;
  automaticRestart: boolean;
  onHostMaintenance: "MIGRATE" | "TERMINATE";
}

export interface GceInstance {
  name: string;
  machineType: string;
  status?: string;
  zone?: string;
  creationTimestamp?: string;
  disks: AttachedDisk[];
  networkInterfaces: NetworkInterface[];
  metadata?: { items: MetadataItem[] };
  tags?: { items: string[] };
  scheduling?: Scheduling;
}

export interface GceDisk {
  name: string;
  sizeGb: number;
  type: string;
}

/** Narrow view of the Compute Engine API used by the providers. */
export interface ComputeClient {
  readonly projectId: string;
  insertDisk(zone: string, disk: GceDisk): Promise<RemoteResult<RemoteOperation>>;
  deleteDisk(zone: string, diskName: string): Promise<RemoteResult<RemoteOperation>>;
  insertInstance(zone: string, instance: GceInstance): Promise<RemoteResult<RemoteOperation>>;
  getInstance(zone: string, instanceName: string): Promise<RemoteResult<GceInstance>>;
  deleteInstance(zone: string, instanceName: string): Promise<RemoteResult<RemoteOperation>>;
  getZoneOperation(zone: string, operationName: string): Promise<RemoteResult<RemoteOperation>>;
}

// ---------------------------------------------------------------------------
// Production implementation over the Compute Engine REST API
// ---------------------------------------------------------------------------

const COMPUTE_API = "https://compute.googleapis.com/compute/v1";

export class GceRestClient implements ComputeClient {
  private transport: BearerRestTransport;

  constructor(
    readonly projectId: string,
    accessToken: string,
    baseUrl: string = COMPUTE_API,
  ) {
    this.transport = new BearerRestTransport(
      `${baseUrl}/projects/${encodeURIComponent(projectId)}`,
      accessToken,
    );
  }

  insertDisk(zone: string, disk: GceDisk): Promise<RemoteResult<RemoteOperation>> {
    return this.transport.post(`/zones/${zone}/disks`, disk);
  }

  deleteDisk(zone: string, diskName: string): Promise<RemoteResult<RemoteOperation>> {
    return this.transport.delete(`/zones/${zone}/disks/${encodeURIComponent(diskName)}`);
  }

  insertInstance(zone: string, instance: GceInstance): Promise<RemoteResult<RemoteOperation>> {
    return this.transport.post(`/zones/${zone}/instances`, instance);
  }

  getInstance(zone: string, instanceName: string): Promise<RemoteResult<GceInstance>> {
    return this.transport.get(`/zones/${zone}/instances/${encodeURIComponent(instanceName)}`);
  }

  deleteInstance(zone: string, instanceName: string): Promise<RemoteResult<RemoteOperation>> {
    return this.transport.delete(`/zones/${zone}/instances/${encodeURIComponent(instanceName)}`);
  }

  getZoneOperation(zone: string, operationName: string): Promise<RemoteResult<RemoteOperation>> {
    return this.transport.get(`/zones/${zone}/operations/${encodeURIComponent(operationName)}`);
  }
}
