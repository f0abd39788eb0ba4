import {
  BearerRestTransport,
  type RemoteOperation,
  type RemoteResult,
} from "./remote-client.js";

export interface AuthorizedNetwork {
  name?: string;
  value: string;
}

export interface SqlDatabaseInstance {
  name: string;
  region: string;
  databaseVersion?: string;
  state?: string;
  settings: {
    tier: string;
    ipConfiguration?: {
      ipv4Enabled: boolean;
      authorizedNetworks?: AuthorizedNetwork[];
    };
    userLabels?: Record<string, string>;
  };
  ipAddresses?: Array<{ type?: string; ipAddress: string }>;
}

export interface SqlUser {
  name: string;
  password: string;
  host?: string;
}

/** Narrow view of the Cloud SQL Admin API. Operations are project-scoped. */
export interface DatabaseClient {
  readonly projectId: string;
  insertInstance(instance: SqlDatabaseInstance): Promise<RemoteResult<RemoteOperation>>;
  getInstance(instanceName: string): Promise<RemoteResult<SqlDatabaseInstance>>;
  deleteInstance(instanceName: string): Promise<RemoteResult<RemoteOperation>>;
  insertUser(instanceName: string, user: SqlUser): Promise<RemoteResult<RemoteOperation>>;
  getOperation(operationName: string): Promise<RemoteResult<RemoteOperation>>;
}

const SQLADMIN_API = "https://sqladmin.googleapis.com/sql/v1beta4";

export class SqlAdminRestClient implements DatabaseClient {
  private transport: BearerRestTransport;

  constructor(
    readonly projectId: string,
    accessToken: string,
    baseUrl: string = SQLADMIN_API,
  ) {
    this.transport = new BearerRestTransport(
      `${baseUrl}/projects/${encodeURIComponent(projectId)}`,
      accessToken,
    );
  }

  insertInstance(instance: SqlDatabaseInstance): Promise<RemoteResult<RemoteOperation>> {
    return this.transport.post("/instances", instance);
  }

  getInstance(instanceName: string): Promise<RemoteResult<SqlDatabaseInstance>> {
    return this.transport.get(`/instances/${encodeURIComponent(instanceName)}`);
  }

  deleteInstance(instanceName: string): Promise<RemoteResult<RemoteOperation>> {
    return this.transport.delete(`/instances/${encodeURIComponent(instanceName)}`);
  }

  insertUser(instanceName: string, user: SqlUser): Promise<RemoteResult<RemoteOperation>> {
    return this.transport.post(`/instances/${encodeURIComponent(instanceName)}/users`, user);
  }

  getOperation(operationName: string): Promise<RemoteResult<RemoteOperation>> {
    return this.transport.get(`/operations/${encodeURIComponent(operationName)}`);
  }
}
