import type { FastifyBaseLogger } from "fastify";
import type {
  DatabaseInstanceInfo,
  InstanceStateMap,
  InstanceStatus,
} from "@stratus/shared";
import { ConditionAccumulator } from "../conditions.js";
import type { DatabaseInstanceTemplate } from "../database-template.js";
import {
  InvalidRequestError,
  RemoteRequestError,
  UnrecoverableProviderError,
} from "../errors.js";
import {
  checkInstanceNamePrefix,
  decorateInstanceName,
  isValidInstanceNamePrefix,
  provenanceLabel,
} from "../instance-names.js";
import {
  DEFAULT_POLLING_POLICY,
  DONE_STATE,
  OperationPoller,
  RUNNING_OR_DONE_STATES,
  type PollingPolicy,
  type Sleep,
} from "../operation-poller.js";
import { getLocalName, type RemoteOperation } from "../remote-client.js";
import {
  assertAllocationBounds,
  logConditions,
  unknownStates,
  type ResourceProvider,
} from "../resource-provider.js";
import type { DatabaseClient, SqlDatabaseInstance } from "../sqladmin-client.js";

const DATABASE_STATUSES: Record<string, InstanceStatus> = {
  PENDING_CREATE: "PENDING",
  RUNNABLE: "RUNNING",
  SUSPENDED: "STOPPED",
  MAINTENANCE: "STOPPED",
  FAILED: "FAILED",
};

export function toDatabaseStatus(state: string | undefined): InstanceStatus {
  if (state && Object.hasOwn(DATABASE_STATUSES, state)) {
    return DATABASE_STATUSES[state];
  }
  return "UNKNOWN";
}

export interface CloudSqlProviderConfig {
  client: DatabaseClient;
  databaseVersion: string;
  application: { name: string; version: string };
  log: FastifyBaseLogger;
  polling?: PollingPolicy;
  sleep?: Sleep;
}

function targetName(op: RemoteOperation): string {
  return op.targetId ?? getLocalName(op.targetLink);
}

export class CloudSqlProvider
  implements ResourceProvider<DatabaseInstanceTemplate, DatabaseInstanceInfo>
{
  readonly resourceType = "database" as const;

  private client: DatabaseClient;
  private databaseVersion: string;
  private createdBy: string;
  private log: FastifyBaseLogger;
  private poller: OperationPoller;

  constructor(config: CloudSqlProviderConfig) {
    this.client = config.client;
    this.databaseVersion = config.databaseVersion;
    this.createdBy = provenanceLabel(config.application.name, config.application.version);
    this.log = config.log;
    this.poller = new OperationPoller(
      (op) => this.client.getOperation(op.name),
      config.log,
      config.polling ?? DEFAULT_POLLING_POLICY,
      config.sleep,
    );
  }

  async allocate(
    template: DatabaseInstanceTemplate,
    instanceIds: readonly string[],
    minCount: number,
  ): Promise<void> {
    assertAllocationBounds(instanceIds, minCount);
    const prefixProblem = checkInstanceNamePrefix(template.instanceNamePrefix);
    if (prefixProblem) throw new InvalidRequestError(prefixProblem);

    const accumulator = new ConditionAccumulator();
    const dbCreationOperations: RemoteOperation[] = [];
    const readyInstanceNames: string[] = [];

    for (const instanceId of instanceIds) {
      const instanceName = decorateInstanceName(template.instanceNamePrefix, instanceId);
      const inserted = await this.client.insertInstance(this.buildInstance(template, instanceName));
      if (inserted.ok) {
        dbCreationOperations.push(inserted.data);
      } else if (inserted.kind === "conflict") {
        this.log.info({ instanceName }, "Database instance already exists");
        readyInstanceNames.push(instanceName);
      } else {
        accumulator.addError(null, inserted.error);
      }
    }

    const created = await this.poller.pollPendingOperations(dbCreationOperations, DONE_STATE, accumulator);
    readyInstanceNames.push(...created.map(targetName));

    const userCreationOperations: RemoteOperation[] = [];
    for (const instanceName of readyInstanceNames) {
      const inserted = await this.client.insertUser(instanceName, {
        name: template.masterUsername,
        password: template.masterUserPassword,
      });
      if (inserted.ok) {
        userCreationOperations.push(inserted.data);
      } else {
        accumulator.addError(null, inserted.error);
      }
    }

    const succeeded = await this.poller.pollPendingOperations(userCreationOperations, DONE_STATE, accumulator);
    const successCount = succeeded.length;

    if (successCount < minCount) {
      this.log.info(
        { provisioned: successCount, requested: instanceIds.length, minCount },
        "Provisioned fewer database instances than minCount. Tearing down provisioned instances.",
      );
      await this.tearDownResources(dbCreationOperations, accumulator);
      throw new UnrecoverableProviderError("Problem allocating instances.", accumulator.conditionsByKey());
    }

    if (successCount < instanceIds.length) {
      this.log.info(
        { provisioned: successCount, requested: instanceIds.length, minCount },
        "Provisioned fewer database instances than requested",
      );
      logConditions(this.log, accumulator);
    }
  }

  async find(
    template: DatabaseInstanceTemplate,
    instanceIds: readonly string[],
  ): Promise<DatabaseInstanceInfo[]> {
    if (!isValidInstanceNamePrefix(template.instanceNamePrefix)) return [];

    const found: DatabaseInstanceInfo[] = [];
    for (const instanceId of instanceIds) {
      const instanceName = decorateInstanceName(template.instanceNamePrefix, instanceId);
      const result = await this.client.getInstance(instanceName);
      if (result.ok) {
        found.push(toDatabaseInfo(instanceId, result.data));
      } else if (result.kind === "not-found" || result.kind === "forbidden") {
        // Cloud SQL answers 403 for instances that do not exist in the project.
        this.log.info({ instanceName }, "Database instance not found");
      } else {
        throw new RemoteRequestError(result.error, result.status);
      }
    }
    return found;
  }

  async getInstanceState(
    template: DatabaseInstanceTemplate,
    instanceIds: readonly string[],
  ): Promise<InstanceStateMap> {
    if (!isValidInstanceNamePrefix(template.instanceNamePrefix)) return unknownStates(instanceIds);

    const states: InstanceStateMap = {};
    for (const instanceId of instanceIds) {
      const instanceName = decorateInstanceName(template.instanceNamePrefix, instanceId);
      const result = await this.client.getInstance(instanceName);
      if (result.ok) {
        states[instanceId] = toDatabaseStatus(result.data.state);
      } else if (result.kind === "not-found" || result.kind === "forbidden") {
        states[instanceId] = "UNKNOWN";
      } else {
        throw new RemoteRequestError(result.error, result.status);
      }
    }
    return states;
  }

  async delete(template: DatabaseInstanceTemplate, instanceIds: readonly string[]): Promise<void> {
    if (!isValidInstanceNamePrefix(template.instanceNamePrefix)) return;

    const accumulator = new ConditionAccumulator();
    const deleteOperations: RemoteOperation[] = [];

    for (const instanceId of instanceIds) {
      const instanceName = decorateInstanceName(template.instanceNamePrefix, instanceId);
      const result = await this.client.deleteInstance(instanceName);
      if (result.ok) {
        deleteOperations.push(result.data);
      } else if (result.kind === "not-found") {
        this.log.info({ instanceName }, "Attempted to delete database instance, but it does not exist");
      } else if (result.kind === "conflict") {
        this.log.info({ instanceName }, "Database instance is already being deleted");
      } else {
        accumulator.addError(null, result.error);
      }
    }

    await this.poller.pollPendingOperations(deleteOperations, RUNNING_OR_DONE_STATES, accumulator);

    if (accumulator.hasError()) {
      throw new UnrecoverableProviderError("Problem deleting instances.", accumulator.conditionsByKey());
    }
  }

  private async tearDownResources(
    dbCreationOperations: readonly RemoteOperation[],
    accumulator: ConditionAccumulator,
  ): Promise<void> {
    const tearDownOperations: RemoteOperation[] = [];

    for (const op of dbCreationOperations) {
      const deleted = await this.client.deleteInstance(targetName(op));
      if (deleted.ok) {
        tearDownOperations.push(deleted.data);
      } else if (deleted.kind !== "not-found") {
        accumulator.addError(null, deleted.error);
      }
    }

    const succeeded = await this.poller.pollPendingOperations(tearDownOperations, DONE_STATE, accumulator);
    if (succeeded.length < tearDownOperations.length) {
      accumulator.addError(
        null,
        `${succeeded.length} of the ${tearDownOperations.length} tear down operations completed successfully.`,
      );
    }
  }

  private buildInstance(template: DatabaseInstanceTemplate, instanceName: string): SqlDatabaseInstance {
    return {
      name: instanceName,
      region: template.region,
      databaseVersion: this.databaseVersion,
      settings: {
        tier: template.tier,
        ipConfiguration: {
          ipv4Enabled: true,
          authorizedNetworks: [{ name: "authorized-network", value: template.authorizedNetwork }],
        },
        userLabels: { ...template.tags, "created-by": this.createdBy },
      },
    };
  }
}

function toDatabaseInfo(id: string, instance: SqlDatabaseInstance): DatabaseInstanceInfo {
  const primary = instance.ipAddresses?.find((a) => a.type === "PRIMARY") ?? instance.ipAddresses?.[0];
  return {
    id,
    name: instance.name,
    status: toDatabaseStatus(instance.state),
    tier: instance.settings.tier,
    region: instance.region,
    databaseVersion: instance.databaseVersion ?? null,
    ipAddress: primary?.ipAddress ?? null,
  };
}
