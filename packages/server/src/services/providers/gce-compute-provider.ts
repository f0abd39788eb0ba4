import type { FastifyBaseLogger } from "fastify";
import type {
  ComputeInstanceInfo,
  InstanceStateMap,
  InstanceStatus,
} from "@stratus/shared";
import type { ComputeInstanceTemplate } from "../compute-template.js";
import { ConditionAccumulator } from "../conditions.js";
import {
  InvalidRequestError,
  RemoteRequestError,
  UnrecoverableProviderError,
} from "../errors.js";
import type {
  AttachedDisk,
  ComputeClient,
  GceInstance,
  MetadataItem,
  NetworkInterface,
} from "../gce-client.js";
import {
  diskTypeUrl,
  diskUrl,
  machineTypeUrl,
  networkUrl,
  subnetworkUrl,
} from "../gce-urls.js";
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
import { ComputeTeardown } from "./compute-teardown.js";

const INSTANCE_STATUSES: Record<string, InstanceStatus> = {
  PROVISIONING: "PENDING",
  STAGING: "PENDING",
  RUNNING: "RUNNING",
  STOPPING: "STOPPING",
  TERMINATED: "STOPPED",
};

export function toInstanceStatus(gceStatus: string | undefined): InstanceStatus {
  if (gceStatus && Object.hasOwn(INSTANCE_STATUSES, gceStatus)) {
    return INSTANCE_STATUSES[gceStatus];
  }
  return "UNKNOWN";
}

export interface GceComputeProviderConfig {
  client: ComputeClient;
  /** Region used to build subnetwork URLs. */
  region: string;
  imageAliases: Record<string, string>;
  application: { name: string; version: string };
  log: FastifyBaseLogger;
  polling?: PollingPolicy;
  sleep?: Sleep;
}

interface DataDiskResult {
  operations: RemoteOperation[];
  readyDiskUrls: string[];
}

export class GceComputeProvider
  implements ResourceProvider<ComputeInstanceTemplate, ComputeInstanceInfo>
{
  readonly resourceType = "compute" as const;

  private client: ComputeClient;
  private region: string;
  private imageAliases: Record<string, string>;
  private createdBy: string;
  private log: FastifyBaseLogger;
  private poller: OperationPoller;
  private teardown: ComputeTeardown;

  constructor(config: GceComputeProviderConfig) {
    this.client = config.client;
    this.region = config.region;
    this.imageAliases = config.imageAliases;
    this.createdBy = provenanceLabel(config.application.name, config.application.version);
    this.log = config.log;
    this.poller = new OperationPoller(
      (op) => this.client.getZoneOperation(getLocalName(op.zone ?? ""), op.name),
      config.log,
      config.polling ?? DEFAULT_POLLING_POLICY,
      config.sleep,
    );
    this.teardown = new ComputeTeardown(this.client, this.poller, config.log);
  }

  async allocate(
    template: ComputeInstanceTemplate,
    instanceIds: readonly string[],
    minCount: number,
  ): Promise<void> {
    assertAllocationBounds(instanceIds, minCount);
    const prefixProblem = checkInstanceNamePrefix(template.instanceNamePrefix);
    if (prefixProblem) throw new InvalidRequestError(prefixProblem);
    const sourceImage = this.resolveImage(template.image);

    const accumulator = new ConditionAccumulator();
    const vmCreationOperations: RemoteOperation[] = [];
    const diskCreationOperations: RemoteOperation[] = [];
    const unattachedDisks: string[] = [];
    let preExistingInstanceCount = 0;

    for (const instanceId of instanceIds) {
      const instanceName = decorateInstanceName(template.instanceNamePrefix, instanceId);
      const disks: AttachedDisk[] = [this.bootDisk(template, sourceImage)];

      if (template.dataDiskType === "LocalSSD") {
        for (let i = 0; i < template.dataDiskCount; i++) {
          disks.push({
            type: "SCRATCH",
            interface: template.localSsdInterfaceType,
            autoDelete: true,
            initializeParams: {
              diskType: diskTypeUrl(this.client.projectId, template.zone, "LocalSSD"),
            },
          });
        }
      } else {
        const dataDisks = await this.createPersistentDisks(template, instanceName, accumulator);
        diskCreationOperations.push(...dataDisks.operations);

        if (dataDisks.readyDiskUrls.length < template.dataDiskCount) {
          accumulator.addError(
            null,
            `Instance '${instanceName}' was not created: ${dataDisks.readyDiskUrls.length} of ${template.dataDiskCount} data disks are available.`,
          );
          unattachedDisks.push(...dataDisks.operations.map((op) => getLocalName(op.targetLink)));
          continue;
        }
        for (const source of dataDisks.readyDiskUrls) {
          disks.push({ type: "PERSISTENT", mode: "READ_WRITE", source, autoDelete: true });
        }
      }

      const inserted = await this.client.insertInstance(
        template.zone,
        this.buildInstance(template, instanceName, disks),
      );
      if (inserted.ok) {
        vmCreationOperations.push(inserted.data);
      } else if (inserted.kind === "conflict") {
        this.log.info({ instanceName }, "Instance already exists");
        preExistingInstanceCount++;
      } else {
        accumulator.addError(null, inserted.error);
      }
    }

    const succeeded = await this.poller.pollPendingOperations(vmCreationOperations, DONE_STATE, accumulator);
    const successCount = succeeded.length + preExistingInstanceCount;

    if (successCount < minCount) {
      this.log.info(
        { provisioned: successCount, requested: instanceIds.length, minCount },
        "Provisioned fewer instances than minCount. Tearing down provisioned instances.",
      );
      await this.teardown.tearDownResources(vmCreationOperations, diskCreationOperations, accumulator);
      throw new UnrecoverableProviderError("Problem allocating instances.", accumulator.conditionsByKey());
    }

    if (successCount < instanceIds.length) {
      this.log.info(
        { provisioned: successCount, requested: instanceIds.length, minCount },
        "Provisioned fewer instances than requested",
      );
      if (unattachedDisks.length > 0) {
        this.log.warn(
          { disks: unattachedDisks },
          `Keeping data disks of instances that were not created: ${unattachedDisks.join(", ")}`,
        );
      }
      logConditions(this.log, accumulator);
    }
  }

  async find(
    template: ComputeInstanceTemplate,
    instanceIds: readonly string[],
  ): Promise<ComputeInstanceInfo[]> {
    // An invalid prefix means none of these instances can exist.
    if (!isValidInstanceNamePrefix(template.instanceNamePrefix)) return [];

    const found: ComputeInstanceInfo[] = [];
    for (const instanceId of instanceIds) {
      const instanceName = decorateInstanceName(template.instanceNamePrefix, instanceId);
      const result = await this.client.getInstance(template.zone, instanceName);
      if (result.ok) {
        found.push(toInstanceInfo(instanceId, template.zone, result.data));
      } else if (result.kind === "not-found") {
        this.log.info({ instanceName }, "Instance not found");
      } else {
        throw new RemoteRequestError(result.error, result.status);
      }
    }
    return found;
  }

  async getInstanceState(
    template: ComputeInstanceTemplate,
    instanceIds: readonly string[],
  ): Promise<InstanceStateMap> {
    if (!isValidInstanceNamePrefix(template.instanceNamePrefix)) return unknownStates(instanceIds);

    const states: InstanceStateMap = {};
    for (const instanceId of instanceIds) {
      const instanceName = decorateInstanceName(template.instanceNamePrefix, instanceId);
      const result = await this.client.getInstance(template.zone, instanceName);
      if (result.ok) {
        states[instanceId] = toInstanceStatus(result.data.status);
      } else if (result.kind === "not-found") {
        states[instanceId] = "UNKNOWN";
      } else {
        throw new RemoteRequestError(result.error, result.status);
      }
    }
    return states;
  }

  async delete(template: ComputeInstanceTemplate, instanceIds: readonly string[]): Promise<void> {
    if (!isValidInstanceNamePrefix(template.instanceNamePrefix)) return;

    const accumulator = new ConditionAccumulator();
    const deleteOperations: RemoteOperation[] = [];

    for (const instanceId of instanceIds) {
      const instanceName = decorateInstanceName(template.instanceNamePrefix, instanceId);
      const result = await this.client.deleteInstance(template.zone, instanceName);
      if (result.ok) {
        deleteOperations.push(result.data);
      } else if (result.kind === "not-found") {
        this.log.info({ instanceName }, "Attempted to delete instance, but it does not exist");
      } else if (result.kind === "conflict") {
        this.log.info({ instanceName }, "Instance is already being deleted");
      } else {
        accumulator.addError(null, result.error);
      }
    }

    await this.poller.pollPendingOperations(deleteOperations, RUNNING_OR_DONE_STATES, accumulator);

    if (accumulator.hasError()) {
      throw new UnrecoverableProviderError("Problem deleting instances.", accumulator.conditionsByKey());
    }
  }

  // ---------------------------------------------------------------------------
  // Request building
  // ---------------------------------------------------------------------------

  private resolveImage(image: string): string {
    if (Object.hasOwn(this.imageAliases, image)) return this.imageAliases[image];
    if (image.startsWith("https://")) return image;
    throw new InvalidRequestError(`Image '${image}' is neither a configured alias nor an image URL.`);
  }

  private bootDisk(template: ComputeInstanceTemplate, sourceImage: string): AttachedDisk {
    return {
      boot: true,
      autoDelete: true,
      initializeParams: {
        sourceImage,
        diskSizeGb: template.bootDiskSizeGb,
        diskType: diskTypeUrl(this.client.projectId, template.zone, template.bootDiskType),
      },
    };
  }

  /**
   * Creates this instance's persistent data disks and waits for them. A disk
   * that already exists counts as ready.
   */
  private async createPersistentDisks(
    template: ComputeInstanceTemplate,
    instanceName: string,
    accumulator: ConditionAccumulator,
  ): Promise<DataDiskResult> {
    const operations: RemoteOperation[] = [];
    const preExisting = new Set<string>();
    const diskUrls: string[] = [];

    for (let i = 0; i < template.dataDiskCount; i++) {
      const diskName = `${instanceName}-pd-${i}`;
      const url = diskUrl(this.client.projectId, template.zone, diskName);
      diskUrls.push(url);

      const inserted = await this.client.insertDisk(template.zone, {
        name: diskName,
        sizeGb: template.dataDiskSizeGb,
        type: diskTypeUrl(this.client.projectId, template.zone, template.dataDiskType),
      });
      if (inserted.ok) {
        operations.push(inserted.data);
      } else if (inserted.kind === "conflict") {
        this.log.info({ diskName }, "Disk already exists");
        preExisting.add(url);
      } else {
        accumulator.addError(null, inserted.error);
      }
    }

    const succeeded = await this.poller.pollPendingOperations(operations, DONE_STATE, accumulator);
    const ready = new Set([...preExisting, ...succeeded.map((op) => op.targetLink)]);

    return {
      operations,
      readyDiskUrls: diskUrls.filter((url) => ready.has(url)),
    };
  }

  private buildInstance(
    template: ComputeInstanceTemplate,
    instanceName: string,
    disks: AttachedDisk[],
  ): GceInstance {
    const projectId = this.client.projectId;
    const networkInterface: NetworkInterface = {
      network: networkUrl(template.networkProject ?? projectId, template.networkName),
    };
    if (template.subnetworkName) {
      networkInterface.subnetwork = subnetworkUrl(
        template.networkProject ?? projectId,
        this.region,
        template.subnetworkName,
      );
    }
    if (template.assignExternalIps) {
      networkInterface.accessConfigs = [{ name: "External NAT", type: "ONE_TO_ONE_NAT" }];
    }

    const instance: GceInstance = {
      name: instanceName,
      machineType: machineTypeUrl(projectId, template.zone, template.machineType),
      disks,
      networkInterfaces: [networkInterface],
      metadata: { items: this.buildMetadata(template, instanceName) },
    };
    if (template.instanceTags.length > 0) {
      instance.tags = { items: template.instanceTags };
    }
    if (template.usePreemptibleInstances) {
      instance.scheduling = {
        preemptible: true,
        automaticRestart: false,
        onHostMaintenance: "TERMINATE",
      };
    }
    return instance;
  }

  private buildMetadata(template: ComputeInstanceTemplate, instanceName: string): MetadataItem[] {
    const items: MetadataItem[] = [];

    if (template.sshUsername && template.sshPublicKey) {
      items.push({ key: "ssh-keys", value: `${template.sshUsername}:${template.sshPublicKey}` });
    } else {
      this.log.info({ instanceName }, "No ssh username and public key given; ssh-keys metadata omitted");
    }

    for (const [key, value] of Object.entries(template.tags)) {
      items.push({ key, value });
    }
    items.push({ key: "created-by", value: this.createdBy });
    return items;
  }
}

function toInstanceInfo(id: string, zone: string, instance: GceInstance): ComputeInstanceInfo {
  const nic = instance.networkInterfaces[0];
  return {
    id,
    name: instance.name,
    status: toInstanceStatus(instance.status),
    machineType: getLocalName(instance.machineType),
    zone,
    privateIpAddress: nic?.networkIP ?? null,
    publicIpAddress: nic?.accessConfigs?.[0]?.natIP ?? null,
    creationTimestamp: instance.creationTimestamp ?? null,
  };
}
