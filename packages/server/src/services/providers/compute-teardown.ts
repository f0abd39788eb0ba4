import type { FastifyBaseLogger } from "fastify";
import type { ConditionAccumulator } from "../conditions.js";
import type { ComputeClient } from "../gce-client.js";
import { DONE_STATE, type OperationPoller } from "../operation-poller.js";
import { getLocalName, type RemoteOperation } from "../remote-client.js";

/**
 * Best-effort removal of everything an allocation created. Disks found
 * attached to an instance are left to the instance's auto-delete; only
 * orphaned disks are deleted explicitly.
 */
export class ComputeTeardown {
  private client: ComputeClient;
  private poller: OperationPoller;
  private log: FastifyBaseLogger;

  constructor(client: ComputeClient, poller: OperationPoller, log: FastifyBaseLogger) {
    this.client = client;
    this.poller = poller;
    this.log = log;
  }

  async tearDownResources(
    vmCreationOperations: readonly RemoteOperation[],
    diskCreationOperations: readonly RemoteOperation[],
    accumulator: ConditionAccumulator,
  ): Promise<void> {
    const orphanedDisks = new Map<string, RemoteOperation>();
    for (const op of diskCreationOperations) {
      orphanedDisks.set(op.targetLink, op);
    }

    const tearDownOperations: RemoteOperation[] = [];
    let disksResolved = true;

    for (const op of vmCreationOperations) {
      const zone = getLocalName(op.zone ?? "");
      const instanceName = getLocalName(op.targetLink);

      if (disksResolved && orphanedDisks.size > 0) {
        disksResolved = await this.pruneAttachedDisks(zone, instanceName, orphanedDisks, accumulator);
      }

      const deleted = await this.client.deleteInstance(zone, instanceName);
      if (deleted.ok) {
        tearDownOperations.push(deleted.data);
      } else if (deleted.kind !== "not-found") {
        accumulator.addError(null, deleted.error);
      }
    }

    // Attachment is unknown after a failed lookup, so explicit disk deletes could double-delete.
    if (!disksResolved) {
      this.log.warn(
        { disks: [...orphanedDisks.keys()].map(getLocalName) },
        "Skipping explicit disk deletion after a failed instance lookup",
      );
      orphanedDisks.clear();
    }

    for (const op of orphanedDisks.values()) {
      const zone = getLocalName(op.zone ?? "");
      const diskName = getLocalName(op.targetLink);

      const deleted = await this.client.deleteDisk(zone, diskName);
      if (deleted.ok) {
        tearDownOperations.push(deleted.data);
      } else if (deleted.kind !== "not-found") {
        accumulator.addError(null, deleted.error);
      }
    }

    this.log.info(
      { instances: vmCreationOperations.length, orphanedDisks: orphanedDisks.size },
      "Waiting for tear down operations",
    );

    const succeeded = await this.poller.pollPendingOperations(tearDownOperations, DONE_STATE, accumulator);
    if (succeeded.length < tearDownOperations.length) {
      accumulator.addError(
        null,
        `${succeeded.length} of the ${tearDownOperations.length} tear down operations completed successfully.`,
      );
    }
  }

  private async pruneAttachedDisks(
    zone: string,
    instanceName: string,
    orphanedDisks: Map<string, RemoteOperation>,
    accumulator: ConditionAccumulator,
  ): Promise<boolean> {
    const instance = await this.client.getInstance(zone, instanceName);
    if (!instance.ok) {
      // 404: never created, so nothing is attached to it
      if (instance.kind === "not-found") return true;
      accumulator.addError(null, instance.error);
      return false;
    }

    for (const disk of instance.data.disks) {
      if (disk.source) orphanedDisks.delete(disk.source);
    }
    return true;
  }
}
