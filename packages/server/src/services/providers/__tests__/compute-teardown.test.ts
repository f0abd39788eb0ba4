import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { ConditionAccumulator } from "../../conditions.js";
import { diskUrl, instanceUrl, zoneUrl } from "../../gce-urls.js";
import { OperationPoller } from "../../operation-poller.js";
import { getLocalName, type RemoteOperation } from "../../remote-client.js";
import { ComputeTeardown } from "../compute-teardown.js";
import {
  recordingSleep,
  remoteError,
  silentLogger,
} from "../../__tests__/test-helpers.js";
import { FakeComputeClient } from "./fake-compute-client.js";

const ZONE = "us-central1-a";

function creationOperation(name: string, targetLink: string): RemoteOperation {
  return {
    name,
    operationType: "insert",
    status: "DONE",
    targetLink,
    zone: zoneUrl("test-project", ZONE),
  };
}

let client: FakeComputeClient;
let teardown: ComputeTeardown;
let accumulator: ConditionAccumulator;

beforeEach(() => {
  client = new FakeComputeClient();
  const poller = new OperationPoller(
    (op) => client.getZoneOperation(getLocalName(op.zone ?? ""), op.name),
    silentLogger(),
    undefined,
    recordingSleep().sleep,
  );
  teardown = new ComputeTeardown(client, poller, silentLogger());
  accumulator = new ConditionAccumulator();
});

describe("ComputeTeardown", () => {
  it("leaves disks attached to an instance to its auto-delete", async () => {
    const attached = diskUrl("test-project", ZONE, "stratus-a-pd-0");
    client.disks.set("stratus-a-pd-0", { name: "stratus-a-pd-0", sizeGb: 375, type: "pd-ssd" });
    client.instances.set("stratus-a", {
      name: "stratus-a",
      machineType: "n1-standard-1",
      disks: [{ type: "PERSISTENT", mode: "READ_WRITE", source: attached, autoDelete: true }],
      networkInterfaces: [],
    });

    await teardown.tearDownResources(
      [creationOperation("op-vm", instanceUrl("test-project", ZONE, "stratus-a"))],
      [creationOperation("op-disk", attached)],
      accumulator,
    );

    assert.deepEqual(client.calls.filter((c) => !c.startsWith("getZoneOperation:")), [
      "getInstance:stratus-a",
      "deleteInstance:stratus-a",
    ]);
    assert.equal(client.instances.size, 0);
    assert.equal(client.disks.size, 0);
    assert.ok(accumulator.isEmpty());
  });

  it("deletes orphaned disks of instances that were never created", async () => {
    client.disks.set("stratus-b-pd-0", { name: "stratus-b-pd-0", sizeGb: 375, type: "pd-ssd" });

    await teardown.tearDownResources(
      [creationOperation("op-vm", instanceUrl("test-project", ZONE, "stratus-b"))],
      [creationOperation("op-disk", diskUrl("test-project", ZONE, "stratus-b-pd-0"))],
      accumulator,
    );

    assert.deepEqual(client.calls.filter((c) => !c.startsWith("getZoneOperation:")), [
      "getInstance:stratus-b",
      "deleteInstance:stratus-b",
      "deleteDisk:stratus-b-pd-0",
    ]);
    assert.equal(client.disks.size, 0);
    assert.ok(accumulator.isEmpty());
  });

  it("skips the instance lookup when no disks were created", async () => {
    client.instances.set("stratus-a", { name: "stratus-a", machineType: "n1-standard-1", disks: [], networkInterfaces: [] });

    await teardown.tearDownResources(
      [creationOperation("op-vm", instanceUrl("test-project", ZONE, "stratus-a"))],
      [],
      accumulator,
    );

    assert.deepEqual(client.calls, ["deleteInstance:stratus-a", "getZoneOperation:operation-1"]);
  });

  it("records a failed instance lookup and stops explicit disk deletion", async () => {
    const attached = diskUrl("test-project", ZONE, "stratus-a-pd-0");
    client.requestFailures.set("getInstance:stratus-a", remoteError(500, "Backend error"));
    client.disks.set("stratus-a-pd-0", { name: "stratus-a-pd-0", sizeGb: 375, type: "pd-ssd" });
    client.instances.set("stratus-a", {
      name: "stratus-a",
      machineType: "n1-standard-1",
      disks: [{ type: "PERSISTENT", mode: "READ_WRITE", source: attached, autoDelete: true }],
      networkInterfaces: [],
    });
    client.instances.set("stratus-b", { name: "stratus-b", machineType: "n1-standard-1", disks: [], networkInterfaces: [] });

    await teardown.tearDownResources(
      [
        creationOperation("op-vm-a", instanceUrl("test-project", ZONE, "stratus-a")),
        creationOperation("op-vm-b", instanceUrl("test-project", ZONE, "stratus-b")),
      ],
      [creationOperation("op-disk", attached)],
      accumulator,
    );

    assert.deepEqual(client.calls.filter((c) => !c.startsWith("getZoneOperation:")), [
      "getInstance:stratus-a",
      "deleteInstance:stratus-a",
      "deleteInstance:stratus-b",
    ]);
    assert.equal(client.instances.size, 0);
    assert.equal(client.disks.size, 0);
    assert.deepEqual(accumulator.conditionsByKey(), [
      { key: null, conditions: [{ type: "ERROR", message: "Backend error" }] },
    ]);
  });

  it("summarises tear down operations that did not succeed", async () => {
    client.instances.set("stratus-a", { name: "stratus-a", machineType: "n1-standard-1", disks: [], networkInterfaces: [] });
    client.operationErrors.set("stratus-a", { code: "INTERNAL_ERROR", message: "Deletion failed." });

    await teardown.tearDownResources(
      [creationOperation("op-vm", instanceUrl("test-project", ZONE, "stratus-a"))],
      [],
      accumulator,
    );

    assert.deepEqual(accumulator.entries().map((e) => e.message), [
      "Deletion failed.",
      "0 of the 1 tear down operations completed successfully.",
    ]);
  });

  it("ignores RESOURCE_NOT_FOUND on a delete operation", async () => {
    client.instances.set("stratus-a", { name: "stratus-a", machineType: "n1-standard-1", disks: [], networkInterfaces: [] });
    client.operationErrors.set("stratus-a", { code: "RESOURCE_NOT_FOUND", message: "The resource was not found." });

    await teardown.tearDownResources(
      [creationOperation("op-vm", instanceUrl("test-project", ZONE, "stratus-a"))],
      [],
      accumulator,
    );

    assert.ok(accumulator.isEmpty());
  });
});
