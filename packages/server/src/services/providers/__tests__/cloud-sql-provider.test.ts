import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import type { DatabaseInstanceTemplate } from "../../database-template.js";
import {
  InvalidRequestError,
  RemoteRequestError,
  UnrecoverableProviderError,
} from "../../errors.js";
import { CloudSqlProvider, toDatabaseStatus } from "../cloud-sql-provider.js";
import {
  recordingLogger,
  recordingSleep,
  remoteError,
} from "../../__tests__/test-helpers.js";
import { FakeDatabaseClient } from "./fake-database-client.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeTemplate(overrides: Partial<DatabaseInstanceTemplate> = {}): DatabaseInstanceTemplate {
  return {
    name: "orders",
    instanceNamePrefix: "stratus-db",
    tier: "db-n1-standard-1",
    region: "us-central1",
    masterUsername: "admin",
    masterUserPassword: "test-secret",
    authorizedNetwork: "0.0.0.0/0",
    tags: {},
    ...overrides,
  };
}

function callsOf(client: FakeDatabaseClient, method: string): string[] {
  return client.calls.filter((c) => c.startsWith(`${method}:`));
}

let client: FakeDatabaseClient;
let messages: string[];
let provider: CloudSqlProvider;

beforeEach(() => {
  client = new FakeDatabaseClient();
  const logger = recordingLogger();
  messages = logger.messages;
  provider = new CloudSqlProvider({
    client,
    databaseVersion: "MYSQL_8_0",
    application: { name: "Stratus", version: "0.1.0" },
    log: logger.log,
    sleep: recordingSleep().sleep,
  });
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("CloudSqlProvider.allocate", () => {
  it("creates instances and then their master users", async () => {
    await provider.allocate(makeTemplate({ tags: { team: "data" } }), ["a", "b"], 2);

    assert.deepEqual(client.calls.filter((c) => !c.startsWith("getOperation:")), [
      "insertInstance:stratus-db-a",
      "insertInstance:stratus-db-b",
      "insertUser:stratus-db-a",
      "insertUser:stratus-db-b",
    ]);
    assert.deepEqual(client.users.get("stratus-db-a"), [{ name: "admin", password: "test-secret" }]);

    const instance = client.instances.get("stratus-db-a");
    assert.ok(instance);
    assert.deepEqual(instance.settings, {
      tier: "db-n1-standard-1",
      ipConfiguration: {
        ipv4Enabled: true,
        authorizedNetworks: [{ name: "authorized-network", value: "0.0.0.0/0" }],
      },
      userLabels: { team: "data", "created-by": "stratus-0-1-0" },
    });
    assert.equal(instance.databaseVersion, "MYSQL_8_0");
  });

  it("adds the master user to instances that already exist", async () => {
    client.instances.set("stratus-db-a", { name: "stratus-db-a", region: "us-central1", settings: { tier: "db-n1-standard-1" } });

    await provider.allocate(makeTemplate(), ["a"], 1);

    assert.deepEqual(callsOf(client, "insertUser"), ["insertUser:stratus-db-a"]);
    assert.equal(client.users.get("stratus-db-a")?.length, 1);
  });

  it("deletes created instances when user creation falls below minCount", async () => {
    client.operationErrors.set("CREATE_USER:stratus-db-b", { code: "INTERNAL_ERROR", message: "User creation failed." });

    await assert.rejects(provider.allocate(makeTemplate(), ["a", "b"], 2), (err) => {
      assert.ok(err instanceof UnrecoverableProviderError);
      assert.equal(err.message, "Problem allocating instances.");
      assert.deepEqual(err.conditions, [
        { key: null, conditions: [{ type: "ERROR", message: "User creation failed." }] },
      ]);
      return true;
    });

    assert.deepEqual(callsOf(client, "deleteInstance"), [
      "deleteInstance:stratus-db-a",
      "deleteInstance:stratus-db-b",
    ]);
    assert.equal(client.instances.size, 0);
  });

  it("does not tear down instances that already existed", async () => {
    client.instances.set("stratus-db-a", { name: "stratus-db-a", region: "us-central1", settings: { tier: "db-n1-standard-1" } });
    client.requestFailures.set("insertInstance:stratus-db-b", remoteError(500, "Backend error"));

    await assert.rejects(provider.allocate(makeTemplate(), ["a", "b"], 2), UnrecoverableProviderError);

    assert.deepEqual(callsOf(client, "deleteInstance"), []);
    assert.ok(client.instances.has("stratus-db-a"));
  });

  it("summarises failed tear down operations", async () => {
    client.operationErrors.set("CREATE_USER:stratus-db-a", { code: "INTERNAL_ERROR", message: "User creation failed." });
    client.operationErrors.set("DELETE:stratus-db-a", { code: "INTERNAL_ERROR", message: "Deletion failed." });

    await assert.rejects(provider.allocate(makeTemplate(), ["a"], 1), (err) => {
      assert.ok(err instanceof UnrecoverableProviderError);
      assert.deepEqual(err.conditions[0].conditions.map((c) => c.message), [
        "User creation failed.",
        "Deletion failed.",
        "0 of the 1 tear down operations completed successfully.",
      ]);
      return true;
    });
  });

  it("logs failures of a partial allocation that meets minCount", async () => {
    client.requestFailures.set("insertInstance:stratus-db-b", remoteError(500, "Backend error"));

    await provider.allocate(makeTemplate(), ["a", "b"], 1);

    assert.ok(client.instances.has("stratus-db-a"));
    assert.ok(messages.includes("Backend error"));
  });

  it("validates bounds and prefix before any call", async () => {
    await assert.rejects(provider.allocate(makeTemplate(), ["a"], 2), InvalidRequestError);
    await assert.rejects(provider.allocate(makeTemplate(), ["a", "a"], 2), {
      name: "InvalidRequestError",
      message: "Instance ids must be unique, got duplicates: a.",
    });
    await assert.rejects(provider.allocate(makeTemplate({ instanceNamePrefix: "DB" }), ["a"], 1), InvalidRequestError);
    assert.deepEqual(client.calls, []);
  });
});

describe("CloudSqlProvider.find", () => {
  it("treats 404 and 403 as absent", async () => {
    client.instances.set("stratus-db-a", {
      name: "stratus-db-a",
      region: "us-central1",
      databaseVersion: "MYSQL_8_0",
      state: "RUNNABLE",
      settings: { tier: "db-n1-standard-2" },
      ipAddresses: [{ type: "OUTGOING", ipAddress: "198.51.100.1" }, { type: "PRIMARY", ipAddress: "203.0.113.9" }],
    });
    client.requestFailures.set("getInstance:stratus-db-c", remoteError(403, "The client is not authorized to make this request."));

    const found = await provider.find(makeTemplate(), ["a", "b", "c"]);

    assert.deepEqual(found, [{
      id: "a",
      name: "stratus-db-a",
      status: "RUNNING",
      tier: "db-n1-standard-2",
      region: "us-central1",
      databaseVersion: "MYSQL_8_0",
      ipAddress: "203.0.113.9",
    }]);
  });

  it("propagates other errors", async () => {
    client.requestFailures.set("getInstance:stratus-db-a", remoteError(500, "Backend error"));

    await assert.rejects(provider.find(makeTemplate(), ["a"]), RemoteRequestError);
  });
});

describe("CloudSqlProvider.getInstanceState", () => {
  it("maps states and reports absent instances as UNKNOWN", async () => {
    const base = { region: "us-central1", settings: { tier: "db-n1-standard-1" } };
    client.instances.set("stratus-db-a", { ...base, name: "stratus-db-a", state: "PENDING_CREATE" });
    client.instances.set("stratus-db-b", { ...base, name: "stratus-db-b", state: "MAINTENANCE" });
    client.requestFailures.set("getInstance:stratus-db-c", remoteError(403, "Forbidden"));

    const states = await provider.getInstanceState(makeTemplate(), ["a", "b", "c", "d"]);

    assert.deepEqual(states, { a: "PENDING", b: "STOPPED", c: "UNKNOWN", d: "UNKNOWN" });
  });

  it("short-circuits an invalid prefix", async () => {
    const states = await provider.getInstanceState(makeTemplate({ instanceNamePrefix: "-db" }), ["a"]);

    assert.deepEqual(states, { a: "UNKNOWN" });
    assert.deepEqual(client.calls, []);
  });
});

describe("toDatabaseStatus", () => {
  it("maps every known state", () => {
    assert.equal(toDatabaseStatus("RUNNABLE"), "RUNNING");
    assert.equal(toDatabaseStatus("SUSPENDED"), "STOPPED");
    assert.equal(toDatabaseStatus("FAILED"), "FAILED");
    assert.equal(toDatabaseStatus("UNKNOWN_STATE"), "UNKNOWN");
  });
});

describe("CloudSqlProvider.delete", () => {
  it("deletes existing instances and ignores missing or busy ones", async () => {
    client.instances.set("stratus-db-a", { name: "stratus-db-a", region: "us-central1", settings: { tier: "db-n1-standard-1" } });
    client.requestFailures.set("deleteInstance:stratus-db-c", remoteError(409, "Operation in progress."));

    await provider.delete(makeTemplate(), ["a", "b", "c"]);

    assert.equal(client.instances.size, 0);
  });

  it("raises accumulated errors", async () => {
    client.requestFailures.set("deleteInstance:stratus-db-a", remoteError(500, "Backend error"));

    await assert.rejects(provider.delete(makeTemplate(), ["a"]), {
      name: "UnrecoverableProviderError",
      message: "Problem deleting instances.",
    });
  });
});
