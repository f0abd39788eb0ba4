import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { parseDatabaseTemplate } from "../database-template.js";

const DEFAULTS = {
  instanceNamePrefix: "stratus-db",
  regionAliases: { "us-central": "us-central1" },
};

describe("parseDatabaseTemplate", () => {
  it("applies defaults and resolves region aliases", () => {
    const template = parseDatabaseTemplate(
      {
        name: "orders",
        configuration: { region: "us-central", masterUsername: "admin", masterUserPassword: "test-secret" },
      },
      DEFAULTS,
    );

    assert.deepEqual(template, {
      name: "orders",
      instanceNamePrefix: "stratus-db",
      tier: "db-n1-standard-1",
      region: "us-central1",
      masterUsername: "admin",
      masterUserPassword: "test-secret",
      authorizedNetwork: "0.0.0.0/0",
      tags: {},
    });
  });

  it("passes unaliased regions through", () => {
    const template = parseDatabaseTemplate(
      {
        name: "orders",
        configuration: { region: "europe-west4", masterUsername: "admin", masterUserPassword: "test-secret" },
      },
      DEFAULTS,
    );
    assert.equal(template.region, "europe-west4");
  });

  it("requires master credentials", () => {
    assert.throws(
      () => parseDatabaseTemplate({ name: "orders", configuration: {} }, DEFAULTS),
      {
        name: "InvalidRequestError",
        message: "Invalid database template 'orders': masterUsername: masterUsername is required; masterUserPassword: masterUserPassword is required",
      },
    );
  });

  it("limits the master username length", () => {
    assert.throws(
      () => parseDatabaseTemplate(
        { name: "orders", configuration: { masterUsername: "a".repeat(17), masterUserPassword: "test-secret" } },
        DEFAULTS,
      ),
      { message: "Invalid database template 'orders': masterUsername: masterUsername may contain up to 16 characters" },
    );
  });
});
