import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import { GceRestClient } from "../services/gce-client.js";
import { SqlAdminRestClient } from "../services/sqladmin-client.js";
import { GceComputeProvider } from "../services/providers/gce-compute-provider.js";
import { CloudSqlProvider } from "../services/providers/cloud-sql-provider.js";
import type { PollingPolicy } from "../services/operation-poller.js";
import type { ResourceProvider } from "../services/resource-provider.js";
import type { ComputeInstanceTemplate } from "../services/compute-template.js";
import type { DatabaseInstanceTemplate } from "../services/database-template.js";
import type { ComputeInstanceInfo, DatabaseInstanceInfo } from "@stratus/shared";

declare module "fastify" {
  interface FastifyInstance {
    pollingPolicy: PollingPolicy;
    computeProvider: ResourceProvider<ComputeInstanceTemplate, ComputeInstanceInfo>;
    databaseProvider: ResourceProvider<DatabaseInstanceTemplate, DatabaseInstanceInfo>;
  }
}

export default fp(async function provisioningPlugin(fastify: FastifyInstance) {
  const config = fastify.serverConfig;
  const plugin = fastify.pluginConfig;

  if (!config.projectId || !config.accessToken) {
    throw new Error("Provisioning requires GCP_PROJECT_ID and GCP_ACCESS_TOKEN");
  }

  const polling: PollingPolicy = {
    timeoutSeconds: config.pollTimeoutSeconds ?? plugin.polling.timeoutSeconds,
    maxIntervalSeconds: config.pollMaxIntervalSeconds ?? plugin.polling.maxIntervalSeconds,
  };

  const computeProvider = new GceComputeProvider({
    client: new GceRestClient(config.projectId, config.accessToken),
    region: config.region,
    imageAliases: plugin.compute.imageAliases,
    application: plugin.application,
    log: fastify.log,
    polling,
  });

  const databaseProvider = new CloudSqlProvider({
    client: new SqlAdminRestClient(config.projectId, config.accessToken),
    databaseVersion: plugin.database.databaseVersion,
    application: plugin.application,
    log: fastify.log,
    polling,
  });

  fastify.log.info(
    { projectId: config.projectId, region: config.region, ...polling },
    "Provisioning providers ready",
  );

  fastify.decorate("pollingPolicy", polling);
  fastify.decorate("computeProvider", computeProvider);
  fastify.decorate("databaseProvider", databaseProvider);
});
