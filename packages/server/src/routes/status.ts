import type { FastifyInstance } from "fastify";
import type { StatusResponse } from "@stratus/shared";

export default async function statusRoutes(fastify: FastifyInstance) {
  fastify.get("/api/status", async () => {
    const { serverConfig, pluginConfig, pollingPolicy } = fastify;
    return {
      application: pluginConfig.application,
      projectId: serverConfig.projectId ?? "",
      region: serverConfig.region,
      imageAliases: Object.keys(pluginConfig.compute.imageAliases).sort(),
      polling: pollingPolicy,
    } satisfies StatusResponse;
  });
}
