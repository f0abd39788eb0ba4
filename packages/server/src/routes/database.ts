import type { FastifyInstance } from "fastify";
import type {
  AllocateResponse,
  DatabaseFindResponse,
  DeleteResponse,
  InstanceStateResponse,
} from "@stratus/shared";
import { parseDatabaseTemplate, type DatabaseTemplateDefaults } from "../services/database-template.js";
import {
  parseAllocateRequest,
  parseInstanceIdsRequest,
  sendProviderError,
} from "./provider-requests.js";

export default async function databaseRoutes(fastify: FastifyInstance) {
  const provider = fastify.databaseProvider;
  const defaults: DatabaseTemplateDefaults = {
    instanceNamePrefix: fastify.pluginConfig.database.defaultInstanceNamePrefix,
    regionAliases: fastify.pluginConfig.database.regionAliases,
  };

  fastify.post("/api/database/allocate", {
    preHandler: [fastify.verifyAuth],
  }, async (request, reply) => {
    try {
      const body = parseAllocateRequest(request.body);
      const template = parseDatabaseTemplate(body.template, defaults);
      await provider.allocate(template, body.instanceIds, body.minCount);
      return { ok: true } satisfies AllocateResponse;
    } catch (err) {
      return sendProviderError(reply, err);
    }
  });

  fastify.post("/api/database/find", {
    preHandler: [fastify.verifyAuth],
  }, async (request, reply) => {
    try {
      const body = parseInstanceIdsRequest(request.body);
      const template = parseDatabaseTemplate(body.template, defaults);
      const instances = await provider.find(template, body.instanceIds);
      return { instances } satisfies DatabaseFindResponse;
    } catch (err) {
      return sendProviderError(reply, err);
    }
  });

  fastify.post("/api/database/state", {
    preHandler: [fastify.verifyAuth],
  }, async (request, reply) => {
    try {
      const body = parseInstanceIdsRequest(request.body);
      const template = parseDatabaseTemplate(body.template, defaults);
      const states = await provider.getInstanceState(template, body.instanceIds);
      return { states } satisfies InstanceStateResponse;
    } catch (err) {
      return sendProviderError(reply, err);
    }
  });

  fastify.post("/api/database/delete", {
    preHandler: [fastify.verifyAuth],
  }, async (request, reply) => {
    try {
      const body = parseInstanceIdsRequest(request.body);
      const template = parseDatabaseTemplate(body.template, defaults);
      await provider.delete(template, body.instanceIds);
      return { ok: true } satisfies DeleteResponse;
    } catch (err) {
      return sendProviderError(reply, err);
    }
  });
}
