import type { FastifyInstance } from "fastify";
import type {
  AllocateResponse,
  ComputeFindResponse,
  DeleteResponse,
  InstanceStateResponse,
} from "@stratus/shared";
import { parseComputeTemplate, type ComputeTemplateDefaults } from "../services/compute-template.js";
import {
  parseAllocateRequest,
  parseInstanceIdsRequest,
  sendProviderError,
} from "./provider-requests.js";

export default async function computeRoutes(fastify: FastifyInstance) {
  const provider = fastify.computeProvider;
  const defaults: ComputeTemplateDefaults = {
    instanceNamePrefix: fastify.pluginConfig.compute.defaultInstanceNamePrefix,
  };

  fastify.post("/api/compute/allocate", {
    preHandler: [fastify.verifyAuth],
  }, async (request, reply) => {
    try {
      const body = parseAllocateRequest(request.body);
      const template = parseComputeTemplate(body.template, defaults);
      await provider.allocate(template, body.instanceIds, body.minCount);
      return { ok: true } satisfies AllocateResponse;
    } catch (err) {
      return sendProviderError(reply, err);
    }
  });

  fastify.post("/api/compute/find", {
    preHandler: [fastify.verifyAuth],
  }, async (request, reply) => {
    try {
      const body = parseInstanceIdsRequest(request.body);
      const template = parseComputeTemplate(body.template, defaults);
      const instances = await provider.find(template, body.instanceIds);
      return { instances } satisfies ComputeFindResponse;
    } catch (err) {
      return sendProviderError(reply, err);
    }
  });

  fastify.post("/api/compute/state", {
    preHandler: [fastify.verifyAuth],
  }, async (request, reply) => {
    try {
      const body = parseInstanceIdsRequest(request.body);
      const template = parseComputeTemplate(body.template, defaults);
      const states = await provider.getInstanceState(template, body.instanceIds);
      return { states } satisfies InstanceStateResponse;
    } catch (err) {
      return sendProviderError(reply, err);
    }
  });

  fastify.post("/api/compute/delete", {
    preHandler: [fastify.verifyAuth],
  }, async (request, reply) => {
    try {
      const body = parseInstanceIdsRequest(request.body);
      const template = parseComputeTemplate(body.template, defaults);
      await provider.delete(template, body.instanceIds);
      return { ok: true } satisfies DeleteResponse;
    } catch (err) {
      return sendProviderError(reply, err);
    }
  });
}
