import { z } from "zod";
import type { FastifyReply } from "fastify";
import type {
  AllocateRequest,
  ErrorResponse,
  InstanceIdsRequest,
} from "@stratus/shared";
import { describeIssues } from "../services/compute-template.js";
import {
  InvalidRequestError,
  RemoteRequestError,
  UnrecoverableProviderError,
} from "../services/errors.js";

const templateInputSchema = z.object({
  name: z.string().min(1),
  configuration: z.record(z.string()),
  tags: z.record(z.string()).optional(),
});

const instanceIdsSchema = z.array(z.string().min(1));

const instanceIdsRequestSchema = z.object({
  template: templateInputSchema,
  instanceIds: instanceIdsSchema,
});

const allocateRequestSchema = instanceIdsRequestSchema.extend({
  minCount: z.number(),
});

export function parseAllocateRequest(body: unknown): AllocateRequest {
  const result = allocateRequestSchema.safeParse(body);
  if (!result.success) throw new InvalidRequestError(`Invalid request: ${describeIssues(result.error)}`);
  return result.data;
}

export function parseInstanceIdsRequest(body: unknown): InstanceIdsRequest {
  const result = instanceIdsRequestSchema.safeParse(body);
  if (!result.success) throw new InvalidRequestError(`Invalid request: ${describeIssues(result.error)}`);
  return result.data;
}

/** Maps provider errors to HTTP responses; anything else is rethrown. */
export function sendProviderError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof InvalidRequestError) {
    return reply.status(400).send({ error: err.message } satisfies ErrorResponse);
  }
  if (err instanceof UnrecoverableProviderError) {
    return reply
      .status(502)
      .send({ error: err.message, conditions: err.conditions } satisfies ErrorResponse);
  }
  if (err instanceof RemoteRequestError) {
    reply.log.warn({ status: err.status }, err.message);
    return reply.status(502).send({ error: err.message } satisfies ErrorResponse);
  }
  throw err;
}
