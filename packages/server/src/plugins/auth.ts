import fp from "fastify-plugin";
import { timingSafeEqual } from "node:crypto";
import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";

declare module "fastify" {
  interface FastifyInstance {
    verifyAuth: (
      request: FastifyRequest,
      reply: FastifyReply,
    ) => Promise<void>;
  }
}

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided, "utf-8");
  const b = Buffer.from(expected, "utf-8");
  return a.length === b.length && timingSafeEqual(a, b);
}

export default fp(async function authPlugin(fastify: FastifyInstance) {
  const configToken = fastify.serverConfig.authToken;

  async function verifyAuth(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<void> {
    const header = request.headers.authorization;
    if (configToken && header?.startsWith("Bearer ")) {
      if (tokensMatch(header.slice(7), configToken)) return;
    }

    reply
      .status(401)
      .send({ error: "Missing or invalid authentication credentials" });
  }

  fastify.decorate("verifyAuth", verifyAuth);
});
