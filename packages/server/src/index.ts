import Fastify from "fastify";
import { loadConfig, validateConfig, type ServerConfig } from "./config.js";
import { loadPluginConfig, type PluginConfig } from "./services/plugin-config.js";
import authPlugin from "./plugins/auth.js";
import provisioningPlugin from "./plugins/provisioning.js";
import computeRoutes from "./routes/compute.js";
import databaseRoutes from "./routes/database.js";
import statusRoutes from "./routes/status.js";

declare module "fastify" {
  interface FastifyInstance {
    serverConfig: ServerConfig;
    pluginConfig: PluginConfig;
  }
}

async function main() {
  const config = loadConfig();

  // Validate config before constructing the server
  const issues = validateConfig(config);
  for (const issue of issues) {
    if (issue.level === "error") {
      console.error(`Config error: ${issue.message}`);
    } else {
      console.warn(`Config warning: ${issue.message}`);
    }
  }
  if (issues.some((i) => i.level === "error")) {
    process.exit(1);
  }

  const pluginConfig = await loadPluginConfig(config.pluginConfigPath);

  const fastify = Fastify({
    logger: {
      level: "info",
      transport: {
        target: "pino-pretty",
        options: { translateTime: "HH:MM:ss Z", ignore: "pid,hostname" },
      },
    },
  });

  fastify.decorate("serverConfig", config);
  fastify.decorate("pluginConfig", pluginConfig);

  // Plugins (auth and providers before routes)
  await fastify.register(authPlugin);
  await fastify.register(provisioningPlugin);

  await fastify.register(statusRoutes);
  await fastify.register(computeRoutes);
  await fastify.register(databaseRoutes);

  await fastify.listen({ port: config.port, host: config.host });
  fastify.log.info(
    `${pluginConfig.application.name} provisioner listening on http://localhost:${config.port}`,
  );
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
