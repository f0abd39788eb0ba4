import { z } from "zod";
import type { TemplateInput } from "@stratus/shared";
import { describeIssues } from "./compute-template.js";
import { InvalidRequestError } from "./errors.js";

export interface DatabaseInstanceTemplate {
  name: string;
  instanceNamePrefix: string;
  tier: string;
  region: string;
  masterUsername: string;
  masterUserPassword: string;
  authorizedNetwork: string;
  tags: Record<string, string>;
}

export interface DatabaseTemplateDefaults {
  instanceNamePrefix: string;
  /** Short region names accepted in templates, mapped to API regions. */
  regionAliases: Record<string, string>;
}

const databaseConfigurationSchema = z.object({
  instanceNamePrefix: z.string().optional(),
  tier: z.string().trim().min(1).default("db-n1-standard-1"),
  region: z.string().trim().min(1).default("us-central1"),
  masterUsername: z
    .string({ required_error: "masterUsername is required" })
    .min(1, "masterUsername is required")
    .max(16, "masterUsername may contain up to 16 characters"),
  masterUserPassword: z
    .string({ required_error: "masterUserPassword is required" })
    .min(1, "masterUserPassword is required")
    .max(16, "masterUserPassword may contain up to 16 characters"),
  authorizedNetwork: z.string().trim().min(1).default("0.0.0.0/0"),
});

export function parseDatabaseTemplate(
  input: TemplateInput,
  defaults: DatabaseTemplateDefaults,
): DatabaseInstanceTemplate {
  const result = databaseConfigurationSchema.safeParse(input.configuration);
  if (!result.success) {
    throw new InvalidRequestError(`Invalid database template '${input.name}': ${describeIssues(result.error)}`);
  }
  const c = result.data;

  return {
    name: input.name,
    instanceNamePrefix: c.instanceNamePrefix ?? defaults.instanceNamePrefix,
    tier: c.tier,
    region: Object.hasOwn(defaults.regionAliases, c.region) ? defaults.regionAliases[c.region] : c.region,
    masterUsername: c.masterUsername,
    masterUserPassword: c.masterUserPassword,
    authorizedNetwork: c.authorizedNetwork,
    tags: input.tags ?? {},
  };
}
