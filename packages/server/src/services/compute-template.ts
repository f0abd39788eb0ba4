import { z } from "zod";
import type {
  BootDiskType,
  DataDiskType,
  LocalSsdInterfaceType,
  TemplateInput,
} from "@stratus/shared";
import { InvalidRequestError } from "./errors.js";

export interface ComputeInstanceTemplate {
  name: string;
  image: string;
  machineType: string;
  zone: string;
  instanceNamePrefix: string;
  networkName: string;
  networkProject: string | null;
  subnetworkName: string | null;
  assignExternalIps: boolean;
  instanceTags: string[];
  bootDiskType: BootDiskType;
  bootDiskSizeGb: number;
  dataDiskCount: number;
  dataDiskType: DataDiskType;
  dataDiskSizeGb: number;
  localSsdInterfaceType: LocalSsdInterfaceType;
  usePreemptibleInstances: boolean;
  sshUsername: string | null;
  sshPublicKey: string | null;
  tags: Record<string, string>;
}

export interface ComputeTemplateDefaults {
  instanceNamePrefix: string;
}

const integerString = (key: string) =>
  z.string().trim().regex(/^-?\d+$/, `${key} must be an integer`).transform((v) => Number.parseInt(v, 10));

const booleanString = (key: string) =>
  z.enum(["true", "false"], { errorMap: () => ({ message: `${key} must be true or false` }) }).transform((v) => v === "true");

const optionalString = z.string().trim().optional().transform((v) => (v ? v : null));

const computeConfigurationSchema = z.object({
  image: z.string({ required_error: "image is required" }).trim().min(1, "image is required"),
  type: z.string({ required_error: "type is required" }).trim().min(1, "type is required"),
  zone: z.string({ required_error: "zone is required" }).trim().min(1, "zone is required"),
  instanceNamePrefix: z.string().optional(),
  networkName: z.string().trim().min(1).default("default"),
  networkProject: optionalString,
  subnetworkName: optionalString,
  assignExternalIPs: booleanString("assignExternalIPs").default("true"),
  instanceTags: z
    .string()
    .default("")
    .transform((v) => v.split(",").map((t) => t.trim()).filter((t) => t.length > 0)),
  bootDiskType: z.enum(["SSD", "Standard"]).default("SSD"),
  bootDiskSizeGb: integerString("bootDiskSizeGb").default("60"),
  dataDiskCount: integerString("dataDiskCount").default("2"),
  dataDiskType: z.enum(["LocalSSD", "SSD", "Standard"]).default("LocalSSD"),
  dataDiskSizeGb: integerString("dataDiskSizeGb").default("375"),
  localSSDInterfaceType: z.enum(["SCSI", "NVME"]).default("SCSI"),
  usePreemptibleInstances: booleanString("usePreemptibleInstances").default("false"),
  sshUsername: optionalString,
  sshOpenSshPublicKey: optionalString,
});

/** Formats zod issues as `key: message` pairs. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Applies defaults and parses the typed template. Malformed values raise
 * InvalidRequestError; the name prefix is kept as given so that callers can
 * decide how an invalid one is handled.
 */
export function parseComputeTemplate(
  input: TemplateInput,
  defaults: ComputeTemplateDefaults,
): ComputeInstanceTemplate {
  const result = computeConfigurationSchema.safeParse(input.configuration);
  if (!result.success) {
    throw new InvalidRequestError(`Invalid compute template '${input.name}': ${describeIssues(result.error)}`);
  }
  const c = result.data;
  if (c.dataDiskCount < 0) {
    throw new InvalidRequestError(`Invalid compute template '${input.name}': dataDiskCount must not be negative`);
  }

  return {
    name: input.name,
    image: c.image,
    machineType: c.type,
    zone: c.zone,
    instanceNamePrefix: c.instanceNamePrefix ?? defaults.instanceNamePrefix,
    networkName: c.networkName,
    networkProject: c.networkProject,
    subnetworkName: c.subnetworkName,
    assignExternalIps: c.assignExternalIPs,
    instanceTags: c.instanceTags,
    bootDiskType: c.bootDiskType,
    bootDiskSizeGb: c.bootDiskSizeGb,
    dataDiskCount: c.dataDiskCount,
    dataDiskType: c.dataDiskType,
    dataDiskSizeGb: c.dataDiskSizeGb,
    localSsdInterfaceType: c.localSSDInterfaceType,
    usePreemptibleInstances: c.usePreemptibleInstances,
    sshUsername: c.sshUsername,
    sshPublicKey: c.sshOpenSshPublicKey,
    tags: input.tags ?? {},
  };
}
