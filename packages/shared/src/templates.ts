/**
 * A resource template as submitted by a caller: a name, the raw string
 * configuration properties, and user-defined tags. The server applies
 * defaults and parses the typed form.
 */
export interface TemplateInput {
  name: string;
  configuration: Record<string, string>;
  tags?: Record<string, string>;
}

export type BootDiskType = "SSD" | "Standard";
export type DataDiskType = "LocalSSD" | "SSD" | "Standard";
export type LocalSsdInterfaceType = "SCSI" | "NVME";
