import type { BootDiskType, DataDiskType } from "@stratus/shared";

export const COMPUTE_RESOURCE_BASE = "https://www.googleapis.com/compute/v1";

const DISK_TYPE_SLUGS: Record<BootDiskType | DataDiskType, string> = {
  LocalSSD: "local-ssd",
  SSD: "pd-ssd",
  Standard: "pd-standard",
};

export function projectUrl(projectId: string): string {
  return `${COMPUTE_RESOURCE_BASE}/projects/${projectId}`;
}

export function zoneUrl(projectId: string, zone: string): string {
  return `${projectUrl(projectId)}/zones/${zone}`;
}

export function machineTypeUrl(projectId: string, zone: string, machineType: string): string {
  return `${zoneUrl(projectId, zone)}/machineTypes/${machineType}`;
}

export function diskTypeUrl(
  projectId: string,
  zone: string,
  diskType: BootDiskType | DataDiskType,
): string {
  return `${zoneUrl(projectId, zone)}/diskTypes/${DISK_TYPE_SLUGS[diskType]}`;
}

export function diskUrl(projectId: string, zone: string, diskName: string): string {
  return `${zoneUrl(projectId, zone)}/disks/${diskName}`;
}

export function instanceUrl(projectId: string, zone: string, instanceName: string): string {
  return `${zoneUrl(projectId, zone)}/instances/${instanceName}`;
}

export function networkUrl(projectId: string, networkName: string): string {
  return `${projectUrl(projectId)}/global/networks/${networkName}`;
}

export function subnetworkUrl(projectId: string, region: string, subnetworkName: string): string {
  return `${projectUrl(projectId)}/regions/${region}/subnetworks/${subnetworkName}`;
}
