const PREFIX_PATTERN = /^[a-z][-a-z0-9]*$/;
const MAX_PREFIX_LENGTH = 26;

/**
 * Returns why a name prefix is unusable, or null when it is valid.
 * Valid prefixes are 1–26 characters, start with a lowercase letter and
 * contain only lowercase letters, digits and dashes.
 */
export function checkInstanceNamePrefix(prefix: string | null | undefined): string | null {
  if (prefix == null) {
    return "Instance name prefix must be provided.";
  }
  if (prefix.length < 1 || prefix.length > MAX_PREFIX_LENGTH) {
    return `Instance name prefix must be between 1 and ${MAX_PREFIX_LENGTH} characters.`;
  }
  if (!PREFIX_PATTERN.test(prefix)) {
    return "Instance name prefix must follow this pattern: The first character must be a lowercase letter, and all following characters must be a dash, lowercase letter, or digit.";
  }
  return null;
}

export function isValidInstanceNamePrefix(prefix: string | null | undefined): boolean {
  return checkInstanceNamePrefix(prefix) === null;
}

export function decorateInstanceName(prefix: string, instanceId: string): string {
  return `${prefix}-${instanceId}`;
}

/** `created-by` metadata/label value: lowercase, dashes for anything else. */
export function provenanceLabel(applicationName: string, applicationVersion: string): string {
  return `${applicationName}-${applicationVersion}`
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "-");
}
