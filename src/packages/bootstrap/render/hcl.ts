// HCL string literals share JSON's escaping rules for everything we emit.
export function hclString(value: string): string {
  return JSON.stringify(value);
}

export function hclBool(value: boolean): string {
  return value ? "true" : "false";
}

export const MANAGED_HEADER = "# Managed by clusterboot. Local edits are overwritten on the next apply.";
