/*
systemd unit files.

A unit is a list of sections, each an ordered list of key/value pairs, so
the rendered file is stable across runs and keys may repeat (Wants=, After=).
*/

import { MANAGED_HEADER } from "./hcl";

export type UnitEntry = [key: string, value: string];

export type UnitDescriptor = {
  Unit: UnitEntry[];
  Service: UnitEntry[];
  Install: UnitEntry[];
};

const SECTION_ORDER: (keyof UnitDescriptor)[] = ["Unit", "Service", "Install"];

export function renderUnit(unit: UnitDescriptor): string {
  const sections = SECTION_ORDER.filter((name) => unit[name].length > 0).map((name) => {
    const lines = unit[name].map(([key, value]) => {
      if (/[\r\n]/.test(value)) {
        throw new Error(`unit value for ${key} must be a single line`);
      }
      return `${key}=${value}`;
    });
    return [`[${name}]`, ...lines].join("\n");
  });
  return `${MANAGED_HEADER}\n${sections.join("\n\n")}\n`;
}
