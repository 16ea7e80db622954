import { isRedfishResource, stringField } from "../types/redfish";
import type { RedfishResource } from "../types/redfish";

const HEADER = /^<<<([^:>]+)(?::[^>]*)?>>>$/;

const HPE_DRIVE_TYPES = ["SmartStorageDiskDrive", "SmartStorageLogicalDrive"];
const HPE_DRIVE_SEGMENTS = ["DiskDrives", "LogicalDrives"];

export type AgentSections = Map<string, RedfishResource[]>;

/**
 * Splits agent output into its sections. Repeated headers append to the same
 * section; lines that are not JSON objects are dropped.
 */
export function parseAgentOutput(text: string): AgentSections {
  const sections: AgentSections = new Map();
  let current: RedfishResource[] | undefined;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }
    const header = HEADER.exec(line);
    if (header) {
      const name = header[1];
      current = sections.get(name) ?? [];
      sections.set(name, current);
      continue;
    }
    if (!current) {
      continue;
    }
    const entry = parseLine(line);
    if (entry) {
      current.push(entry);
    }
  }

  return sections;
}

function parseLine(line: string): RedfishResource | undefined {
  try {
    const value: unknown = JSON.parse(line);
    return isRedfishResource(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/** Single-resource sections: the first entry. */
export function parseRedfish(entries: readonly RedfishResource[]): RedfishResource | undefined {
  return entries[0];
}

/**
 * `ArrayControllers/0/LogicalDrives/1/` becomes `0:1`. Paths outside the
 * Smart Storage drive collections give an empty name.
 */
export function redfishItemHpe(entry: RedfishResource): string {
  const id = stringField(entry, "@odata.id") ?? "";
  const segments = id.replace(/^\/+|\/+$/g, "").split("/");
  if (segments.length >= 3 && HPE_DRIVE_SEGMENTS.some((s) => segments.includes(s))) {
    return `${segments[segments.length - 3]}:${segments[segments.length - 1]}`;
  }
  return "";
}

export function itemName(entry: RedfishResource): string | undefined {
  const type = stringField(entry, "@odata.type") ?? "";
  if (HPE_DRIVE_TYPES.some((t) => type.includes(t))) {
    return redfishItemHpe(entry) || undefined;
  }
  const id = entry.Id;
  if (typeof id === "string" || typeof id === "number") {
    return String(id);
  }
  return undefined;
}

/** Item name to entry; the first entry of an item wins. */
export function parseRedfishMultiple(entries: readonly RedfishResource[]): Map<string, RedfishResource> {
  const items = new Map<string, RedfishResource>();
  for (const entry of entries) {
    const item = itemName(entry);
    if (item !== undefined && !items.has(item)) {
      items.set(item, entry);
    }
  }
  return items;
}
