import type { RedfishResource } from "../types/redfish";
import { redfishHealthState, State } from "./health";

export interface CheckResult {
  state: State;
  summary?: string;
  notice?: string;
}

const GIB = 1024 * 1024 * 1024;

/** Whole number, exact halves to the even neighbour. */
export function roundHalfEven(value: number): number {
  const rounded = Math.round(value);
  return Math.abs(value % 1) === 0.5 && rounded % 2 !== 0 ? rounded - 1 : rounded;
}

export function discoverVolumes(section: ReadonlyMap<string, RedfishResource>): string[] {
  return Array.from(section.values())
    .map((entry) => entry.Id)
    .filter((id): id is string | number => typeof id === "string" || typeof id === "number")
    .map(String);
}

export function checkVolume(item: string, section: ReadonlyMap<string, RedfishResource>): CheckResult[] {
  const data = section.get(item);
  if (!data) {
    return [];
  }

  const raidType = typeof data.RAIDType === "string" ? data.RAIDType : "None";
  const capacity = Number(data.CapacityBytes ?? 0);
  const size = Number.isFinite(capacity) ? capacity / GIB : 0;
  const health = redfishHealthState(data.Status);

  return [
    { state: State.OK, summary: `Raid Type: ${raidType}, Size: ${roundHalfEven(size)}GB` },
    { state: health.state, notice: health.text }
  ];
}
