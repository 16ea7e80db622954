import type { JsonValue, RedfishResource } from "../types/redfish";
import { stringField } from "../types/redfish";

/** [warn, crit] */
export type Levels = [number, number] | null;

export interface Perfdata {
  name: string;
  value: number | null;
  levelsUpper: Levels;
  levelsLower: Levels;
  boundaries: [number | null, number | null];
}

const READING_KEYS = ["Reading", "ReadingVolts", "ReadingCelsius", "ReadingRPM"];

export function toFloat(value: JsonValue | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

function optionalLevels(warn: number | null, crit: number | null): Levels {
  return warn !== null && crit !== null ? [warn, crit] : null;
}

/**
 * Reading, reading range and thresholds of one sensor entry. A missing warn
 * level takes the crit level; a warn level without crit gets an unbounded one.
 */
export function processRedfishPerfdata(entry: RedfishResource): Perfdata {
  const readingKey = READING_KEYS.find((key) => key in entry);
  const value = readingKey ? toFloat(entry[readingKey]) : 0;

  let lowerWarn = toFloat(entry.LowerThresholdNonCritical);
  let lowerCrit = toFloat(entry.LowerThresholdCritical);
  let upperWarn = toFloat(entry.UpperThresholdNonCritical);
  let upperCrit = toFloat(entry.UpperThresholdCritical);

  if (lowerWarn === null && lowerCrit !== null) {
    lowerWarn = lowerCrit;
  }
  if (upperWarn === null && upperCrit !== null) {
    upperWarn = upperCrit;
  }
  if (lowerWarn !== null && lowerCrit === null) {
    lowerCrit = -Infinity;
  }
  if (upperWarn !== null && upperCrit === null) {
    upperCrit = Infinity;
  }

  return {
    name: stringField(entry, "Name") ?? "",
    value,
    levelsUpper: optionalLevels(upperWarn, upperCrit),
    levelsLower: optionalLevels(lowerWarn, lowerCrit),
    boundaries: [toFloat(entry.MinReadingRange), toFloat(entry.MaxReadingRange)]
  };
}
