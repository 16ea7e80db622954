import type { RedfishResource } from "../types/redfish";
import { stringField } from "../types/redfish";
import { outputSectionName } from "../types/sections";
import type { SectionName } from "../types/sections";
import { redfishHealthState, State, STATE_LABELS, worstState } from "./health";
import { parseRedfishMultiple } from "./parse";
import type { AgentSections } from "./parse";
import { checkVolume, discoverVolumes } from "./volumes";
import type { CheckResult } from "./volumes";

export interface ServiceResult {
  section: string;
  item: string;
  service: string;
  state: State;
  results: CheckResult[];
}

interface ServiceCheck {
  section: SectionName;
  label: string;
  describe?: (entry: RedfishResource) => string | undefined;
}

const SERVICE_CHECKS: readonly ServiceCheck[] = [
  { section: "Systems", label: "System" },
  { section: "Managers", label: "Manager" },
  { section: "Chassis", label: "Chassis" },
  { section: "Processors", label: "CPU", describe: (e) => stringField(e, "Model") },
  { section: "Memory", label: "Memory" },
  { section: "Storage", label: "Storage" },
  { section: "SimpleStorage", label: "Simple Storage" },
  { section: "Drives", label: "Drive", describe: (e) => stringField(e, "Model") },
  { section: "Volumes", label: "Volume" },
  { section: "EthernetInterfaces", label: "Ethernet Interface" },
  { section: "NetworkInterfaces", label: "Network Interface" },
  { section: "NetworkAdapters", label: "Network Adapter" },
  { section: "ArrayControllers", label: "Array Controller" },
  { section: "LogicalDrives", label: "Logical Drive" },
  { section: "PhysicalDrives", label: "Physical Drive" },
  {
    section: "FirmwareInventory",
    label: "Firmware",
    describe: (e) => {
      const version = stringField(e, "Version");
      return version ? `Version: ${version}` : undefined;
    }
  }
];

function healthCheck(check: ServiceCheck, entry: RedfishResource): CheckResult[] {
  const health = redfishHealthState(entry.Status);
  const description = check.describe?.(entry);
  return description
    ? [{ state: State.OK, summary: description }, { state: health.state, summary: health.text }]
    : [{ state: health.state, summary: health.text }];
}

/** Discovers and checks every item of the known multi-item sections. */
export function runChecks(sections: AgentSections): ServiceResult[] {
  const services: ServiceResult[] = [];

  for (const check of SERVICE_CHECKS) {
    const name = outputSectionName(check.section);
    const entries = sections.get(name);
    if (!entries) {
      continue;
    }
    const items = parseRedfishMultiple(entries);
    const discovered = check.section === "Volumes" ? discoverVolumes(items) : Array.from(items.keys());

    for (const item of discovered) {
      const entry = items.get(item);
      if (!entry) {
        continue;
      }
      const results = check.section === "Volumes" ? checkVolume(item, items) : healthCheck(check, entry);
      services.push({
        section: name,
        item,
        service: `${check.label} ${item}`,
        state: worstState(results.map((r) => r.state)),
        results
      });
    }
  }

  return services;
}

export function formatServiceResults(services: readonly ServiceResult[]): string {
  const lines: string[] = [];
  for (const service of services) {
    const summary = service.results
      .map((r) => r.summary)
      .filter((s): s is string => s !== undefined)
      .join(", ");
    lines.push(`[${STATE_LABELS[service.state]}] ${service.service}${summary ? ` - ${summary}` : ""}`);
    for (const result of service.results) {
      if (result.notice) {
        lines.push(`    ${result.notice}`);
      }
    }
  }
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}
