/**
 * Section catalog: every data category the agent can collect, where it hangs
 * in the resource graph and which agent section it is written to.
 */

export const SECTION_NAMES = [
  "Systems",
  "Chassis",
  "Managers",
  "FirmwareInventory",
  "EthernetInterfaces",
  "NetworkInterfaces",
  "Processors",
  "Memory",
  "Storage",
  "SimpleStorage",
  "Drives",
  "Volumes",
  "NetworkAdapters",
  "Power",
  "Thermal",
  "Sensors",
  "SmartStorage",
  "ArrayControllers",
  "HostBusAdapters",
  "LogicalDrives",
  "PhysicalDrives",
] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

export interface SectionNode {
  name: SectionName;
  /** Look the link up in the resource's `Links` object instead of at the top level. */
  inLinks?: boolean;
  children?: readonly SectionNode[];
}

export const SYSTEM_SECTIONS: readonly SectionNode[] = [
  { name: "EthernetInterfaces" },
  { name: "NetworkInterfaces" },
  { name: "Processors" },
  { name: "Memory" },
  {
    name: "Storage",
    children: [{ name: "Drives" }, { name: "Volumes" }],
  },
  { name: "SimpleStorage" },
];

export const CHASSIS_SECTIONS: readonly SectionNode[] = [
  { name: "NetworkAdapters" },
  { name: "Power" },
  { name: "Thermal" },
  { name: "Sensors" },
];

// Resolved against `Oem.<model>.Links` of a system
export const HPE_SECTIONS: readonly SectionNode[] = [
  {
    name: "SmartStorage",
    children: [
      {
        name: "ArrayControllers",
        inLinks: true,
        children: [
          { name: "LogicalDrives", inLinks: true },
          { name: "PhysicalDrives", inLinks: true },
        ],
      },
      { name: "HostBusAdapters", inLinks: true },
    ],
  },
];

const OUTPUT_NAMES: Partial<Record<SectionName, string>> = {
  Systems: "redfish_system",
  Managers: "redfish_manager",
  FirmwareInventory: "redfish_firmware",
};

export function outputSectionName(section: SectionName): string {
  return OUTPUT_NAMES[section] ?? `redfish_${section.toLowerCase()}`;
}

export const SECTION_DESCRIPTIONS: Record<SectionName, string> = {
  Systems: "Computer systems (service root)",
  Chassis: "Chassis (service root)",
  Managers: "Management controllers (service root)",
  FirmwareInventory: "Firmware inventory (update service)",
  EthernetInterfaces: "Host ethernet interfaces (system)",
  NetworkInterfaces: "Network interfaces (system)",
  Processors: "Processors (system)",
  Memory: "Memory modules (system)",
  Storage: "Storage subsystems (system)",
  SimpleStorage: "Simple storage controllers (system)",
  Drives: "Physical drives (storage)",
  Volumes: "Logical volumes (storage)",
  NetworkAdapters: "Network adapters (chassis)",
  Power: "Power supplies, voltages and consumption (chassis)",
  Thermal: "Temperatures and fans (chassis)",
  Sensors: "Sensor collection (chassis)",
  SmartStorage: "HPE Smart Storage (OEM)",
  ArrayControllers: "HPE Smart Array controllers (OEM)",
  HostBusAdapters: "HPE host bus adapters (OEM)",
  LogicalDrives: "HPE logical drives (OEM)",
  PhysicalDrives: "HPE physical drives (OEM)",
};

export function isSectionName(value: string): value is SectionName {
  return SECTION_NAMES.some((name) => name === value);
}

/** Every section name in the subtree rooted at each node. */
export function sectionsIn(nodes: readonly SectionNode[]): SectionName[] {
  return nodes.flatMap((node) => [node.name, ...sectionsIn(node.children ?? [])]);
}
