import type { ServiceResult } from "../checks/services";
import { processRedfishPerfdata, toFloat } from "../checks/perfdata";
import type { AgentSections } from "../checks/parse";
import { isRedfishResource, stringField } from "../types/redfish";
import type { JsonValue, RedfishResource } from "../types/redfish";
import { outputSectionName } from "../types/sections";
import { OpenMetricsExporter } from "./openmetrics";

/** `/redfish/v1/Chassis/1/Thermal` → `1` */
export function chassisIdFromPath(path: string): string {
  const segments = path.split("/").filter((s) => s.length > 0);
  const index = segments.indexOf("Chassis");
  return index >= 0 && index + 1 < segments.length ? segments[index + 1] : "";
}

function sensors(value: JsonValue | undefined): RedfishResource[] {
  return Array.isArray(value) ? value.filter(isRedfishResource) : [];
}

function sensorName(sensor: RedfishResource, fallback: string): string {
  return stringField(sensor, "Name") || stringField(sensor, "FanName") || stringField(sensor, "MemberId") || fallback;
}

function addReadings(
  exporter: OpenMetricsExporter,
  family: { name: string; help: string; unit?: string },
  chassis: string,
  entries: RedfishResource[],
  extraLabels: (sensor: RedfishResource) => Record<string, string> = () => ({})
): void {
  entries.forEach((sensor, index) => {
    const perf = processRedfishPerfdata(sensor);
    if (perf.value === null) {
      return;
    }
    exporter.addGauge(
      family.name,
      family.help,
      perf.value,
      { chassis, sensor: sensorName(sensor, String(index)), ...extraLabels(sensor) },
      family.unit
    );
  });
}

/** Readings of the Power and Thermal sections plus one health gauge per checked service. */
export function buildMetrics(
  sections: AgentSections,
  services: readonly ServiceResult[],
  exporter: OpenMetricsExporter = new OpenMetricsExporter()
): OpenMetricsExporter {
  for (const thermal of sections.get(outputSectionName("Thermal")) ?? []) {
    const chassis = chassisIdFromPath(stringField(thermal, "@odata.id") ?? "");
    addReadings(
      exporter,
      { name: "redfish_temperature_celsius", help: "Temperature sensor reading.", unit: "celsius" },
      chassis,
      sensors(thermal.Temperatures)
    );
    addReadings(
      exporter,
      { name: "redfish_fan_speed", help: "Fan speed reading in the unit the BMC reports." },
      chassis,
      sensors(thermal.Fans),
      (fan) => ({ units: stringField(fan, "ReadingUnits") ?? "" })
    );
  }

  for (const power of sections.get(outputSectionName("Power")) ?? []) {
    const chassis = chassisIdFromPath(stringField(power, "@odata.id") ?? "");
    addReadings(
      exporter,
      { name: "redfish_voltage_volts", help: "Voltage sensor reading.", unit: "volts" },
      chassis,
      sensors(power.Voltages)
    );
    sensors(power.PowerControl).forEach((control, index) => {
      const watts = toFloat(control.PowerConsumedWatts);
      if (watts === null) {
        return;
      }
      exporter.addGauge(
        "redfish_power_consumed_watts",
        "Power consumed as reported by the power control.",
        watts,
        { chassis, control: sensorName(control, String(index)) },
        "watts"
      );
    });
  }

  for (const manager of sections.get(outputSectionName("Managers")) ?? []) {
    exporter.addInfo("redfish_manager", "Management controller firmware.", {
      manager: stringField(manager, "Id") ?? "",
      firmware_version: stringField(manager, "FirmwareVersion") ?? ""
    });
  }

  for (const service of services) {
    exporter.addGauge(
      "redfish_health_state",
      "Monitoring state of the item (0 OK, 1 WARN, 2 CRIT, 3 UNKNOWN).",
      service.state,
      { section: service.section, item: service.item }
    );
  }

  return exporter;
}
