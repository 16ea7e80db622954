import { ResourceFetcher } from "../discovery/resource-fetcher";
import { SectionResolver } from "../discovery/section-resolver";
import { VendorExtensionResolver, detectVendor } from "../discovery/vendor-extensions";
import type { VendorInfo } from "../discovery/vendor-extensions";
import { SectionWriter } from "../exporters/section-writer";
import type { TextSink } from "../exporters/section-writer";
import { ErrorHandler, ErrorLevel } from "../logging/error-handler";
import { RedfishClient, clientOptionsFromConfig } from "../providers/redfish-client";
import type { RedfishClientOptions } from "../providers/redfish-client";
import type { CollectorConfig } from "../types/schemas";
import { linkTarget } from "../types/redfish";
import type { RedfishResource } from "../types/redfish";
import { CHASSIS_SECTIONS, SYSTEM_SECTIONS } from "../types/sections";
import type { SectionName } from "../types/sections";

export interface CollectionSummary {
  dataModel: string;
  firmwareVersion: string;
  sections: number;
  entries: number;
  requests: number;
  failures: number;
  warnings: number;
}

export interface CollectorDeps {
  client: RedfishClient;
  out: TextSink;
  errors: ErrorHandler;
}

/**
 * One agent run: log in, walk managers, systems, chassis and the firmware
 * inventory, write every result as it comes in, log out.
 */
export class RedfishCollector {
  public readonly fetcher: ResourceFetcher;
  public readonly resolver: SectionResolver;
  public readonly vendor: VendorExtensionResolver;
  public readonly writer: SectionWriter;

  private client: RedfishClient;
  private errors: ErrorHandler;

  constructor(config: CollectorConfig, deps: CollectorDeps) {
    this.client = deps.client;
    this.errors = deps.errors;
    this.writer = new SectionWriter(deps.out);
    this.fetcher = new ResourceFetcher(deps.client, deps.errors);
    this.resolver = new SectionResolver(this.fetcher, this.writer, config.sections, deps.errors);
    this.vendor = new VendorExtensionResolver(this.resolver, deps.errors);
  }

  async collect(): Promise<CollectionSummary> {
    const root = await this.client.login();
    const vendor = await this.walkAndLogout(root);

    const written = this.writer.getStats();
    const fetched = this.fetcher.getStats();
    const summary: CollectionSummary = {
      dataModel: vendor.dataModel,
      firmwareVersion: vendor.firmwareVersion,
      sections: written.sections,
      entries: written.entries,
      requests: fetched.requests,
      failures: fetched.failures,
      warnings: this.errors.getLogs(ErrorLevel.WARN).length
    };
    this.errors.info("Collection finished", { ...summary });
    return summary;
  }

  private async walkAndLogout(root: RedfishResource): Promise<VendorInfo> {
    try {
      return await this.walk(root);
    } finally {
      await this.client.logout();
    }
  }

  private async walk(root: RedfishResource): Promise<VendorInfo> {
    // 1. Managers are always read, the data model decides on OEM extensions
    const managers = await this.topLevel(root, "Managers");
    const vendor = detectVendor(managers);
    this.errors.info(`Data model ${vendor.dataModel}, firmware ${vendor.firmwareVersion || "unknown"}`);
    this.emit("Managers", managers);

    // 2. Systems with their sub-sections and vendor extensions
    const wantsOem = this.vendor.appliesTo(vendor);
    if (this.resolver.wants("Systems") || SYSTEM_SECTIONS.some((n) => this.resolver.needs(n)) || wantsOem) {
      const systems = await this.topLevel(root, "Systems");
      this.emit("Systems", systems);
      for (const system of systems) {
        await this.resolver.resolve(SYSTEM_SECTIONS, system);
        if (wantsOem) {
          await this.vendor.fetchExtraData(vendor, system);
        }
      }
    } else {
      this.errors.debug("Skipping systems, no system section requested");
    }

    // 3. Chassis
    if (this.resolver.wants("Chassis") || CHASSIS_SECTIONS.some((n) => this.resolver.needs(n))) {
      const chassis = await this.topLevel(root, "Chassis");
      this.emit("Chassis", chassis);
      for (const entry of chassis) {
        await this.resolver.resolve(CHASSIS_SECTIONS, entry);
      }
    }

    // 4. Firmware inventory from the update service
    if (this.resolver.wants("FirmwareInventory")) {
      await this.firmwareInventory(root);
    }

    return vendor;
  }

  private async topLevel(root: RedfishResource, key: "Managers" | "Systems" | "Chassis"): Promise<RedfishResource[]> {
    const target = linkTarget(root[key]);
    if (!target) {
      this.errors.debug(`Service root has no ${key} link`);
      return [];
    }
    return this.resolver.fetchSectionData(target, key);
  }

  private async firmwareInventory(root: RedfishResource): Promise<void> {
    const updateLink = linkTarget(root.UpdateService);
    if (!updateLink) {
      this.errors.debug("Service root has no UpdateService link");
      return;
    }
    const updateService = await this.fetcher.fetchData(updateLink, "UpdateService");
    const inventoryLink = linkTarget(updateService.FirmwareInventory);
    if (!inventoryLink) {
      this.errors.debug("UpdateService has no FirmwareInventory link");
      return;
    }
    this.emit("FirmwareInventory", await this.resolver.fetchSectionData(inventoryLink, "FirmwareInventory"));
  }

  private emit(section: SectionName, entries: RedfishResource[]): void {
    if (this.resolver.wants(section)) {
      this.writer.emit({ section, entries });
    }
  }
}

export function createCollector(
  config: CollectorConfig,
  out: TextSink,
  errors: ErrorHandler,
  clientOverrides: Partial<RedfishClientOptions> = {}
): RedfishCollector {
  const client = new RedfishClient({ ...clientOptionsFromConfig(config), ...clientOverrides }, errors);
  return new RedfishCollector(config, { client, out, errors });
}
