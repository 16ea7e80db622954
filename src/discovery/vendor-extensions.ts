import { ErrorHandler } from "../logging/error-handler";
import { childResource, isRedfishResource, stringField } from "../types/redfish";
import type { RedfishResource } from "../types/redfish";
import { HPE_SECTIONS } from "../types/sections";
import { SectionResolver } from "./section-resolver";

/** `Hpe` on iLO 5 and later, `Hp` on iLO 4. */
export const HPE_DATA_MODELS = ["Hpe", "Hp"] as const;

export const UNKNOWN_DATA_MODEL = "Unknown";

export interface VendorInfo {
  dataModel: string;
  firmwareVersion: string;
}

/**
 * The data model is the first `Oem` key of a manager; with several managers
 * the last one decides. The firmware version is the first one reported.
 */
export function detectVendor(managers: readonly RedfishResource[]): VendorInfo {
  let dataModel = UNKNOWN_DATA_MODEL;
  let firmwareVersion = "";

  for (const manager of managers) {
    const oem = childResource(manager, "Oem");
    const keys = oem ? Object.keys(oem) : [];
    dataModel = keys.length > 0 ? keys[0] : UNKNOWN_DATA_MODEL;
    if (!firmwareVersion) {
      firmwareVersion = stringField(manager, "FirmwareVersion") ?? "";
    }
  }

  return { dataModel, firmwareVersion };
}

export function isHpeDataModel(dataModel: string): boolean {
  return HPE_DATA_MODELS.some((model) => model === dataModel);
}

/** Fetches the OEM link sets that sit outside the standard resource graph. */
export class VendorExtensionResolver {
  private resolver: SectionResolver;
  private errors: ErrorHandler;

  constructor(resolver: SectionResolver, errors: ErrorHandler) {
    this.resolver = resolver;
    this.errors = errors;
  }

  appliesTo(vendor: VendorInfo): boolean {
    return isHpeDataModel(vendor.dataModel) && HPE_SECTIONS.some((node) => this.resolver.needs(node));
  }

  async fetchExtraData(vendor: VendorInfo, system: RedfishResource): Promise<void> {
    if (!this.appliesTo(vendor)) {
      return;
    }
    const oem = childResource(system, "Oem");
    const vendorData = oem?.[vendor.dataModel];
    const links = isRedfishResource(vendorData) ? childResource(vendorData, "Links") : undefined;
    if (!links) {
      this.errors.debug(`No ${vendor.dataModel} OEM links on ${stringField(system, "@odata.id") ?? "system"}`);
      return;
    }
    await this.resolver.resolve(HPE_SECTIONS, links);
  }
}
