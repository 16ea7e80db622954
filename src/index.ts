export { RedfishCollector, createCollector } from "./core/collector";
export type { CollectionSummary, CollectorDeps } from "./core/collector";
export { runAgent } from "./core/agent";
export { RedfishClient, clientOptionsFromConfig } from "./providers/redfish-client";
export type { RedfishClientOptions, RedfishResponse } from "./providers/redfish-client";
export { ResourceFetcher } from "./discovery/resource-fetcher";
export { SectionResolver } from "./discovery/section-resolver";
export type { SectionResult, SectionSink } from "./discovery/section-resolver";
export { VendorExtensionResolver, detectVendor, isHpeDataModel } from "./discovery/vendor-extensions";
export { SectionWriter, formatSection } from "./exporters/section-writer";
export { SettingsManager, readConfigFile } from "./config/settings";
export { ErrorHandler, ErrorLevel } from "./logging/error-handler";
export * from "./logging/errors";
export * from "./types/schemas";
export * from "./types/sections";
export type { JsonValue, RedfishResource } from "./types/redfish";
export { parseAgentOutput, parseRedfish, parseRedfishMultiple } from "./checks/parse";
export { redfishHealthState, State } from "./checks/health";
export { processRedfishPerfdata } from "./checks/perfdata";
export { runChecks, formatServiceResults } from "./checks/services";
export { buildMetrics } from "./metrics/sensor-metrics";
export { OpenMetricsExporter } from "./metrics/openmetrics";
