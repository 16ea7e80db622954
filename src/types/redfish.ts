export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** A decoded Redfish resource body. */
export type RedfishResource = { [key: string]: JsonValue };

export function isRedfishResource(value: unknown): value is RedfishResource {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isEmptyResource(resource: RedfishResource): boolean {
  return Object.keys(resource).length === 0;
}

export function childResource(resource: RedfishResource, key: string): RedfishResource | undefined {
  const child = resource[key];
  return isRedfishResource(child) ? child : undefined;
}

export function stringField(resource: RedfishResource, key: string): string | undefined {
  const value = resource[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Target of a link object. iLO 4 firmware still publishes `href` next to
 * (or instead of) `@odata.id`.
 */
export function linkTarget(value: JsonValue | undefined): string | undefined {
  if (!isRedfishResource(value)) {
    return undefined;
  }
  const target = value["@odata.id"] ?? value.href;
  return typeof target === "string" && target.length > 0 ? target : undefined;
}

export function linkTargets(value: JsonValue | undefined): string[] {
  if (Array.isArray(value)) {
    return value.map(linkTarget).filter((target): target is string => target !== undefined);
  }
  const target = linkTarget(value);
  return target ? [target] : [];
}

export function memberCount(resource: RedfishResource): number | undefined {
  const count = resource["Members@odata.count"];
  return typeof count === "number" ? count : undefined;
}

export function isCollection(resource: RedfishResource): boolean {
  const type = stringField(resource, "@odata.type");
  if (type?.includes("Collection")) {
    return true;
  }
  return Array.isArray(resource.Members);
}
