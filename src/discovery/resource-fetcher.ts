import { ErrorHandler } from "../logging/error-handler";
import { RedfishTransportError } from "../logging/errors";
import { RedfishClient } from "../providers/redfish-client";
import { isEmptyResource, isRedfishResource, linkTarget, linkTargets, stringField } from "../types/redfish";
import type { JsonValue, RedfishResource } from "../types/redfish";

export interface FetchStats {
  requests: number;
  failures: number;
}

/**
 * Single-resource and collection GETs. A resource that cannot be fetched is
 * logged and comes back empty so the rest of the walk can go on.
 */
export class ResourceFetcher {
  private client: RedfishClient;
  private errors: ErrorHandler;
  private stats: FetchStats = { requests: 0, failures: 0 };

  constructor(client: RedfishClient, errors: ErrorHandler) {
    this.client = client;
    this.errors = errors;
  }

  getStats(): FetchStats {
    return { ...this.stats };
  }

  async fetchData(path: string, component: string): Promise<RedfishResource> {
    this.stats.requests++;
    try {
      const response = await this.client.get(path);
      if (response.status === 200 && isRedfishResource(response.data)) {
        return response.data;
      }
      this.stats.failures++;
      this.errors.warn(`${component} data could not be fetched (HTTP ${response.status})`, { path });
      return {};
    } catch (error) {
      if (!(error instanceof RedfishTransportError)) {
        throw error;
      }
      this.stats.failures++;
      this.errors.warn(`${component} data could not be fetched (${error.message})`, { path });
      return {};
    }
  }

  /** Every member of a collection, following `Members@odata.nextLink` pages. */
  async fetchCollection(collection: RedfishResource, component: string): Promise<RedfishResource[]> {
    const members: RedfishResource[] = [];
    const visited = new Set<string>();
    const self = stringField(collection, "@odata.id");
    if (self) {
      visited.add(self);
    }
    let page: RedfishResource | undefined = collection;

    while (page) {
      const links = Array.isArray(page.Members) ? page.Members : [];
      for (const link of links) {
        const target = linkTarget(link);
        if (!target) {
          this.errors.debug(`${component} member without link skipped`);
          continue;
        }
        const member = await this.fetchData(target, component);
        if (!isEmptyResource(member)) {
          members.push(member);
        }
      }

      const next: JsonValue | undefined = page["Members@odata.nextLink"];
      page = undefined;
      if (typeof next === "string" && !visited.has(next)) {
        visited.add(next);
        page = await this.fetchData(next, component);
      }
    }

    return members;
  }

  /** Resolves a link object or an array of link objects. */
  async fetchLinks(value: JsonValue | undefined, component: string): Promise<RedfishResource[]> {
    const results: RedfishResource[] = [];
    for (const target of linkTargets(value)) {
      const resource = await this.fetchData(target, component);
      if (!isEmptyResource(resource)) {
        results.push(resource);
      }
    }
    return results;
  }
}
