import { ErrorHandler } from "../logging/error-handler";
import { childResource, isCollection, isEmptyResource, linkTarget, memberCount, stringField } from "../types/redfish";
import type { RedfishResource } from "../types/redfish";
import type { SectionName, SectionNode } from "../types/sections";
import { ResourceFetcher } from "./resource-fetcher";

export interface SectionResult {
  section: SectionName;
  entries: RedfishResource[];
}

export interface SectionSink {
  emit(result: SectionResult): void;
}

/**
 * Walks a section graph below one resource. A node is fetched when it or one
 * of its descendants was requested, and emitted only when it was requested
 * itself.
 */
export class SectionResolver {
  private fetcher: ResourceFetcher;
  private sink: SectionSink;
  private errors: ErrorHandler;
  private requested: ReadonlySet<SectionName>;

  constructor(fetcher: ResourceFetcher, sink: SectionSink, requested: Iterable<SectionName>, errors: ErrorHandler) {
    this.fetcher = fetcher;
    this.sink = sink;
    this.errors = errors;
    this.requested = new Set(requested);
  }

  wants(section: SectionName): boolean {
    return this.requested.has(section);
  }

  needs(node: SectionNode): boolean {
    return this.wants(node.name) || (node.children ?? []).some((c) => this.needs(c));
  }

  async resolve(nodes: readonly SectionNode[], resource: RedfishResource): Promise<void> {
    for (const node of nodes) {
      if (!this.needs(node)) {
        continue;
      }
      const entries = await this.fetchNode(node, resource);
      if (entries.length === 0) {
        continue;
      }
      if (this.wants(node.name)) {
        this.sink.emit({ section: node.name, entries });
      }
      if (node.children) {
        for (const entry of entries) {
          await this.resolve(node.children, entry);
        }
      }
    }
  }

  /** Fetches a resource and expands it into its members when it is a collection. */
  async fetchSectionData(path: string, component: string): Promise<RedfishResource[]> {
    const data = await this.fetcher.fetchData(path, component);
    if (isEmptyResource(data) || memberCount(data) === 0) {
      return [];
    }
    if (isCollection(data)) {
      return this.fetcher.fetchCollection(data, component);
    }
    return [data];
  }

  private async fetchNode(node: SectionNode, resource: RedfishResource): Promise<RedfishResource[]> {
    const holder = node.inLinks ? childResource(resource, "Links") : resource;
    const value = holder?.[node.name];
    const owner = stringField(resource, "@odata.id") ?? "resource";

    if (Array.isArray(value)) {
      return this.fetcher.fetchLinks(value, node.name);
    }
    const target = linkTarget(value);
    if (!target) {
      this.errors.debug(`No ${node.name} link on ${owner}`);
      return [];
    }
    return this.fetchSectionData(target, node.name);
  }
}
