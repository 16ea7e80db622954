import type { SectionResult, SectionSink } from "../discovery/section-resolver";
import type { RedfishResource } from "../types/redfish";
import { outputSectionName } from "../types/sections";
import type { SectionName } from "../types/sections";

export interface TextSink {
  write(chunk: string): unknown;
}

export interface WriterStats {
  sections: number;
  entries: number;
}

export function sectionHeader(section: SectionName): string {
  return `<<<${outputSectionName(section)}:sep(0)>>>`;
}

/**
 * One header line, then one JSON document per line. JSON.stringify escapes
 * control characters, so an entry never spans lines.
 */
export function formatSection(section: SectionName, entries: readonly RedfishResource[]): string {
  if (entries.length === 0) {
    return "";
  }
  const lines = [sectionHeader(section), ...entries.map((entry) => JSON.stringify(entry))];
  return `${lines.join("\n")}\n`;
}

/** Writes every result to the output as soon as it arrives. */
export class SectionWriter implements SectionSink {
  private out: TextSink;
  private stats: WriterStats = { sections: 0, entries: 0 };

  constructor(out: TextSink) {
    this.out = out;
  }

  emit(result: SectionResult): void {
    const text = formatSection(result.section, result.entries);
    if (!text) {
      return;
    }
    this.out.write(text);
    this.stats.sections++;
    this.stats.entries += result.entries.length;
  }

  getStats(): WriterStats {
    return { ...this.stats };
  }
}
