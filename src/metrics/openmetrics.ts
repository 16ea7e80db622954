/**
 * OpenMetrics text exposition for collected Redfish readings
 */

export interface MetricSample {
  name: string;
  labels?: Record<string, string>;
  value: number;
}

export interface MetricFamily {
  name: string;
  type: 'gauge' | 'info';
  help: string;
  unit?: string;
  samples: MetricSample[];
}

export class OpenMetricsExporter {
  private families: Map<string, MetricFamily> = new Map();
  private commonLabels: Record<string, string> = {};

  constructor(commonLabels?: Record<string, string>) {
    this.commonLabels = commonLabels || {};
  }

  /**
   * Add a gauge metric
   */
  public addGauge(
    name: string,
    help: string,
    value: number,
    labels?: Record<string, string>,
    unit?: string
  ): void {
    this.addMetric('gauge', name, help, value, labels, unit);
  }

  /**
   * Add an info metric, exposed as `<name>_info`
   */
  public addInfo(name: string, help: string, labels: Record<string, string>): void {
    this.addMetric('info', name, help, 1, labels, undefined, `${name}_info`);
  }

  /**
   * Export metrics in OpenMetrics format
   */
  public export(): string {
    const lines: string[] = [];

    for (const [name, family] of this.families.entries()) {
      lines.push(`# HELP ${name} ${family.help}`);
      lines.push(`# TYPE ${name} ${family.type}`);

      if (family.unit) {
        lines.push(`# UNIT ${name} ${family.unit}`);
      }

      for (const sample of family.samples) {
        const labels = { ...this.commonLabels, ...sample.labels };
        lines.push(`${sample.name}${this.formatLabels(labels)} ${this.formatValue(sample.value)}`);
      }
    }

    lines.push('# EOF');

    return `${lines.join('\n')}\n`;
  }

  private addMetric(
    type: MetricFamily['type'],
    name: string,
    help: string,
    value: number,
    labels?: Record<string, string>,
    unit?: string,
    sampleName: string = name
  ): void {
    let family = this.families.get(name);

    if (!family) {
      family = {
        name,
        type,
        help,
        unit,
        samples: []
      };
      this.families.set(name, family);
    }

    family.samples.push({
      name: sampleName,
      labels,
      value
    });
  }

  private formatValue(value: number): string {
    if (Number.isNaN(value)) {
      return 'NaN';
    }
    if (value === Infinity) {
      return '+Inf';
    }
    if (value === -Infinity) {
      return '-Inf';
    }
    return value.toString();
  }

  private formatLabels(labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return '';
    }

    const pairs = Object.entries(labels)
      .map(([key, value]) => `${key}="${this.escapeLabel(value)}"`)
      .join(',');

    return `{${pairs}}`;
  }

  private escapeLabel(value: string): string {
    return value
      .replace(/\\/g, '\\\\')
      .replace(/"/g, '\\"')
      .replace(/\n/g, '\\n');
  }
}
