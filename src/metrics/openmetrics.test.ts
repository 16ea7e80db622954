import { describe, expect, it } from 'vitest';
import { OpenMetricsExporter } from './openmetrics';

describe('OpenMetricsExporter', () => {
  it('groups samples by family with help, type and unit', () => {
    const exporter = new OpenMetricsExporter();
    exporter.addGauge('redfish_temperature_celsius', 'Temperature sensor reading.', 41, { sensor: 'CPU1 Temp' }, 'celsius');
    exporter.addGauge('redfish_temperature_celsius', 'Temperature sensor reading.', 22.5, { sensor: 'Inlet Temp' }, 'celsius');
    exporter.addInfo('redfish_manager', 'Management controller firmware.', { manager: 'BMC', firmware_version: '1.0' });

    expect(exporter.export()).toBe(
      [
        '# HELP redfish_temperature_celsius Temperature sensor reading.',
        '# TYPE redfish_temperature_celsius gauge',
        '# UNIT redfish_temperature_celsius celsius',
        'redfish_temperature_celsius{sensor="CPU1 Temp"} 41',
        'redfish_temperature_celsius{sensor="Inlet Temp"} 22.5',
        '# HELP redfish_manager Management controller firmware.',
        '# TYPE redfish_manager info',
        'redfish_manager_info{manager="BMC",firmware_version="1.0"} 1',
        '# EOF',
        '',
      ].join('\n')
    );
  });

  it('adds common labels and escapes label values', () => {
    const exporter = new OpenMetricsExporter({ host: 'bmc.test' });
    exporter.addGauge('redfish_fan_speed', 'Fan speed.', 5880, { sensor: 'Fan "A"\\B\nC' });

    expect(exporter.export().split('\n')[2]).toBe('redfish_fan_speed{host="bmc.test",sensor="Fan \\"A\\"\\\\B\\nC"} 5880');
  });

  it('writes special float values', () => {
    const exporter = new OpenMetricsExporter();
    exporter.addGauge('limit', 'Limits.', Infinity);
    exporter.addGauge('limit', 'Limits.', -Infinity);
    exporter.addGauge('limit', 'Limits.', NaN);

    expect(exporter.export().split('\n').slice(2, 5)).toEqual(['limit +Inf', 'limit -Inf', 'limit NaN']);
  });

  it('ends an empty exposition with EOF', () => {
    expect(new OpenMetricsExporter().export()).toBe('# EOF\n');
  });
});
