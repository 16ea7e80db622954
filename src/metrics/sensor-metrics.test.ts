import { describe, expect, it } from 'vitest';
import { parseAgentOutput } from '../checks/parse';
import { runChecks } from '../checks/services';
import { formatSection } from '../exporters/section-writer';
import { loadFixture } from '../test/fake-redfish';
import type { RedfishResource } from '../types/redfish';
import { buildMetrics, chassisIdFromPath } from './sensor-metrics';

const standard = loadFixture('standard-bmc');

describe('chassisIdFromPath', () => {
  it('takes the segment after Chassis', () => {
    expect(chassisIdFromPath('/redfish/v1/Chassis/System.Embedded.1/Thermal')).toBe('System.Embedded.1');
    expect(chassisIdFromPath('/redfish/v1/Chassis')).toBe('');
    expect(chassisIdFromPath('')).toBe('');
  });
});

describe('buildMetrics', () => {
  it('exports readings of power and thermal sections', () => {
    const output = [
      formatSection('Managers', [standard['/redfish/v1/Managers/BMC']]),
      formatSection('Thermal', [standard['/redfish/v1/Chassis/1/Thermal']]),
      formatSection('Power', [standard['/redfish/v1/Chassis/1/Power']]),
    ].join('');

    expect(buildMetrics(parseAgentOutput(output), []).export()).toBe(
      [
        '# HELP redfish_temperature_celsius Temperature sensor reading.',
        '# TYPE redfish_temperature_celsius gauge',
        '# UNIT redfish_temperature_celsius celsius',
        'redfish_temperature_celsius{chassis="1",sensor="CPU1 Temp"} 41',
        'redfish_temperature_celsius{chassis="1",sensor="Inlet Temp"} 22.5',
        '# HELP redfish_fan_speed Fan speed reading in the unit the BMC reports.',
        '# TYPE redfish_fan_speed gauge',
        'redfish_fan_speed{chassis="1",sensor="Fan 1",units="RPM"} 5880',
        '# HELP redfish_voltage_volts Voltage sensor reading.',
        '# TYPE redfish_voltage_volts gauge',
        '# UNIT redfish_voltage_volts volts',
        'redfish_voltage_volts{chassis="1",sensor="PS1 Voltage 1"} 230',
        '# HELP redfish_power_consumed_watts Power consumed as reported by the power control.',
        '# TYPE redfish_power_consumed_watts gauge',
        '# UNIT redfish_power_consumed_watts watts',
        'redfish_power_consumed_watts{chassis="1",control="System Power Control"} 112',
        '# HELP redfish_manager Management controller firmware.',
        '# TYPE redfish_manager info',
        'redfish_manager_info{manager="BMC",firmware_version="4.40.00.00"} 1',
        '# EOF',
        '',
      ].join('\n')
    );
  });

  it('skips unreadable sensors and names unnamed ones by position', () => {
    const thermal: RedfishResource = {
      '@odata.id': '/redfish/v1/Chassis/2/Thermal',
      Temperatures: [{ Name: 'Broken', ReadingCelsius: 'n/a' }, { ReadingCelsius: 30 }],
    };

    const lines = buildMetrics(parseAgentOutput(formatSection('Thermal', [thermal])), []).export().split('\n');

    expect(lines.filter((line) => line.startsWith('redfish_temperature_celsius'))).toEqual([
      'redfish_temperature_celsius{chassis="2",sensor="1"} 30',
    ]);
  });

  it('adds a health gauge per service', () => {
    const drives = '/redfish/v1/Systems/1/Storage/RAID.1/Drives';
    const sections = parseAgentOutput(
      formatSection('Drives', [standard[`${drives}/Disk.0`], standard[`${drives}/Disk.1`]])
    );

    const lines = buildMetrics(sections, runChecks(sections)).export().split('\n');

    expect(lines.filter((line) => line.startsWith('redfish_health_state'))).toEqual([
      'redfish_health_state{section="redfish_drives",item="Disk.0"} 0',
      'redfish_health_state{section="redfish_drives",item="Disk.1"} 1',
    ]);
  });
});
