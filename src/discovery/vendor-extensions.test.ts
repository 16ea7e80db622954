import { describe, expect, it } from 'vitest';
import { ErrorLevel } from '../logging/error-handler';
import { RedfishClient } from '../providers/redfish-client';
import { captureLog, FakeRedfish, loadFixture, testClientOptions } from '../test/fake-redfish';
import type { SectionName } from '../types/sections';
import { ResourceFetcher } from './resource-fetcher';
import { SectionResolver } from './section-resolver';
import type { SectionResult } from './section-resolver';
import { detectVendor, isHpeDataModel, VendorExtensionResolver } from './vendor-extensions';

async function setup(requested: SectionName[]) {
  const fake = new FakeRedfish(loadFixture('hpe-bmc'));
  const log = captureLog(ErrorLevel.DEBUG);
  const client = new RedfishClient(testClientOptions(fake), log.errors);
  await client.login();
  const fetcher = new ResourceFetcher(client, log.errors);
  const emitted: SectionResult[] = [];
  const resolver = new SectionResolver(fetcher, { emit: (r) => emitted.push(r) }, requested, log.errors);
  const system = await fetcher.fetchData('/redfish/v1/Systems/1/', 'Systems');
  return { fake, log, system, emitted, vendor: new VendorExtensionResolver(resolver, log.errors) };
}

describe('detectVendor', () => {
  it('takes the first Oem key as the data model', () => {
    expect(detectVendor([{ FirmwareVersion: 'iLO 5 v2.72', Oem: { Hpe: {}, Other: {} } }])).toEqual({
      dataModel: 'Hpe',
      firmwareVersion: 'iLO 5 v2.72',
    });
  });

  it('lets the last manager decide the data model', () => {
    const vendor = detectVendor([
      { FirmwareVersion: '1.10', Oem: { Dell: {} } },
      { FirmwareVersion: '2.20' },
    ]);
    expect(vendor).toEqual({ dataModel: 'Unknown', firmwareVersion: '1.10' });
  });

  it('reports an unknown model without managers', () => {
    expect(detectVendor([])).toEqual({ dataModel: 'Unknown', firmwareVersion: '' });
  });

  it('knows both HPE data models', () => {
    expect(isHpeDataModel('Hpe')).toBe(true);
    expect(isHpeDataModel('Hp')).toBe(true);
    expect(isHpeDataModel('Dell')).toBe(false);
  });
});

describe('VendorExtensionResolver', () => {
  const hpe = { dataModel: 'Hpe', firmwareVersion: 'iLO 5 v2.72' };

  it('walks smart storage down to the drives', async () => {
    const { system, emitted, vendor } = await setup(['ArrayControllers', 'LogicalDrives', 'PhysicalDrives']);

    await vendor.fetchExtraData(hpe, system);

    expect(emitted.map((r) => [r.section, r.entries.map((e) => e['@odata.id'])])).toEqual([
      ['ArrayControllers', ['/redfish/v1/Systems/1/SmartStorage/ArrayControllers/0/']],
      ['LogicalDrives', ['/redfish/v1/Systems/1/SmartStorage/ArrayControllers/0/LogicalDrives/1/']],
      ['PhysicalDrives', ['/redfish/v1/Systems/1/SmartStorage/ArrayControllers/0/DiskDrives/0/']],
    ]);
  });

  it('emits nothing for an empty adapter collection', async () => {
    const { fake, system, emitted, vendor } = await setup(['HostBusAdapters']);

    await vendor.fetchExtraData(hpe, system);

    expect(emitted).toEqual([]);
    expect(fake.paths()).toContain('/redfish/v1/Systems/1/SmartStorage/HostBusAdapters/');
    expect(fake.paths()).not.toContain('/redfish/v1/Systems/1/SmartStorage/ArrayControllers/');
  });

  it('follows href links of the older data model', async () => {
    const { emitted, vendor } = await setup(['SmartStorage']);
    const system = {
      '@odata.id': '/redfish/v1/Systems/1/',
      Oem: { Hp: { Links: { SmartStorage: { href: '/redfish/v1/Systems/1/SmartStorage/' } } } },
    };

    await vendor.fetchExtraData({ dataModel: 'Hp', firmwareVersion: 'iLO 4 v2.80' }, system);

    expect(emitted.map((r) => [r.section, r.entries.map((e) => e.Id)])).toEqual([['SmartStorage', ['SmartStorage']]]);
  });

  it('does nothing for other vendors', async () => {
    const { fake, system, emitted, vendor } = await setup(['SmartStorage']);
    const before = fake.requests.length;

    expect(vendor.appliesTo({ dataModel: 'Dell', firmwareVersion: '' })).toBe(false);
    await vendor.fetchExtraData({ dataModel: 'Dell', firmwareVersion: '' }, system);

    expect(emitted).toEqual([]);
    expect(fake.requests).toHaveLength(before);
  });

  it('does nothing when no OEM section is requested', async () => {
    const { vendor } = await setup(['Thermal']);
    expect(vendor.appliesTo(hpe)).toBe(false);
  });

  it('logs a system without OEM links', async () => {
    const { log, vendor } = await setup(['SmartStorage']);

    await vendor.fetchExtraData(hpe, { '@odata.id': '/redfish/v1/Systems/2/', Oem: { Hpe: {} } });

    expect(log.lines).toContain('[2024-05-01T12:00:00.000Z] DEBUG: No Hpe OEM links on /redfish/v1/Systems/2/');
  });
});
