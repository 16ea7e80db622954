import { describe, expect, it } from 'vitest';
import { formatSection, sectionHeader, SectionWriter } from './section-writer';

describe('formatSection', () => {
  it('writes a header and one JSON document per line', () => {
    expect(formatSection('Thermal', [{ Id: 'Thermal', Fans: [] }])).toBe(
      '<<<redfish_thermal:sep(0)>>>\n{"Id":"Thermal","Fans":[]}\n'
    );
  });

  it('writes nothing for an empty set', () => {
    expect(formatSection('Memory', [])).toBe('');
  });

  it('keeps entries with line breaks on one line', () => {
    expect(formatSection('Managers', [{ Description: 'first\nsecond' }])).toBe(
      '<<<redfish_manager:sep(0)>>>\n{"Description":"first\\nsecond"}\n'
    );
  });

  it('names the header after the output section', () => {
    expect(sectionHeader('FirmwareInventory')).toBe('<<<redfish_firmware:sep(0)>>>');
  });
});

describe('SectionWriter', () => {
  it('writes each result as it arrives and counts them', () => {
    const chunks: string[] = [];
    const writer = new SectionWriter({ write: (chunk) => chunks.push(chunk) });

    writer.emit({ section: 'Drives', entries: [{ Id: 'Disk.0' }, { Id: 'Disk.1' }] });
    writer.emit({ section: 'Volumes', entries: [] });
    writer.emit({ section: 'Drives', entries: [{ Id: 'Disk.2' }] });

    expect(chunks).toEqual([
      '<<<redfish_drives:sep(0)>>>\n{"Id":"Disk.0"}\n{"Id":"Disk.1"}\n',
      '<<<redfish_drives:sep(0)>>>\n{"Id":"Disk.2"}\n',
    ]);
    expect(writer.getStats()).toEqual({ sections: 2, entries: 3 });
  });
});
