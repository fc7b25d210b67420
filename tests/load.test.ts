import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { DEFAULT_EQUIPPABLE_CONTAINERS } from '../src/config/containers.js';
import { MalformedRowError, SourceUnreadableError } from '../src/errors.js';
import { loadInventory, parseInventoryCsv, parseInventoryRows } from '../src/load.js';

const inventoryCsv = fileURLToPath(new URL('./fixtures/inventory.csv', import.meta.url));
const containers = { equippable: DEFAULT_EQUIPPABLE_CONTAINERS };

const rows = [
  { item_id: '20515', item_name: 'Aeneas', container_id: '8', container_name: 'wardrobe' },
  { item_id: '4116', item_name: 'Hi-Potion', container_id: '0', container_name: 'inventory', count: '12' },
  {
    item_id: '28440',
    item_name: 'S. Kindred Crest',
    container_id: '12',
    container_name: 'wardrobe4',
    augments: '  ',
    count: '',
    item_name_log: " Sacred Kindred's Crest "
  }
];

describe('parseInventoryRows', () => {
  it('drops rows outside the equippable containers by default', () => {
    const entries = parseInventoryRows(rows, { containers });
    expect(entries.map((entry) => entry.name)).toEqual(['Aeneas', 'S. Kindred Crest']);
  });

  it('keeps every row when filtering is off', () => {
    const entries = parseInventoryRows(rows, { containers, equippableOnly: false });
    expect(entries.map((entry) => entry.containerId)).toEqual([8, 0, 12]);
    expect(entries[1].count).toBe(12);
  });

  it('fills optional fields with defaults', () => {
    const [aeneas, crest] = parseInventoryRows(rows, { containers });
    expect(aeneas).toEqual({
      itemId: 20515,
      name: 'Aeneas',
      logName: '',
      containerId: 8,
      containerName: 'wardrobe',
      augmentText: '',
      count: 1
    });
    expect(crest.logName).toBe("Sacred Kindred's Crest");
    expect(crest.augmentText).toBe('');
    expect(crest.count).toBe(1);
  });

  it('uses the injected container set', () => {
    const satchelOnly = { equippable: new Map([[5, 'satchel']]) };
    const entries = parseInventoryRows(
      [...rows, { item_id: '1', item_name: 'Warp Ring', container_id: '5', container_name: 'satchel' }],
      { containers: satchelOnly }
    );
    expect(entries.map((entry) => entry.name)).toEqual(['Warp Ring']);
  });

  it('aborts on a missing required field', () => {
    const broken = [rows[0], { item_id: '2', item_name: 'Ea Hat', container_name: 'wardrobe' }];
    expect(() => parseInventoryRows(broken, { containers })).toThrowError(
      new MalformedRowError(2, 'container_id', 'is required')
    );
  });

  it('aborts on a non-numeric id even in a filtered container', () => {
    const broken = [{ item_id: 'abc', item_name: 'Hi-Potion', container_id: '0', container_name: 'inventory' }];
    expect(() => parseInventoryRows(broken, { containers, source: 'inv.csv' })).toThrowError(
      'Malformed inventory inv.csv row 1: item_id must be an integer'
    );
  });

  it('aborts on a zero count', () => {
    const broken = [{ ...rows[0], count: '0' }];
    expect(() => parseInventoryRows(broken, { containers })).toThrowError(MalformedRowError);
  });
});

describe('parseInventoryRows with numeric cells', () => {
  it('reads integer ids and counts like their text form', () => {
    const numeric = parseInventoryRows(
      [{ item_id: 20515, item_name: 'Aeneas', container_id: 8, container_name: 'wardrobe', count: 2 }],
      { containers }
    );
    const text = parseInventoryRows(
      [{ item_id: '20515', item_name: 'Aeneas', container_id: '8', container_name: 'wardrobe', count: '2' }],
      { containers }
    );
    expect(numeric).toEqual(text);
    expect(numeric[0].itemId).toBe(20515);
    expect(numeric[0].count).toBe(2);
  });

  it('rejects a zero integer count', () => {
    const broken = [{ item_id: 1, item_name: 'Aeneas', container_id: 8, container_name: 'wardrobe', count: 0 }];
    expect(() => parseInventoryRows(broken, { containers })).toThrowError(
      'Malformed inventory row 1: count must be a positive integer'
    );
  });

  it('rejects a fractional id', () => {
    const broken = [{ item_id: 1.5, item_name: 'Aeneas', container_id: 8, container_name: 'wardrobe' }];
    expect(() => parseInventoryRows(broken, { containers })).toThrowError(MalformedRowError);
  });
});

describe('parseInventoryCsv', () => {
  it('reads quoted augment cells', () => {
    const text = [
      'item_id,item_name,container_id,container_name,augments',
      '12345,Genbu\'s Shield,10,wardrobe2,"{""Path: A"",""HP+20""}"'
    ].join('\n');
    const [shield] = parseInventoryCsv(text, { containers });
    expect(shield.itemId).toBe(12345);
    expect(shield.name).toBe("Genbu's Shield");
    expect(shield.augmentText).toBe('{"Path: A","HP+20"}');
  });
});

describe('loadInventory', () => {
  it('loads the equippable rows of a file', async () => {
    const entries = await loadInventory(inventoryCsv, { containers });
    expect(entries).toHaveLength(7);
    expect(entries.some((entry) => entry.name === 'Hi-Potion')).toBe(false);
    expect(entries[5].logName).toBe("Sacred Kindred's Crest");
  });

  it('fails when the file cannot be read', async () => {
    await expect(loadInventory(`${inventoryCsv}.missing`, { containers })).rejects.toBeInstanceOf(
      SourceUnreadableError
    );
  });
});
