import * as XLSX from 'xlsx';
import { loadContainerConfig } from './config/containers.js';
import { SourceUnreadableError } from './errors.js';
import { readTextLenient } from './utils/fs.js';
import { log } from './utils/log.js';
import { assertInventoryRow, type RawInventoryRow } from './validate.js';
import type { ContainerConfig, InventoryEntry } from './types/index.js';

export interface InventoryLoadOptions {
  /** Drop rows outside the equippable containers. Defaults to true. */
  equippableOnly?: boolean;
  containers?: ContainerConfig;
  /** Label used in error messages and logs. */
  source?: string;
}

const DEFAULT_COUNT = 1;

// Spreadsheet cells arrive as text, rows built in code may carry numbers.
function parseInteger(value: string | number): number {
  return typeof value === 'number' ? value : Number.parseInt(value.trim(), 10);
}

function toEntry(row: RawInventoryRow): InventoryEntry {
  const count = typeof row.count === 'string' ? row.count.trim() : row.count;
  return Object.freeze({
    itemId: parseInteger(row.item_id),
    name: row.item_name,
    logName: row.item_name_log?.trim() ?? '',
    containerId: parseInteger(row.container_id),
    containerName: row.container_name,
    augmentText: row.augments?.trim() ?? '',
    count: count === undefined || count === '' ? DEFAULT_COUNT : parseInteger(count)
  });
}

/**
 * Every row is validated before the container filter runs: a broken export
 * aborts the load instead of silently under-reporting orphans.
 */
export function parseInventoryRows(
  rows: readonly unknown[],
  options: InventoryLoadOptions = {}
): InventoryEntry[] {
  const equippableOnly = options.equippableOnly ?? true;
  const { equippable } = options.containers ?? loadContainerConfig();

  const entries: InventoryEntry[] = [];
  let skipped = 0;

  for (const [index, row] of rows.entries()) {
    assertInventoryRow(row, index + 1, options.source);
    const entry = toEntry(row);
    if (equippableOnly && !equippable.has(entry.containerId)) {
      skipped++;
      continue;
    }
    entries.push(entry);
  }

  log.debug('Inventory rows parsed', {
    source: options.source,
    rows: rows.length,
    kept: entries.length,
    skipped
  });

  return entries;
}

export function parseInventoryCsv(text: string, options: InventoryLoadOptions = {}): InventoryEntry[] {
  const workbook = XLSX.read(text, { type: 'string', raw: true });
  const firstSheetName = workbook.SheetNames[0];
  const sheet = firstSheetName === undefined ? undefined : workbook.Sheets[firstSheetName];
  if (!sheet) return [];

  // raw: false hands back cell text, so ids stay strings for the row schema.
  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '', raw: false });
  return parseInventoryRows(rows, options);
}

export async function loadInventory(path: string, options: InventoryLoadOptions = {}): Promise<InventoryEntry[]> {
  let text: string;
  try {
    text = await readTextLenient(path);
  } catch (error) {
    throw new SourceUnreadableError(path, error);
  }

  const entries = parseInventoryCsv(text, { ...options, source: options.source ?? path });
  log.info('Inventory loaded', {
    source: path,
    entries: entries.length,
    augmented: entries.filter((entry) => entry.augmentText).length,
    equippableOnly: options.equippableOnly ?? true
  });
  return entries;
}
