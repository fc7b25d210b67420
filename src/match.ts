import { isAugmentSubset, normalizeAugments } from './lib/augments.js';
import { log } from './utils/log.js';
import type {
  ComparisonReport,
  InventoryEntry,
  NormalizedAugmentSet,
  OrphanResult,
  Reference,
  SourceFailure,
  SourceSummary
} from './types/index.js';

interface IndexedReference {
  reference: Reference;
  /** Undefined when the reference names the item without augments. */
  augments?: NormalizedAugmentSet;
}

type ReferenceIndex = Map<string, IndexedReference[]>;

export interface ComparisonContext {
  sources?: SourceSummary[];
  failedSources?: SourceFailure[];
  inventorySource?: string;
}

const AUGMENT_DISPLAY_LIMIT = 60;

function buildReferenceIndex(references: Iterable<Reference>): ReferenceIndex {
  const index: ReferenceIndex = new Map();
  for (const reference of references) {
    const key = reference.name.toLowerCase();
    const indexed: IndexedReference = reference.augmentText
      ? { reference, augments: normalizeAugments(reference.augmentText) }
      : { reference };
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(indexed);
    } else {
      index.set(key, [indexed]);
    }
  }
  return index;
}

function candidatesFor(entry: InventoryEntry, index: ReferenceIndex): IndexedReference[] {
  const primary = index.get(entry.name.toLowerCase()) ?? [];
  if (!entry.logName) return primary;
  const logKey = entry.logName.toLowerCase();
  if (logKey === entry.name.toLowerCase()) return primary;
  return [...primary, ...(index.get(logKey) ?? [])];
}

function isCoveredByIndex(entry: InventoryEntry, index: ReferenceIndex): boolean {
  let entryAugments: NormalizedAugmentSet | undefined;
  for (const candidate of candidatesFor(entry, index)) {
    // A bare name covers every copy of the item.
    if (!candidate.augments) return true;
    entryAugments ??= normalizeAugments(entry.augmentText);
    if (isAugmentSubset(candidate.augments, entryAugments)) return true;
  }
  return false;
}

/**
 * True when some reference names the entry (by name or log name, any case)
 * and either lists no augments or lists only augments the entry carries.
 */
export function isCovered(entry: InventoryEntry, references: Iterable<Reference>): boolean {
  return isCoveredByIndex(entry, buildReferenceIndex(references));
}

export function findOrphans(
  entries: readonly InventoryEntry[],
  references: Iterable<Reference>
): InventoryEntry[] {
  const index = buildReferenceIndex(references);
  return entries.filter((entry) => !isCoveredByIndex(entry, index));
}

export function describeEntry(entry: InventoryEntry): string {
  if (!entry.augmentText) return entry.name;
  const augments =
    entry.augmentText.length > AUGMENT_DISPLAY_LIMIT
      ? `${entry.augmentText.slice(0, AUGMENT_DISPLAY_LIMIT)}...`
      : entry.augmentText;
  return `${entry.name} [${augments}]`;
}

export function compareInventory(
  entries: readonly InventoryEntry[],
  references: Iterable<Reference>,
  context: ComparisonContext = {}
): ComparisonReport {
  const referenceList = [...references];
  const orphans: OrphanResult[] = findOrphans(entries, referenceList).map((entry) => ({
    entry,
    displayName: describeEntry(entry)
  }));

  const stats = {
    references: referenceList.length,
    augmentedReferences: referenceList.filter((reference) => reference.augmentText).length,
    entries: entries.length,
    augmentedEntries: entries.filter((entry) => entry.augmentText).length,
    orphans: orphans.length
  };
  log.info('Comparison complete', stats);

  return {
    generatedAt: new Date().toISOString(),
    inventorySource: context.inventorySource,
    sources: context.sources ?? [],
    failedSources: context.failedSources ?? [],
    stats,
    orphans
  };
}
