export interface Reference {
  readonly name: string;
  readonly augmentText: string;
}

export interface InventoryEntry {
  readonly itemId: number;
  readonly name: string;
  readonly logName: string;
  readonly containerId: number;
  readonly containerName: string;
  readonly augmentText: string;
  readonly count: number;
}

export type NormalizedAugmentSet = ReadonlySet<string>;

export interface OrphanResult {
  entry: InventoryEntry;
  displayName: string;
}

export interface ComparisonStats {
  references: number;
  augmentedReferences: number;
  entries: number;
  augmentedEntries: number;
  orphans: number;
}

export interface SourceSummary {
  source: string;
  references: number;
}

export interface SourceFailure {
  source: string;
  message: string;
}

export interface ComparisonReport {
  generatedAt: string;
  inventorySource?: string;
  sources: SourceSummary[];
  failedSources: SourceFailure[];
  stats: ComparisonStats;
  orphans: OrphanResult[];
}

export interface ContainerConfig {
  equippable: ReadonlyMap<number, string>;
}
