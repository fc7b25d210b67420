import { log } from '../utils/log.js';
import type { ContainerConfig } from '../types/index.js';

// Wardrobes only; the main inventory is excluded because it is mostly consumables.
export const DEFAULT_EQUIPPABLE_CONTAINERS: ReadonlyMap<number, string> = new Map([
  [8, 'wardrobe'],
  [10, 'wardrobe2'],
  [11, 'wardrobe3'],
  [12, 'wardrobe4'],
  [13, 'wardrobe5'],
  [14, 'wardrobe6'],
  [15, 'wardrobe7'],
  [16, 'wardrobe8']
]);

function parseContainerId(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  return Number.parseInt(trimmed, 10);
}

function parseEquippableContainers(raw: string | undefined): Map<number, string> | undefined {
  if (!raw || !raw.trim()) return undefined;

  const candidates: Array<[string, string]> = [];
  const trimmed = raw.trim();

  if (trimmed.startsWith('{')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        for (const [key, label] of Object.entries(parsed)) {
          if (typeof label === 'string') {
            candidates.push([key, label]);
          } else {
            log.warn('Ignoring non-string EQUIPPABLE_CONTAINERS label from JSON payload', {
              key,
              label
            });
          }
        }
      }
    } catch (error) {
      log.warn('Failed to parse EQUIPPABLE_CONTAINERS as JSON object, falling back to list parsing', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  if (!candidates.length) {
    for (const token of trimmed.split(/[,\s]+/).filter(Boolean)) {
      const [id, label] = token.split(/:(.*)/s, 2);
      candidates.push([id, label ?? '']);
    }
  }

  const containers = new Map<number, string>();
  for (const [key, label] of candidates) {
    const id = parseContainerId(key);
    if (id === undefined) {
      log.warn('Skipping equippable container with invalid id', { id: key });
      continue;
    }
    containers.set(id, label.trim() || `container${id}`);
  }
  return containers.size ? containers : undefined;
}

export function loadContainerConfig(overrides?: Partial<ContainerConfig>): ContainerConfig {
  const equippable =
    overrides?.equippable ??
    parseEquippableContainers(process.env.EQUIPPABLE_CONTAINERS) ??
    DEFAULT_EQUIPPABLE_CONTAINERS;

  return { equippable };
}
