import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_EQUIPPABLE_CONTAINERS, loadContainerConfig } from '../src/config/containers.js';

describe('loadContainerConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('defaults to the eight wardrobes', () => {
    vi.stubEnv('EQUIPPABLE_CONTAINERS', '');
    const { equippable } = loadContainerConfig();
    expect([...equippable.keys()]).toEqual([8, 10, 11, 12, 13, 14, 15, 16]);
    expect(equippable.get(16)).toBe('wardrobe8');
  });

  it('reads an id:label list', () => {
    vi.stubEnv('EQUIPPABLE_CONTAINERS', '8:wardrobe, 5:satchel,9');
    expect([...loadContainerConfig().equippable]).toEqual([
      [8, 'wardrobe'],
      [5, 'satchel'],
      [9, 'container9']
    ]);
  });

  it('reads a JSON object', () => {
    vi.stubEnv('EQUIPPABLE_CONTAINERS', '{"0":"inventory","8":"wardrobe"}');
    expect([...loadContainerConfig().equippable]).toEqual([
      [0, 'inventory'],
      [8, 'wardrobe']
    ]);
  });

  it('falls back to the defaults when nothing valid is configured', () => {
    vi.stubEnv('EQUIPPABLE_CONTAINERS', 'x:foo');
    expect(loadContainerConfig().equippable).toBe(DEFAULT_EQUIPPABLE_CONTAINERS);
  });

  it('prefers explicit overrides', () => {
    vi.stubEnv('EQUIPPABLE_CONTAINERS', '8:wardrobe');
    const equippable = new Map([[3, 'sack']]);
    expect(loadContainerConfig({ equippable }).equippable).toBe(equippable);
  });
});
