import { describe, expect, it } from 'vitest';
import { makeRow } from '../__test-helpers__.js';
import { DataIntegrityError, NotFoundError } from '../errors.js';
import { PlayerCatalog } from './catalog.js';

const rows = [
  makeRow('p1', 'Martin Ødegaard', 0, [0, 0]),
  makeRow('p2', 'Kofi Mensah', 1, [1, 2]),
  makeRow('p3', 'Søren Lindqvist', 0, [-1, 0.5])
];

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

describe('PlayerCatalog lookups', () => {
  const catalog = PlayerCatalog.build(rows);

  it('keeps input order and hands out the same array', () => {
    expect(catalog.all().map((p) => p.id)).toEqual(['p1', 'p2', 'p3']);
    expect(catalog.all()).toBe(catalog.all());
    expect(catalog.size).toBe(3);
  });

  it('derives shape from the data', () => {
    expect(catalog.clusterCount).toBe(2);
    expect(catalog.dimensions).toBe(2);
    expect(catalog.attributeNames).toEqual(['Pas', 'Tec']);
  });

  it('computes the search key once at construction', () => {
    expect(catalog.get('p1').searchKey).toBe('martin odegaard');
    expect(catalog.get('p1').displayName).toBe('Martin Ødegaard');
  });

  it('throws NotFoundError for unknown ids', () => {
    expect(() => catalog.get('nope')).toThrow(NotFoundError);
    expect(() => catalog.get('nope')).toThrow('Unknown player: nope');
    expect(catalog.find('nope')).toBeUndefined();
  });

  it('freezes records', () => {
    const record = catalog.get('p2');
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.coordinates)).toBe(true);
    expect(Object.isFrozen(catalog.all())).toBe(true);
  });

  it('copies input so later edits to the rows do not leak in', () => {
    const source = [makeRow('x', 'Noah Brenner', 0, [3, 4])];
    const built = PlayerCatalog.build(source);
    source[0].coordinates[0] = 99;
    expect(built.get('x').coordinates).toEqual([3, 4]);
  });

  it('accepts an empty dataset', () => {
    const empty = PlayerCatalog.build([]);
    expect(empty.size).toBe(0);
    expect(empty.all()).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('PlayerCatalog validation', () => {
  it('rejects duplicate ids', () => {
    const dupes = [makeRow('p1', 'A', 0, [0, 0]), makeRow('p1', 'B', 1, [1, 1])];
    expect(() => PlayerCatalog.build(dupes)).toThrow(DataIntegrityError);
    expect(() => PlayerCatalog.build(dupes)).toThrow('Duplicate player id "p1" at row 2');
  });

  it('rejects ids that clash with the search route', () => {
    const bad = [makeRow('a', 'A', 0, [0, 0]), makeRow('search', 'B', 0, [1, 1])];
    expect(() => PlayerCatalog.build(bad)).toThrow('Player id "search" is reserved at row 2');
  });

  it('rejects mismatched coordinate lengths', () => {
    const bad = [makeRow('a', 'A', 0, [0, 0]), makeRow('b', 'B', 0, [1, 1, 1])];
    expect(() => PlayerCatalog.build(bad)).toThrow(
      'Coordinate length mismatch at row 2 ("b"): expected 2, got 3'
    );
  });

  it('rejects cluster ids outside [0, K-1]', () => {
    const bad = [makeRow('a', 'A', 2, [0, 0], { clusterProbabilities: [0.5, 0.5] })];
    expect(() => PlayerCatalog.build(bad)).toThrow('Cluster id 2 out of range [0, 1] at row 1 ("a")');
  });

  it('rejects probabilities that do not sum to one', () => {
    const bad = [makeRow('a', 'A', 0, [0, 0], { clusterProbabilities: [0.7, 0.2] })];
    expect(() => PlayerCatalog.build(bad)).toThrow(DataIntegrityError);
  });

  it('tolerates rounding in the probability sum', () => {
    const ok = [makeRow('a', 'A', 0, [0, 0], { clusterProbabilities: [0.8004, 0.2] })];
    expect(PlayerCatalog.build(ok).size).toBe(1);
  });

  it('rejects an assigned cluster that is not the most probable', () => {
    const bad = [makeRow('a', 'A', 0, [0, 0], { clusterProbabilities: [0.3, 0.7] })];
    expect(() => PlayerCatalog.build(bad)).toThrow('Cluster 0 is not the most probable cluster');
  });

  it('rejects probability vectors of differing length', () => {
    const bad = [
      makeRow('a', 'A', 0, [0, 0]),
      makeRow('b', 'B', 0, [0, 0], { clusterProbabilities: [0.8, 0.1, 0.1] })
    ];
    expect(() => PlayerCatalog.build(bad)).toThrow('Expected 2 cluster probabilities');
  });

  it('does not hard-code the number of clusters', () => {
    const three = [
      makeRow('a', 'A', 2, [0, 0], { clusterProbabilities: [0.1, 0.1, 0.8] })
    ];
    expect(PlayerCatalog.build(three).clusterCount).toBe(3);
  });

  it('rejects missing or unexpected attributes', () => {
    const bad = [
      makeRow('a', 'A', 0, [0, 0]),
      makeRow('b', 'B', 0, [0, 0], { attributes: { Pas: 1, Vis: 2 } })
    ];
    expect(() => PlayerCatalog.build(bad)).toThrow(
      'Attribute mismatch at row 2 ("b"): missing Tec; unexpected Vis'
    );
  });

  it('checks attributes against an explicit name set', () => {
    const bad = [makeRow('a', 'A', 0, [0, 0])];
    expect(() => PlayerCatalog.build(bad, { attributeNames: ['Pas', 'Tec', 'Dri'] })).toThrow(
      'missing Dri'
    );
  });

  it('flags abilities outside 0-200 without rejecting them', () => {
    const catalog = PlayerCatalog.build([
      makeRow('a', 'A', 0, [0, 0], { currentAbility: 205 }),
      makeRow('b', 'B', 0, [0, 0])
    ]);
    expect(catalog.get('a').abilityOutOfRange).toBe(true);
    expect(catalog.get('b').abilityOutOfRange).toBe(false);
  });

  it('rejects fractional abilities', () => {
    const bad = [makeRow('a', 'A', 0, [0, 0], { potentialAbility: 150.5 })];
    expect(() => PlayerCatalog.build(bad)).toThrow('Abilities must be integers');
  });

  it('rejects centroids for unknown clusters', () => {
    const centroids = [{ clusterId: 5, attributes: { Pas: 1 } }];
    expect(() => PlayerCatalog.build(rows, { centroids })).toThrow(
      'Centroid cluster id 5 out of range [0, 1]'
    );
  });

  it('rejects centroid attributes the players do not carry', () => {
    const centroids = [{ clusterId: 0, attributes: { Pas: 1, Vis: 0.3, Acc: -2 } }];
    expect(() => PlayerCatalog.build(rows, { centroids })).toThrow(
      'Centroid for cluster 0 has unknown attributes: Acc, Vis'
    );
  });

  it('orders centroids by cluster id', () => {
    const centroids = [
      { clusterId: 1, attributes: { Pas: 1 } },
      { clusterId: 0, attributes: { Pas: -1 } }
    ];
    const catalog = PlayerCatalog.build(rows, { centroids });
    expect(catalog.centroids.map((c) => c.clusterId)).toEqual([0, 1]);
    expect(catalog.centroid(1)?.attributes.Pas).toBe(1);
    expect(catalog.centroid(3)).toBeUndefined();
  });
});
