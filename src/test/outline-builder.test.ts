import { describe, it, expect } from 'vitest';
import { OutlineTreeBuilder, countOutlineNodes } from '../merge/outline-builder.js';
import { OffsetTracker } from '../merge/offset-tracker.js';
import type { OutlineNode } from '../types.js';

function buildFromDepths(depths: number[]): OutlineNode[] {
  const builder = new OutlineTreeBuilder();
  depths.forEach((depth, entryIndex) => {
    builder.insert({ label: `E${entryIndex}`, depth, targetPage: entryIndex, entryIndex });
  });
  return builder.build();
}

/** Compact `label(children)` rendering of a forest. */
function shape(nodes: OutlineNode[]): string {
  return nodes
    .map((n) => (n.children.length ? `${n.label}(${shape(n.children)})` : n.label))
    .join(' ');
}

describe('outline-builder', () => {
  it('should nest depths [0, 1, 1, 0, 1] into two roots', () => {
    const forest = buildFromDepths([0, 1, 1, 0, 1]);
    expect(forest).toHaveLength(2);
    expect(forest[0].children.map((n) => n.label)).toEqual(['E1', 'E2']);
    expect(forest[1].children.map((n) => n.label)).toEqual(['E4']);
    expect(shape(forest)).toBe('E0(E1 E2) E3(E4)');
  });

  it('should attach a skipped depth to the deepest open ancestor', () => {
    const forest = buildFromDepths([0, 2]);
    expect(shape(forest)).toBe('E0(E1)');
  });

  it('should close deeper levels when returning to a shallower depth after a skip', () => {
    expect(shape(buildFromDepths([0, 2, 1, 2]))).toBe('E0(E1 E2(E3))');
  });

  it('should make a first entry deeper than 0 a root', () => {
    expect(shape(buildFromDepths([2, 0]))).toBe('E0 E1');
  });

  it('should keep siblings in input order without sorting', () => {
    const builder = new OutlineTreeBuilder();
    for (const [i, label] of ['Zeta', 'Alpha', 'Mu'].entries()) {
      builder.insert({ label, depth: 0, targetPage: i, entryIndex: i });
    }
    expect(builder.build().map((n) => n.label)).toEqual(['Zeta', 'Alpha', 'Mu']);
  });

  it('should handle deep chains and pop several levels at once', () => {
    expect(shape(buildFromDepths([0, 1, 2, 3, 1]))).toBe('E0(E1(E2(E3)) E4)');
  });

  it('should count nodes across all levels', () => {
    expect(countOutlineNodes(buildFromDepths([0, 1, 1, 0, 1]))).toBe(5);
    expect(countOutlineNodes([])).toBe(0);
  });
});

describe('offset-tracker', () => {
  it('should start at 0 and advance by recorded counts', () => {
    const tracker = new OffsetTracker();
    const targets: number[] = [];
    for (const count of [3, 1, 2]) {
      targets.push(tracker.currentOffset());
      tracker.record(count);
    }
    expect(targets).toEqual([0, 3, 4]);
    expect(tracker.currentOffset()).toBe(6);
  });

  it('should not advance for a zero-page source', () => {
    const tracker = new OffsetTracker();
    tracker.record(2);
    tracker.record(0);
    expect(tracker.currentOffset()).toBe(2);
  });

  it('should reject negative or fractional counts', () => {
    const tracker = new OffsetTracker();
    expect(() => tracker.record(-1)).toThrow(RangeError);
    expect(() => tracker.record(1.5)).toThrow(RangeError);
    expect(tracker.currentOffset()).toBe(0);
  });
});
