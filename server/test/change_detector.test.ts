import { describe, expect, it } from 'vitest';

import { ChangeDetector } from '../src/navigation/changeDetector.js';
import { FakeSource, ev, snap } from './fakes.js';

describe('change detector', () => {
  it('reports a change when nothing has been seen yet', () => {
    const detector = new ChangeDetector();
    expect(detector.observe(snap([], 1))).toBe(true);
  });

  it('treats equal index, count and end tags as unchanged', () => {
    const detector = new ChangeDetector();
    detector.observe(snap([ev('a/1'), ev('b/1'), ev('c/1')], 4));
    expect(detector.observe(snap([ev('a/1'), ev('b/1'), ev('c/1')], 4))).toBe(false);
  });

  it('ignores a middle entry that changed under the same ends', () => {
    const detector = new ChangeDetector();
    detector.observe(snap([ev('a/1'), ev('b/1'), ev('c/1')], 4));
    expect(detector.observe(snap([ev('a/1'), ev('x/1'), ev('c/1')], 4))).toBe(false);
  });

  it('spots index, count and end-tag changes', () => {
    const detector = new ChangeDetector();
    detector.observe(snap([ev('a/1'), ev('b/1')], 3));
    expect(detector.observe(snap([ev('a/1'), ev('b/1')], 2))).toBe(true);
    expect(detector.observe(snap([ev('a/1')], 2))).toBe(true);
    expect(detector.observe(snap([ev('z/1')], 2))).toBe(true);
    expect(detector.observe(snap([ev('z/1'), ev('b/1')], 2))).toBe(true);
    expect(detector.observe(snap([ev('z/1'), ev('q/1')], 2))).toBe(true);
  });

  it('updates the cache on every call', () => {
    const detector = new ChangeDetector();
    const a = snap([ev('a/1')], 2);
    const b = snap([ev('b/1')], 2);
    expect(detector.observe(a)).toBe(true);
    expect(detector.observe(b)).toBe(true);
    expect(detector.observe(b)).toBe(false);
    expect(detector.observe(a)).toBe(true);
  });

  it('keeps two empty snapshots equal', () => {
    const detector = new ChangeDetector();
    detector.observe(snap([], 1));
    expect(detector.observe(snap([], 1))).toBe(false);
  });

  it('fails closed when the source cannot be read', () => {
    const detector = new ChangeDetector();
    const source = new FakeSource();
    source.failWith = 'tag stack unavailable';
    expect(detector.poll(source)).toEqual({ changed: false, error: 'tag stack unavailable' });

    source.failWith = null;
    const result = detector.poll(source);
    expect(result.changed).toBe(true);
  });

  it('returns the snapshot on change and forgets it after reset', () => {
    const detector = new ChangeDetector();
    const source = new FakeSource();
    source.snapshot = snap([ev('init/1')], 2);

    const first = detector.poll(source);
    expect(first).toEqual({ changed: true, snapshot: source.snapshot });
    expect(detector.poll(source)).toEqual({ changed: false });

    detector.reset();
    expect(detector.poll(source).changed).toBe(true);
  });
});
