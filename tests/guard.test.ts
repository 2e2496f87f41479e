// Tests for the evaluation guard and feedback loops

import { describe, it, expect } from 'vitest';
import { EvaluationGuard, NorGate, NotGate, AndGate, NandGate } from '../src/index.js';

describe('EvaluationGuard', () => {
  it('should compute and remember the result', () => {
    const guard = new EvaluationGuard();
    expect(guard.lastValue).toBeNull();

    expect(guard.run(() => true)).toBe(true);
    expect(guard.lastValue).toBe(true);
    expect(guard.active).toBe(false);
    expect(guard.computations).toBe(1);
  });

  it('should answer a re-entrant call with the previous value', () => {
    const guard = new EvaluationGuard();
    guard.run(() => false);

    let inner: boolean | null = null;
    const outer = guard.run(() => {
      expect(guard.active).toBe(true);
      inner = guard.run(() => {
        throw new Error('re-entrant call must not compute');
      });
      return true;
    });

    expect(inner).toBe(false);
    expect(outer).toBe(true);
    expect(guard.reentries).toBe(1);
    expect(guard.computations).toBe(2);
  });

  it('should release the guard when the computation throws', () => {
    const guard = new EvaluationGuard();
    expect(() =>
      guard.run(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(guard.active).toBe(false);
    expect(guard.run(() => true)).toBe(true);
  });

  it('should reset its counters', () => {
    const guard = new EvaluationGuard();
    guard.run(() => true);
    guard.resetCounters();
    expect(guard.computations).toBe(0);
    expect(guard.reentries).toBe(0);
  });
});

describe('Feedback loops', () => {
  it('should evaluate a cross-wired NOR pair in one bounded pass', () => {
    const a = new NorGate();
    const b = new NorGate();
    a.inputs = [false, b];
    b.inputs = [false, a];

    // b sees a's floating first-pass value, so b = 1 and a = 0
    expect(a.evaluate()).toBe(false);
    expect(a.guard.computations).toBe(1);
    expect(a.guard.reentries).toBe(1);
    expect(b.guard.computations).toBe(1);
    expect(b.guard.lastValue).toBe(true);

    expect(a.evaluate()).toBe(false);
    expect(a.guard.computations).toBe(2);
    expect(b.guard.computations).toBe(2);
  });

  it('should oscillate a self-fed inverter once per call', () => {
    const n = new NotGate();
    n.inputs = n;

    const values = [n.evaluate(), n.evaluate(), n.evaluate(), n.evaluate()];
    expect(values).toEqual([true, false, true, false]);
    expect(n.guard.computations).toBe(4);
    expect(n.guard.reentries).toBe(4);
  });

  it('should not recurse when a gate reaches itself on several inputs', () => {
    const g = new NorGate();
    g.inputs = [g, g];

    expect([g.evaluate(), g.evaluate(), g.evaluate()]).toEqual([true, false, true]);
    expect(g.guard.computations).toBe(3);
  });

  it('should stop pulling at the first deciding input', () => {
    const upstream = new NandGate();
    const g = new AndGate();
    g.inputs = [false, upstream];

    expect(g.evaluate()).toBe(false);
    expect(upstream.guard.computations).toBe(0);
  });
});
