// Tests for signal coercion and sources

import { describe, it, expect } from 'vitest';
import {
  toSignal,
  toSource,
  toDrivers,
  constant,
  isEvaluable,
  AndGate,
  Toggle,
  FLOATING,
} from '../src/index.js';

describe('toSignal', () => {
  it('should map booleans and 0/1 to asserted levels', () => {
    expect(toSignal(true)).toBe(true);
    expect(toSignal(1)).toBe(true);
    expect(toSignal(false)).toBe(false);
    expect(toSignal(0)).toBe(false);
  });

  it('should treat null and undefined as floating', () => {
    expect(toSignal(null)).toBe(FLOATING);
    expect(toSignal(undefined)).toBeNull();
  });

  it('should reject values that are not signals', () => {
    expect(() => toSignal(2)).toThrow(TypeError);
    expect(() => toSignal('1')).toThrow('Not a signal value: 1');
    expect(() => toSignal({})).toThrow(TypeError);
  });
});

describe('toSource', () => {
  it('should turn constants into constant sources', () => {
    expect(toSource(true)()).toBe(true);
    expect(toSource(0)()).toBe(false);
    expect(toSource(null)()).toBeNull();
    expect(toSource(undefined)()).toBeNull();
  });

  it('should share the constant sources', () => {
    expect(constant(true)).toBe(constant(1));
    expect(constant(null)).toBe(constant(undefined));
    expect(constant(false)).not.toBe(constant(true));
  });

  it('should coerce what a function source returns', () => {
    let level: 0 | 1 = 0;
    const source = toSource(() => level);
    expect(source()).toBe(false);
    level = 1;
    expect(source()).toBe(true);
  });

  it('should re-evaluate devices on every call', () => {
    const a = new Toggle(true);
    const gate = new AndGate();
    gate.inputs = [a, true];
    const source = toSource(gate);

    expect(source()).toBe(true);
    a.set(false);
    expect(source()).toBe(false);
  });

  it('should recognise evaluable objects', () => {
    expect(isEvaluable(new Toggle())).toBe(true);
    expect(isEvaluable({ evaluate: 1 })).toBe(false);
    expect(isEvaluable(null)).toBe(false);
    expect(isEvaluable(() => true)).toBe(false);
  });
});

describe('toDrivers', () => {
  it('should wrap a single source', () => {
    const drivers = toDrivers(true);
    expect(drivers).toHaveLength(1);
    expect(drivers[0]()).toBe(true);
  });

  it('should keep every driver of a wired input', () => {
    const drivers = toDrivers([true, null, new Toggle(true)]);
    expect(drivers.map((d) => d())).toEqual([true, null, true]);
  });
});
