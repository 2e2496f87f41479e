// Coercion of external values into signals and sources

import type {
  Drivers,
  Evaluable,
  InputSpec,
  Signal,
  SignalLike,
  Source,
  SourceLike,
} from '../types/signal.js';

/**
 * Coerce a constant into a signal.
 * true/1 are asserted true, false/0 asserted false, null/undefined floating.
 */
export function toSignal(value: unknown): Signal {
  if (value === true || value === 1) return true;
  if (value === false || value === 0) return false;
  if (value === null || value === undefined) return null;
  throw new TypeError(`Not a signal value: ${String(value)}`);
}

export function isEvaluable(value: unknown): value is Evaluable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'evaluate' in value &&
    typeof value.evaluate === 'function'
  );
}

export function isSourceList(value: InputSpec): value is readonly SourceLike[] {
  return Array.isArray(value);
}

const TRUE_SOURCE: Source = () => true;
const FALSE_SOURCE: Source = () => false;
const FLOATING_SOURCE: Source = () => null;

/**
 * Constant source for a signal. The three constants are shared.
 */
export function constant(value: SignalLike): Source {
  const signal = toSignal(value);
  if (signal === null) return FLOATING_SOURCE;
  return signal ? TRUE_SOURCE : FALSE_SOURCE;
}

/**
 * Convert any accepted source shape into an internal source.
 */
export function toSource(value: SourceLike): Source {
  if (isEvaluable(value)) {
    const device = value;
    return () => device.evaluate();
  }
  if (typeof value === 'function') {
    const fn = value;
    return () => toSignal(fn());
  }
  return constant(value);
}

/**
 * Drivers for one input: a single source or several wired together.
 */
export function toDrivers(value: InputSpec): Drivers {
  if (isSourceList(value)) {
    return value.map(toSource);
  }
  return [toSource(value)];
}
