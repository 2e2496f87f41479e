// Tristate Logic - pull-evaluated boolean devices
// Gates, latches and flip-flops wired into graphs that may loop back on themselves

// Signals and sources
export {
  FLOATING,
  type Signal,
  type SignalLike,
  type Source,
  type SourceLike,
  type Drivers,
  type InputSpec,
  type Evaluable,
} from './types/signal.js';
export {
  toSignal,
  toSource,
  toDrivers,
  constant,
  isEvaluable,
  isSourceList,
  resolve,
} from './signal/index.js';

// Devices
export * from './devices/index.js';

// Switches and lamps
export * from './controls/index.js';

// Tick driver
export * from './simulator/index.js';
