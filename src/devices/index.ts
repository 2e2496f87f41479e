export { DeviceError, DeviceErrorType, isConflict } from './errors.js';
export { EvaluationGuard } from './guard.js';
export { Device, OneInputDevice, MultiInputDevice } from './device.js';
export {
  Gate,
  NotGate,
  AndGate,
  NandGate,
  NorGate,
  createGate,
  isGateKind,
  GATE_FUNCTIONS,
  GATE_ARITY,
  GATE_KINDS,
  type GateKind,
  type GateFunction,
} from './gates.js';
export { SRLatch, type SRLatchOptions, type LatchGate } from './sr-latch.js';
export { JKFlipFlop } from './jk-flipflop.js';
