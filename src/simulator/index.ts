export {
  Simulator,
  toSampleValue,
  vcdIdentifier,
  type SimulatorOptions,
  type SampleValue,
  type WaveformSample,
} from './simulator.js';
