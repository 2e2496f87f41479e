// Simulation driver: evaluates watched sources once per tick

import type { Signal, Source, SourceLike } from '../types/signal.js';
import { toSource } from '../signal/source.js';
import { isConflict } from '../devices/errors.js';
import type { Logger } from '../controls/indicator.js';

export interface SimulatorOptions {
  maxSettleSteps?: number;
  logger?: Logger;
}

// 'z' = floating, 'x' = conflicting drivers
export type SampleValue = 0 | 1 | 'z' | 'x';

export interface WaveformSample {
  cycle: number;
  values: Map<string, SampleValue>;
}

const DEFAULT_MAX_SETTLE_STEPS = 16;

// VCD identifiers use the printable characters '!' (33) to '~' (126)
const VCD_ID_FIRST = 33;
const VCD_ID_RANGE = 94;

/**
 * Identifier of the index-th VCD variable: '!' to '~', then '!!', '"!', ...
 */
export function vcdIdentifier(index: number): string {
  let id = '';
  let rest = index;
  do {
    id += String.fromCharCode(VCD_ID_FIRST + (rest % VCD_ID_RANGE));
    rest = Math.floor(rest / VCD_ID_RANGE) - 1;
  } while (rest >= 0);
  return id;
}

export function toSampleValue(signal: Signal): SampleValue {
  if (signal === null) return 'z';
  return signal ? 1 : 0;
}

export class Simulator {
  private sources: Map<string, Source> = new Map();
  private cycle: number = 0;
  private maxSettleSteps: number;
  private logger: Logger;

  // Waveform recording
  private recording: boolean = false;
  private waveform: WaveformSample[] = [];
  private recorded: string[] = [];

  constructor(options: SimulatorOptions = {}) {
    this.maxSettleSteps = options.maxSettleSteps ?? DEFAULT_MAX_SETTLE_STEPS;
    this.logger = options.logger ?? console;
  }

  /**
   * Watch a source under a name. Re-watching a name replaces its source.
   */
  watch(name: string, source: SourceLike): this {
    this.sources.set(name, toSource(source));
    return this;
  }

  unwatch(name: string): boolean {
    return this.sources.delete(name);
  }

  listSignals(): string[] {
    return Array.from(this.sources.keys());
  }

  /**
   * Evaluate one watched source now, outside the tick
   */
  read(name: string): Signal {
    return this.lookup(name)();
  }

  /**
   * Run a single tick and return its sample
   */
  step(): WaveformSample {
    const values = new Map<string, SampleValue>();
    for (const [name, source] of this.sources) {
      values.set(name, this.sample(name, source));
    }

    this.cycle++;
    const sample = { cycle: this.cycle, values };

    if (this.recording) {
      this.recordWaveform(sample);
    }
    return sample;
  }

  run(cycles: number): void {
    for (let i = 0; i < cycles; i++) {
      this.step();
    }
  }

  /**
   * Step until two consecutive ticks agree on every watched value.
   * Returns the number of ticks taken.
   */
  settle(maxSteps: number = this.maxSettleSteps): number {
    let previous = this.step();
    for (let steps = 2; steps <= maxSteps; steps++) {
      const current = this.step();
      if (sameValues(previous.values, current.values)) {
        return steps;
      }
      previous = current;
    }
    throw new Error(`Circuit did not settle within ${maxSteps} steps`);
  }

  getCycle(): number {
    return this.cycle;
  }

  /**
   * Reset to cycle 0. Watched sources are kept.
   */
  reset(): void {
    this.cycle = 0;
    this.waveform = [];
  }

  // Waveform recording

  /**
   * Start recording. Records every watched signal when no names are given.
   */
  startRecording(signalNames?: string[]): void {
    const names = signalNames ?? this.listSignals();
    for (const name of names) {
      this.lookup(name);
    }
    this.recorded = names;
    this.waveform = [];
    this.recording = true;
  }

  stopRecording(): WaveformSample[] {
    this.recording = false;
    return this.waveform;
  }

  private recordWaveform(sample: WaveformSample): void {
    const values = new Map<string, SampleValue>();
    for (const name of this.recorded) {
      const value = sample.values.get(name);
      if (value !== undefined) {
        values.set(name, value);
      }
    }
    this.waveform.push({ cycle: sample.cycle, values });
  }

  /**
   * Export the recorded waveform in VCD format.
   * Floating values are written as z, conflicts as x.
   */
  exportVCD(signalNames?: string[]): string {
    const signals = signalNames ?? this.listSignals();

    const lines: string[] = [];

    // Header
    lines.push('$timescale 1ns $end');
    lines.push('$scope module top $end');

    // Declare signals
    const varIds = new Map<string, string>();
    for (const [index, name] of signals.entries()) {
      const id = vcdIdentifier(index);
      varIds.set(name, id);
      lines.push(`$var wire 1 ${id} ${name} $end`);
    }

    lines.push('$upscope $end');
    lines.push('$enddefinitions $end');

    // The first recorded sample is the initial state at #0
    const [initial, ...changes] = this.waveform;
    const start = initial?.cycle ?? 0;
    lines.push('#0');
    lines.push('$dumpvars');
    for (const name of signals) {
      const val = initial?.values.get(name);
      if (val !== undefined) {
        lines.push(`${val}${varIds.get(name)}`);
      }
    }
    lines.push('$end');

    for (const sample of changes) {
      lines.push(`#${(sample.cycle - start) * 10}`);
      for (const [name, val] of sample.values) {
        const id = varIds.get(name);
        if (id !== undefined) {
          lines.push(`${val}${id}`);
        }
      }
    }

    return lines.join('\n');
  }

  private sample(name: string, source: Source): SampleValue {
    try {
      return toSampleValue(source());
    } catch (e) {
      if (!isConflict(e)) {
        throw e;
      }
      this.logger.warn(`cycle ${this.cycle}: ${name}: ${e.message}`);
      return 'x';
    }
  }

  private lookup(name: string): Source {
    const source = this.sources.get(name);
    if (source === undefined) {
      throw new Error(`Unknown signal: ${name}`);
    }
    return source;
  }
}

function sameValues(a: Map<string, SampleValue>, b: Map<string, SampleValue>): boolean {
  if (a.size !== b.size) return false;
  for (const [name, value] of a) {
    if (b.get(name) !== value) return false;
  }
  return true;
}
