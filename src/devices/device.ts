/**
 * Device base
 *
 * A device holds ordered positional inputs, optional named inputs (pins) and an
 * enable line. It is itself a signal source: evaluate() pulls its inputs on
 * demand and computes its output under an EvaluationGuard, so any device can sit
 * inside a feedback loop.
 */

import type { Drivers, Evaluable, InputSpec, Signal, Source, SourceLike } from '../types/signal.js';
import { constant, toDrivers, toSource } from '../signal/source.js';
import { resolve } from '../signal/resolver.js';
import { DeviceError, DeviceErrorType } from './errors.js';
import { EvaluationGuard } from './guard.js';

function isInputList(value: InputSpec | readonly InputSpec[]): value is readonly InputSpec[] {
  return Array.isArray(value);
}

export abstract class Device implements Evaluable {
  readonly minInputs: number;
  readonly inputNames: readonly string[];
  readonly guard: EvaluationGuard = new EvaluationGuard();

  // The enable line may lead back to the device itself
  private readonly enableGuard: EvaluationGuard = new EvaluationGuard();

  private positional: Drivers[];
  private named: Map<string, Drivers>;
  private enableSource: Source = constant(true);

  constructor(minInputs: number, inputNames: readonly string[] = []) {
    const compute: unknown = Reflect.get(this, 'compute');
    if (typeof compute !== 'function') {
      throw new DeviceError(
        DeviceErrorType.NOT_IMPLEMENTED,
        `${new.target.name} does not implement compute()`
      );
    }

    this.minInputs = minInputs;
    this.inputNames = [...inputNames];

    // Unconnected inputs float until wired
    this.positional = Array.from({ length: minInputs }, () => [constant(null)]);
    this.named = new Map(inputNames.map((name): [string, Drivers] => [name, [constant(null)]]));
  }

  /**
   * The device's boolean function. Only called through the guard.
   */
  protected abstract compute(): Signal;

  get inputs(): readonly Drivers[] {
    return this.positional;
  }

  /**
   * Wire the positional inputs.
   *
   * Accepts a single source or a list with one entry per input. A list entry
   * may itself be a list of sources driving that input together.
   */
  set inputs(value: InputSpec | readonly InputSpec[]) {
    const specs: readonly InputSpec[] = isInputList(value) ? value : [value];
    if (specs.length < this.minInputs) {
      throw new DeviceError(
        DeviceErrorType.ARITY_VIOLATION,
        `${this.constructor.name} needs at least ${this.minInputs} input(s), got ${specs.length}`
      );
    }
    this.positional = specs.map(toDrivers);
  }

  get enable(): Signal {
    return this.enableSource();
  }

  set enable(value: SourceLike) {
    this.enableSource = toSource(value);
  }

  /**
   * Output of the device; floating while disabled
   */
  evaluate(): Signal {
    if (!this.isEnabled()) {
      return null;
    }
    return this.guard.run(() => this.compute());
  }

  getInput(name: string): Signal {
    return resolve(this.drivers(name));
  }

  setInput(name: string, source: InputSpec): void {
    this.drivers(name); // throws for unknown pins
    this.named.set(name, toDrivers(source));
  }

  /**
   * Whether the enable line reads true. A read that comes back to this
   * device through its own enable line sees the previous reading.
   */
  protected isEnabled(): boolean {
    return this.enableGuard.run(() => resolve([this.enableSource])) === true;
  }

  protected drivers(name: string): Drivers {
    const drivers = this.named.get(name);
    if (drivers === undefined) {
      throw new DeviceError(
        DeviceErrorType.UNKNOWN_INPUT,
        `${this.constructor.name} has no input named '${name}'`
      );
    }
    return drivers;
  }
}

/** Device taking a single positional input */
export abstract class OneInputDevice extends Device {
  constructor(inputNames: readonly string[] = []) {
    super(1, inputNames);
  }
}

/** Device taking two or more positional inputs */
export abstract class MultiInputDevice extends Device {
  constructor(inputNames: readonly string[] = []) {
    super(2, inputNames);
  }
}
