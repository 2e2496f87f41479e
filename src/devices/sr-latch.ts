/**
 * SR latch
 *
 * Two identical gates cross-wired into a loop:
 *
 *   ic1 = gate(R, ic2)   -> Q
 *   ic2 = gate(S, ic1)   -> Q_
 *
 * With NOR gates the inputs are active high: S sets Q, R resets it.
 * With NAND gates they are active low, and since R drives the Q gate,
 * pulling R low drives Q high (and S low drives Q_ high).
 *
 * Both inputs at their active level would force Q = Q_. That combination is
 * reported as a conflict instead of being returned.
 */

import type { InputSpec, Signal } from '../types/signal.js';
import { DeviceError, DeviceErrorType } from './errors.js';
import { OneInputDevice } from './device.js';
import { createGate, type Gate } from './gates.js';
import { EvaluationGuard } from './guard.js';

export type LatchGate = 'NOR' | 'NAND';

export interface SRLatchOptions {
  gate?: LatchGate; // default NOR
}

export class SRLatch extends OneInputDevice {
  readonly gate: LatchGate;
  readonly ic1: Gate;
  readonly ic2: Gate;

  // Q_ can be wired back into R or S, so its pull is guarded like Q's
  readonly qBarGuard: EvaluationGuard = new EvaluationGuard();

  constructor(options: SRLatchOptions = {}) {
    super(['R', 'S']);
    this.gate = options.gate ?? 'NOR';
    this.ic1 = createGate(this.gate);
    this.ic2 = createGate(this.gate);
    this.ic1.inputs = [this.drivers('R'), this.ic2];
    this.ic2.inputs = [this.drivers('S'), this.ic1];
  }

  setInput(name: string, source: InputSpec): void {
    super.setInput(name, source);
    if (name === 'R') {
      this.ic1.inputs = [this.drivers('R'), this.ic2];
    } else if (name === 'S') {
      this.ic2.inputs = [this.drivers('S'), this.ic1];
    }
  }

  readonly q = (): Signal => this.evaluate();

  readonly qBar = (): Signal =>
    this.qBarGuard.run(() => {
      if (!this.isEnabled()) {
        return null;
      }
      this.checkInputs();
      return this.ic2.evaluate();
    });

  protected compute(): Signal {
    this.checkInputs();
    return this.ic1.evaluate();
  }

  private checkInputs(): void {
    const active = this.gate === 'NOR';
    if (this.getInput('R') === active && this.getInput('S') === active) {
      throw new DeviceError(
        DeviceErrorType.CONFLICT,
        'Conflicting inputs: R and S both active'
      );
    }
  }
}
