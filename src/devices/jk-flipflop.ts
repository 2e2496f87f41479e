/**
 * JK flip-flop (level-sensitive, NAND based)
 *
 *   icj = NAND(Q_, J, CLK)
 *   ick = NAND(Q, K, CLK)
 *   ic1 = NAND(icj, ic2)   -> Q
 *   ic2 = NAND(ick, ic1)   -> Q_
 *
 * While CLK is high J sets and K resets; while CLK is low the latch holds.
 * J = K = 1 with CLK high is the race-around case: both gating gates go low
 * and Q and Q_ both read true until CLK falls.
 *
 * The gating gates are only connected once J, K and CLK are all driven.
 * Until then they stay on floating placeholders, which makes them output true
 * and leaves the latch holding. A pin with conflicting drivers counts as
 * driven; the conflict is thrown from q() and qBar().
 */

import type { InputSpec, Signal } from '../types/signal.js';
import { OneInputDevice } from './device.js';
import { isConflict } from './errors.js';
import { NandGate } from './gates.js';
import { EvaluationGuard } from './guard.js';

const PIN_NAMES = ['J', 'K', 'CLK'] as const;

export class JKFlipFlop extends OneInputDevice {
  readonly ic1 = new NandGate();
  readonly ic2 = new NandGate();
  readonly icj = new NandGate();
  readonly ick = new NandGate();

  readonly qBarGuard: EvaluationGuard = new EvaluationGuard();

  private wired: boolean = false;

  constructor() {
    super(PIN_NAMES);
    this.ic1.inputs = [this.icj, this.ic2];
    this.ic2.inputs = [this.ick, this.ic1];
  }

  /** Whether the clock gating is connected to the pins */
  get isWired(): boolean {
    return this.wired;
  }

  setInput(name: string, source: InputSpec): void {
    super.setInput(name, source);
    this.rewire();
  }

  readonly q = (): Signal => this.evaluate();

  readonly qBar = (): Signal =>
    this.qBarGuard.run(() => {
      if (!this.isEnabled()) {
        return null;
      }
      this.checkPins();
      return this.ic2.evaluate();
    });

  protected compute(): Signal {
    this.checkPins();
    return this.ic1.evaluate();
  }

  // Throws on the first pin with conflicting drivers
  private checkPins(): void {
    for (const name of PIN_NAMES) {
      this.getInput(name);
    }
  }

  private isDriven(name: string): boolean {
    try {
      return this.getInput(name) !== null;
    } catch (error) {
      if (isConflict(error)) {
        return true;
      }
      throw error;
    }
  }

  private rewire(): void {
    const ready = PIN_NAMES.every((name) => this.isDriven(name));
    if (!ready) {
      this.icj.inputs = [null, null];
      this.ick.inputs = [null, null];
      this.wired = false;
      return;
    }

    this.icj.inputs = [this.ic2, this.drivers('J'), this.drivers('CLK')];
    this.ick.inputs = [this.ic1, this.drivers('K'), this.drivers('CLK')];
    this.wired = true;
  }
}
