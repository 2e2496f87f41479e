// Momentary switch: drives true while held, open (floating) when released

import type { Evaluable, Signal } from '../types/signal.js';

export class PushButton implements Evaluable {
  private pressed: boolean = false;

  get isPressed(): boolean {
    return this.pressed;
  }

  press(): void {
    this.pressed = true;
  }

  release(): void {
    this.pressed = false;
  }

  evaluate(): Signal {
    return this.pressed ? true : null;
  }
}
