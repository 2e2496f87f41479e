// Latched switch: keeps whatever level it was last set to

import type { Evaluable, Signal, SignalLike } from '../types/signal.js';
import { toSignal } from '../signal/source.js';

export class Toggle implements Evaluable {
  private state: Signal;

  constructor(initial: SignalLike = false) {
    this.state = toSignal(initial);
  }

  get value(): Signal {
    return this.state;
  }

  set(value: SignalLike): void {
    this.state = toSignal(value);
  }

  /**
   * Flip the switch. A floating switch flips to true.
   */
  toggle(): Signal {
    this.state = this.state !== true;
    return this.state;
  }

  evaluate(): Signal {
    return this.state;
  }
}
