/**
 * Indicator lamp
 *
 * Reads its source once per refresh. A conflicting source leaves the lamp dark
 * for that refresh and records the fault; any other error propagates.
 */

import type { Signal, Source, SourceLike } from '../types/signal.js';
import { toSource } from '../signal/source.js';
import { DeviceError, isConflict } from '../devices/errors.js';

export type Logger = Pick<Console, 'warn'>;

export interface IndicatorOptions {
  label?: string;
  logger?: Logger; // default console
}

export class Indicator {
  readonly label: string;
  private source: Source;
  private logger: Logger;

  private state: Signal = null;
  private lastFault: DeviceError | null = null;

  constructor(source: SourceLike, options: IndicatorOptions = {}) {
    this.source = toSource(source);
    this.label = options.label ?? 'indicator';
    this.logger = options.logger ?? console;
  }

  /** Last value read; null when floating or faulted */
  get lit(): Signal {
    return this.state;
  }

  get fault(): DeviceError | null {
    return this.lastFault;
  }

  connect(source: SourceLike): void {
    this.source = toSource(source);
  }

  refresh(): Signal {
    try {
      this.state = this.source();
      this.lastFault = null;
    } catch (e) {
      if (!isConflict(e)) {
        throw e;
      }
      this.state = null;
      this.lastFault = e;
      this.logger.warn(`${this.label}: ${e.message}`);
    }
    return this.state;
  }
}
