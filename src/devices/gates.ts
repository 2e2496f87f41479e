// Gates: stateless functions of their resolved inputs
//
// Inputs are resolved left to right and evaluation stops at the first input
// that decides the output, so a gate in a feedback loop only pulls as far as
// it has to.

import type { Drivers, Signal } from '../types/signal.js';
import { resolve } from '../signal/resolver.js';
import { Device } from './device.js';

export type GateKind = 'NOT' | 'AND' | 'NAND' | 'NOR';

export type GateFunction = (inputs: readonly Drivers[]) => Signal;

export const GATE_FUNCTIONS: Record<GateKind, GateFunction> = {
  // An open input reads as true
  NOT: (inputs) => {
    const value = resolve(inputs[0]);
    return value === null ? true : !value;
  },
  AND: (inputs) => {
    for (const input of inputs) {
      if (resolve(input) !== true) return false;
    }
    return true;
  },
  NOR: (inputs) => {
    for (const input of inputs) {
      if (resolve(input) === true) return false;
    }
    return true;
  },
  NAND: (inputs) => {
    for (const input of inputs) {
      if (resolve(input) !== true) return true;
    }
    return false;
  },
};

export const GATE_ARITY: Record<GateKind, number> = {
  NOT: 1,
  AND: 2,
  NAND: 2,
  NOR: 2,
};

export const GATE_KINDS: readonly GateKind[] = ['NOT', 'AND', 'NAND', 'NOR'];

export function isGateKind(value: string): value is GateKind {
  return GATE_KINDS.some((kind) => kind === value);
}

export class Gate extends Device {
  constructor(public readonly kind: GateKind) {
    super(GATE_ARITY[kind]);
  }

  protected compute(): Signal {
    return GATE_FUNCTIONS[this.kind](this.inputs);
  }
}

export class NotGate extends Gate {
  constructor() {
    super('NOT');
  }
}

export class AndGate extends Gate {
  constructor() {
    super('AND');
  }
}

export class NandGate extends Gate {
  constructor() {
    super('NAND');
  }
}

export class NorGate extends Gate {
  constructor() {
    super('NOR');
  }
}

export function createGate(kind: GateKind): Gate {
  switch (kind) {
    case 'NOT':
      return new NotGate();
    case 'AND':
      return new AndGate();
    case 'NAND':
      return new NandGate();
    case 'NOR':
      return new NorGate();
  }
}
