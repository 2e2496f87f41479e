#!/usr/bin/env node
/**
 * Logic CLI
 *
 * Usage: logic-sim <truth|sr|jk> [options]
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import type { Signal } from './types/signal.js';
import { GATE_ARITY, createGate, isGateKind, type GateKind } from './devices/gates.js';
import { SRLatch, type LatchGate } from './devices/sr-latch.js';
import { JKFlipFlop } from './devices/jk-flipflop.js';
import { Toggle } from './controls/toggle.js';
import { Simulator, toSampleValue } from './simulator/simulator.js';

type CliOptions =
  | { command: 'truth'; gate: GateKind; inputs: number }
  | { command: 'sr'; gate: LatchGate }
  | { command: 'jk' }
  | { command: 'help' };

const INPUT_LETTERS = 'abcdefgh';

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return null;
  }
  if (cliArgs.includes('-h') || cliArgs.includes('--help')) {
    return { command: 'help' };
  }

  const [command, ...rest] = cliArgs;

  switch (command) {
    case 'truth': {
      const [kind, ...flags] = rest;
      if (kind === undefined) {
        console.error('Error: truth requires a gate (NOT, AND, NAND or NOR)');
        return null;
      }
      const gate = kind.toUpperCase();
      if (!isGateKind(gate)) {
        console.error(`Error: Unknown gate '${kind}'`);
        return null;
      }
      let inputs = GATE_ARITY[gate];
      for (let i = 0; i < flags.length; i++) {
        if (flags[i] === '--inputs' || flags[i] === '-n') {
          if (i + 1 >= flags.length) {
            console.error('Error: --inputs requires a number');
            return null;
          }
          inputs = Number(flags[++i]);
        } else {
          console.error(`Error: Unknown option '${flags[i]}'`);
          return null;
        }
      }
      if (!Number.isInteger(inputs) || inputs < GATE_ARITY[gate] || inputs > INPUT_LETTERS.length) {
        console.error(`Error: ${gate} takes between ${GATE_ARITY[gate]} and ${INPUT_LETTERS.length} inputs`);
        return null;
      }
      if (gate === 'NOT' && inputs !== 1) {
        console.error('Error: NOT takes exactly 1 input');
        return null;
      }
      return { command: 'truth', gate, inputs };
    }

    case 'sr': {
      let gate: LatchGate = 'NOR';
      for (let i = 0; i < rest.length; i++) {
        if (rest[i] === '--gate') {
          const value = rest[++i]?.toUpperCase();
          if (value !== 'NOR' && value !== 'NAND') {
            console.error('Error: --gate must be NOR or NAND');
            return null;
          }
          gate = value;
        } else {
          console.error(`Error: Unknown option '${rest[i]}'`);
          return null;
        }
      }
      return { command: 'sr', gate };
    }

    case 'jk':
      if (rest.length > 0) {
        console.error(`Error: Unknown option '${rest[0]}'`);
        return null;
      }
      return { command: 'jk' };

    default:
      console.error(`Error: Unknown command '${command}'`);
      return null;
  }
}

function printUsage(): void {
  console.log(`Tristate logic simulator

Usage: logic-sim <command> [options]

Commands:
  truth <gate> [--inputs N]  Print the truth table of NOT, AND, NAND or NOR
  sr [--gate NOR|NAND]       Run set, hold, reset, hold on an SR latch
  jk                         Run set, hold, reset, hold on a JK flip-flop

Options:
  -h, --help                 Show this help message

Examples:
  logic-sim truth nand --inputs 3
  logic-sim sr --gate NAND`);
}

function bit(signal: Signal): string {
  return String(toSampleValue(signal));
}

/**
 * Truth table rows for a gate, inputs counting up from all-false
 */
export function truthTable(kind: GateKind, inputCount: number): string[] {
  const switches = Array.from({ length: inputCount }, () => new Toggle(false));
  const gate = createGate(kind);
  gate.inputs = switches;

  const names = INPUT_LETTERS.slice(0, inputCount).split('');
  const lines = [`${names.join(' ')} | out`];

  for (let row = 0; row < 1 << inputCount; row++) {
    // First input is the most significant bit
    switches.forEach((s, i) => s.set(((row >> (inputCount - 1 - i)) & 1) === 1));
    const levels = switches.map((s) => bit(s.value));
    lines.push(`${levels.join(' ')} | ${bit(gate.evaluate())}`);
  }
  return lines;
}

interface Phase {
  name: string;
  levels: Record<string, boolean>;
}

function runPhases(
  pins: Record<string, Toggle>,
  outputs: { q: () => Signal; qBar: () => Signal },
  phases: Phase[]
): string[] {
  const sim = new Simulator();
  sim.watch('Q', outputs.q).watch('Q_', outputs.qBar);

  const pinNames = Object.keys(pins);
  const lines = [`phase ${pinNames.join(' ')} | Q Q_`];

  for (const phase of phases) {
    for (const name of pinNames) {
      pins[name].set(phase.levels[name]);
    }
    sim.settle();
    const levels = pinNames.map((name) => bit(pins[name].value));
    lines.push(`${phase.name.padEnd(5)} ${levels.join(' ')} | ${bit(sim.read('Q'))} ${bit(sim.read('Q_'))}`);
  }
  return lines;
}

/**
 * Set, hold, reset, hold on an SR latch.
 * NAND latches hold with both inputs high, NOR latches with both low.
 */
export function srDemo(gate: LatchGate): string[] {
  const latch = new SRLatch({ gate });
  const s = new Toggle(false);
  const r = new Toggle(false);
  latch.setInput('S', s);
  latch.setInput('R', r);

  const idle = gate === 'NAND';
  return runPhases({ S: s, R: r }, latch, [
    { name: 'set', levels: { S: true, R: false } },
    { name: 'hold', levels: { S: idle, R: idle } },
    { name: 'reset', levels: { S: false, R: true } },
    { name: 'hold', levels: { S: idle, R: idle } },
  ]);
}

export function jkDemo(): string[] {
  const ff = new JKFlipFlop();
  const j = new Toggle(false);
  const k = new Toggle(false);
  const clk = new Toggle(false);
  ff.setInput('J', j);
  ff.setInput('K', k);
  ff.setInput('CLK', clk);

  return runPhases({ J: j, K: k, CLK: clk }, ff, [
    { name: 'set', levels: { J: true, K: false, CLK: true } },
    { name: 'hold', levels: { J: false, K: false, CLK: false } },
    { name: 'reset', levels: { J: false, K: true, CLK: true } },
    { name: 'hold', levels: { J: false, K: false, CLK: false } },
  ]);
}

function execute(options: Exclude<CliOptions, { command: 'help' }>): string[] {
  switch (options.command) {
    case 'truth':
      return truthTable(options.gate, options.inputs);
    case 'sr':
      return srDemo(options.gate);
    case 'jk':
      return jkDemo();
  }
}

export function main(args: string[] = process.argv): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return 1;
  }
  if (options.command === 'help') {
    printUsage();
    return 0;
  }

  let lines: string[];
  try {
    lines = execute(options);
  } catch (e) {
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  for (const line of lines) {
    console.log(line);
  }
  return 0;
}

function isEntryPoint(): boolean {
  const invokedPath = process.argv[1];
  if (invokedPath === undefined) {
    return false;
  }
  try {
    return realpathSync(invokedPath) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run if executed directly
if (isEntryPoint()) {
  process.exit(main());
}
