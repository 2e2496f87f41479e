// Signal types for the pull-based device graph
// A signal is tri-state: asserted true, asserted false, or floating (undriven)

export type Signal = boolean | null;

export const FLOATING: Signal = null;

// Constant shapes accepted wherever an external value enters the graph
export type SignalLike = boolean | 0 | 1 | null | undefined;

// Anything that produces a signal on demand (devices, controls)
export interface Evaluable {
  evaluate(): Signal;
}

// Internal source: a zero-argument evaluator
export type Source = () => Signal;

// External source shapes, coerced by toSource()
export type SourceLike = SignalLike | Evaluable | (() => SignalLike);

// All sources bound to one logical input (a wired net)
export type Drivers = readonly Source[];

// Value of one positional input as given by the caller
export type InputSpec = SourceLike | readonly SourceLike[];
