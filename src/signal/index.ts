export { toSignal, toSource, toDrivers, constant, isEvaluable, isSourceList } from './source.js';
export { resolve } from './resolver.js';
