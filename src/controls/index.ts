export { Toggle } from './toggle.js';
export { PushButton } from './push-button.js';
export { Indicator, type IndicatorOptions, type Logger } from './indicator.js';
