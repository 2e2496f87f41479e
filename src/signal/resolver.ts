// Input resolver: combines the drivers of one input into a single signal

import type { Drivers, Signal } from '../types/signal.js';
import { DeviceError, DeviceErrorType } from '../devices/errors.js';

/**
 * Resolve every driver of an input.
 *
 * Drivers asserting opposite levels at the same time are a conflict.
 * If no driver asserts a level the input is floating.
 */
export function resolve(drivers: Drivers): Signal {
  let ones = 0;
  let zeros = 0;

  for (const driver of drivers) {
    const value = driver();
    if (value === true) {
      ones++;
    } else if (value === false) {
      zeros++;
    }
  }

  if (ones > 0 && zeros > 0) {
    throw new DeviceError(DeviceErrorType.CONFLICT, 'Conflicting inputs');
  }
  if (ones > 0) return true;
  if (zeros > 0) return false;
  return null;
}
