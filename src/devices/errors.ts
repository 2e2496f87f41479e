/**
 * Device errors
 *
 * Every failure raised by the device graph is a DeviceError tagged with its kind.
 */

export enum DeviceErrorType {
  CONFLICT = 'CONFLICT',
  ARITY_VIOLATION = 'ARITY_VIOLATION',
  NOT_IMPLEMENTED = 'NOT_IMPLEMENTED',
  UNKNOWN_INPUT = 'UNKNOWN_INPUT',
}

export class DeviceError extends Error {
  constructor(
    public readonly type: DeviceErrorType,
    message: string
  ) {
    super(message);
    this.name = 'DeviceError';
  }
}

export function isConflict(error: unknown): error is DeviceError {
  return error instanceof DeviceError && error.type === DeviceErrorType.CONFLICT;
}
