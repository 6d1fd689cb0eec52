/**
 * Device-side faults. None of them is fatal to the device loop: each is
 * caught by the task that raised it and reflected in state or on the display.
 */

export type FaultKind = 'sensor' | 'connectivity' | 'upload';

export abstract class DeviceFault extends Error {
  public abstract readonly kind: FaultKind;
}

export class SensorFault extends DeviceFault {
  public readonly kind = 'sensor';

  constructor(public readonly sensor: string, message: string) {
    super(`${sensor}: ${message}`);
    this.name = 'SensorFault';
  }
}

export class ConnectivityLoss extends DeviceFault {
  public readonly kind = 'connectivity';

  constructor(message = 'WiFi association lost') {
    super(message);
    this.name = 'ConnectivityLoss';
  }
}

export class UploadFailure extends DeviceFault {
  public readonly kind = 'upload';

  constructor(
    message: string,
    public readonly status: number | null, // HTTP status, null when no response arrived
    public readonly timedOut: boolean = false
  ) {
    super(message);
    this.name = 'UploadFailure';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
