/**
 * Switch state of a single-channel device
 */
export type DeviceState = 'on' | 'off';

export interface DeviceCommand {
  deviceId: string;
  desiredState: DeviceState;
}

/**
 * Device as listed by the provider
 */
export interface DeviceSummary {
  deviceId: string;
  name: string;
  online: boolean;
  model?: string;
  params: Record<string, unknown>;
}

/**
 * Reported status of a device
 */
export interface DeviceStatus {
  deviceId: string;
  online: boolean;
  switchState: DeviceState | 'unknown';
  updatedAt?: string;
}
