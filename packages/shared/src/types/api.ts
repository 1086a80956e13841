import type { DeviceState, DeviceStatus, DeviceSummary } from './device.js';
import type { RegionId } from './region.js';

/**
 * Bridge HTTP API shapes
 */

export interface HealthResponse {
  status: 'ok';
  authenticated: boolean;
  region?: RegionId;
}

export interface AuthorizationUrlResponse {
  url: string;
  seq: string;
  expiresIn: number;
}

export interface CallbackResponse {
  authenticated: true;
  region: RegionId;
  expiresAt?: string;
}

export interface SetStateRequest {
  state: DeviceState;
}

export interface SetStateResponse {
  deviceId: string;
  state: DeviceState;
}

export interface BlinkRequest {
  cycles?: number;
  stepDelayMs?: number;
}

export interface BlinkResponse {
  deviceId: string;
  steps: DeviceState[];
  finalState: DeviceState;
  durationMs: number;
}

export interface DeviceListResponse {
  devices: DeviceSummary[];
}

export type DeviceStatusResponse = DeviceStatus;

export interface ApiErrorResponse {
  error: string;
  error_description?: string;
  provider_code?: number;
  attempts?: Array<{ region: RegionId; strategy?: string; code: string; message: string; providerCode?: number }>;
  details?: Record<string, unknown>;
}
