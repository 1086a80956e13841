import { performance } from 'node:perf_hooks';
import { setTimeout as sleepFor } from 'node:timers/promises';
import type { DeviceState } from '@ewelink-bridge/shared';
import type { Logger } from '../logging/logger.js';
import { SequenceError, toBridgeError } from '../errors/bridge-error.js';
import { silentLogger } from '../logging/logger.js';
import { DEFAULT_BLINK_CYCLES, DEFAULT_BLINK_STEP_DELAY_MS } from '../config/constants.js';

/**
 * Anything that can switch a device
 */
export interface DeviceCommander {
  setState(deviceId: string, state: DeviceState): Promise<void>;
}

export interface SequenceOptions {
  stepDelayMs?: number;
  signal?: AbortSignal;
  onStep?: (index: number, state: DeviceState) => void;
  logger?: Logger;
}

export interface SequenceResult {
  deviceId: string;
  steps: DeviceState[];
  finalState: DeviceState;
  durationMs: number;
}

/**
 * `on, off` repeated `cycles` times, then a final `on`
 */
export function blinkPattern(cycles: number = DEFAULT_BLINK_CYCLES): DeviceState[] {
  if (!Number.isInteger(cycles) || cycles < 1) {
    throw new RangeError(`cycles must be a positive integer, got ${cycles}`);
  }
  const steps: DeviceState[] = [];
  for (let i = 0; i < cycles; i++) {
    steps.push('on', 'off');
  }
  steps.push('on');
  return steps;
}

/**
 * Wait until at least `ms` of wall-clock time has passed
 * Timers may fire early, so the remainder is slept again
 */
export async function waitAtLeast(ms: number, signal?: AbortSignal): Promise<void> {
  const start = performance.now();
  let remaining = ms;

  while (remaining > 0) {
    await sleepFor(Math.ceil(remaining), undefined, { signal });
    remaining = ms - (performance.now() - start);
  }
}

/**
 * Issue each step in order, waiting between steps
 *
 * The first failed step aborts the rest (`sequence_aborted`). An abort
 * signal stops the sequence before the next command (`sequence_cancelled`).
 * Device state is never reconciled after a failure.
 */
export async function runCommandSequence(
  commander: DeviceCommander,
  deviceId: string,
  steps: readonly DeviceState[],
  options: SequenceOptions = {}
): Promise<SequenceResult> {
  const stepDelayMs = options.stepDelayMs ?? DEFAULT_BLINK_STEP_DELAY_MS;
  const logger = options.logger ?? silentLogger;
  const start = performance.now();
  let lastCommanded: DeviceState | undefined;

  const lastStep = steps[steps.length - 1];
  if (lastStep === undefined) {
    throw new RangeError('A sequence needs at least one step');
  }

  for (const [index, state] of steps.entries()) {
    if (index > 0) {
      try {
        await waitAtLeast(stepDelayMs, options.signal);
      } catch (err) {
        if (options.signal?.aborted) {
          logger.info('sequence cancelled', { deviceId, nextStep: index });
          throw SequenceError.cancelled(index, lastCommanded);
        }
        throw err;
      }
    }

    if (options.signal?.aborted) {
      logger.info('sequence cancelled', { deviceId, nextStep: index });
      throw SequenceError.cancelled(index, lastCommanded);
    }

    try {
      await commander.setState(deviceId, state);
    } catch (err) {
      const error = toBridgeError(err);
      logger.warn('sequence step failed', { deviceId, step: index, error: error.code });
      throw SequenceError.aborted(index, lastCommanded, error);
    }

    lastCommanded = state;
    options.onStep?.(index, state);
  }

  return {
    deviceId,
    steps: [...steps],
    finalState: lastStep,
    durationMs: Math.round(performance.now() - start),
  };
}
