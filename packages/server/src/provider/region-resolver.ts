import type { RegionEndpoint, RegionId } from '@ewelink-bridge/shared';
import { REGION_ENDPOINTS, REGION_IDS } from '../config/constants.js';
import type { AttemptFailure } from '../errors/bridge-error.js';
import { BridgeError, toBridgeError } from '../errors/bridge-error.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';

export interface RegionResolverOptions {
  preferred?: RegionId;
  logger?: Logger;
}

export interface TryEachRegionOptions {
  // Recorded on each failure entry
  strategy?: string;
  // Stop iterating and rethrow this error as is
  shouldAbort?: (error: BridgeError, region: RegionEndpoint) => boolean;
}

export interface RegionSuccess<T> {
  result: T;
  region: RegionEndpoint;
}

/**
 * Ordered candidate regions for a request
 *
 * The last region that succeeded in this process (or the persisted hint it
 * was seeded with) is tried first. Regions are tried one at a time.
 */
export class RegionEndpointResolver {
  private readonly regionIds: readonly RegionId[];
  private preferred: RegionId | undefined;
  private readonly logger: Logger;

  constructor(regionIds: readonly RegionId[] = REGION_IDS, options: RegionResolverOptions = {}) {
    if (regionIds.length === 0) {
      throw BridgeError.configuration('At least one region must be configured');
    }
    this.regionIds = [...new Set(regionIds)];
    this.logger = options.logger ?? silentLogger;
    if (options.preferred) {
      this.prefer(options.preferred);
    }
  }

  regions(): RegionEndpoint[] {
    const ordered = this.preferred
      ? [this.preferred, ...this.regionIds.filter((id) => id !== this.preferred)]
      : [...this.regionIds];
    return ordered.map((id) => REGION_ENDPOINTS[id]);
  }

  preferredRegion(): RegionId | undefined {
    return this.preferred;
  }

  /**
   * Move a region to the front; ignored when it is not configured
   */
  prefer(regionId: RegionId): void {
    if (this.regionIds.includes(regionId)) {
      this.preferred = regionId;
    }
  }

  async tryEachRegion<T>(
    operation: (region: RegionEndpoint) => Promise<T>,
    options: TryEachRegionOptions = {}
  ): Promise<RegionSuccess<T>> {
    const failures: AttemptFailure[] = [];

    for (const region of this.regions()) {
      try {
        const result = await operation(region);
        this.prefer(region.id);
        return { result, region };
      } catch (err) {
        const error = toBridgeError(err);
        if (options.shouldAbort?.(error, region)) {
          throw error;
        }

        const failure: AttemptFailure = {
          region: region.id,
          code: error.code,
          message: error.message,
        };
        if (options.strategy) {
          failure.strategy = options.strategy;
        }
        if (error.providerCode !== undefined) {
          failure.providerCode = error.providerCode;
        }
        failures.push(failure);

        this.logger.debug('region attempt failed', {
          region: region.id,
          strategy: options.strategy,
          error: error.code,
        });
      }
    }

    throw BridgeError.regionsExhausted(failures);
  }
}
