/**
 * Registry and gateway wiring for the commands
 */

import type { Logger, PlatformId, RuntimeConfig } from '@lumora/core';
import {
  MockAdapter,
  PlatformGateway,
  PlatformRegistry,
  createDefaultRegistry,
  resolvePlatformCredentials,
  type MockResponder,
} from '@lumora/platform-gateway';

export interface RuntimeOptions {
  config: RuntimeConfig;
  logger: Logger;
  /** Answer every platform from a mock adapter */
  dryRun?: boolean;
  /** Platforms the mock adapters answer for */
  platforms?: readonly PlatformId[];
  /** Entities the dry-run answers rank */
  entities?: readonly string[];
  env?: NodeJS.ProcessEnv;
}

export interface Runtime {
  registry: PlatformRegistry;
  gateway: PlatformGateway;
}

/**
 * Canned answer ranking the given entities, rotated per prompt so that
 * dry runs show varied positions
 */
export function createDryRunResponder(entities: readonly string[]): MockResponder {
  return (prompt, platformId) => {
    if (entities.length === 0) {
      return `No recommendations from ${platformId}.`;
    }
    const offset = (prompt.length + platformId.length) % entities.length;
    const ranked = [...entities.slice(offset), ...entities.slice(0, offset)];
    return [
      `Here are the options I would consider for "${prompt}":`,
      ...ranked.map((entity, index) => `${index + 1}. ${entity}`),
    ].join('\n');
  };
}

export function createRuntime(options: RuntimeOptions): Runtime {
  const { config, logger } = options;
  const adapterConfig = {
    timeoutMs: config.queryTimeoutMs,
    maxRetries: config.maxRetries,
    retryDelayMs: config.retryDelayMs,
  };

  let registry: PlatformRegistry;
  if (options.dryRun) {
    registry = new PlatformRegistry();
    const responder = createDryRunResponder(options.entities ?? []);
    for (const platformId of options.platforms ?? []) {
      registry.register(new MockAdapter({ ...adapterConfig, platformId, responder }));
    }
  } else {
    registry = createDefaultRegistry(resolvePlatformCredentials(options.env), adapterConfig);
  }

  return { registry, gateway: new PlatformGateway(registry, { logger }) };
}
