/**
 * Mock Platform Adapter
 *
 * Scripted adapter for dry runs and tests. Goes through the same deadline,
 * retry and stats handling as the HTTP bindings.
 */

import { BasePlatformAdapter, type BaseAdapterConfig } from '../base/base-adapter.js';
import type { PlatformCompletion, PlatformMetadata, PlatformQueryRequest } from '../types.js';

/**
 * Produces the reply text for a prompt. Throwing simulates a platform failure.
 */
export type MockResponder = (prompt: string, platformId: string) => string | Promise<string>;

export interface MockAdapterConfig extends Partial<BaseAdapterConfig> {
  /** Registry id the mock answers for */
  platformId?: string;
  responder?: MockResponder;
  /** Artificial latency per attempt, fixed or computed per prompt */
  delayMs?: number | ((prompt: string) => number);
}

export const MOCK_METADATA: PlatformMetadata = {
  id: 'mock',
  name: 'Mock Platform',
  authRequirement: 'none',
  baseUrl: 'mock://localhost',
  defaultModel: 'mock-model',
};

const defaultResponder: MockResponder = (prompt) => `Mock response to: ${prompt}`;

export class MockAdapter extends BasePlatformAdapter {
  private responder: MockResponder;
  private delayMs: number | ((prompt: string) => number);
  private queries: string[] = [];

  constructor(config: MockAdapterConfig = {}) {
    const id = config.platformId ?? MOCK_METADATA.id;
    super(
      { ...MOCK_METADATA, id, name: id === MOCK_METADATA.id ? MOCK_METADATA.name : `Mock ${id}` },
      config
    );
    this.responder = config.responder ?? defaultResponder;
    this.delayMs = config.delayMs ?? 0;
  }

  /**
   * Prompts received so far, in arrival order
   */
  getReceivedPrompts(): string[] {
    return [...this.queries];
  }

  protected async executeQuery(
    request: PlatformQueryRequest,
    signal: AbortSignal
  ): Promise<PlatformCompletion> {
    this.queries.push(request.prompt);

    const delay = typeof this.delayMs === 'function' ? this.delayMs(request.prompt) : this.delayMs;
    if (delay > 0) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, delay);
        signal.addEventListener('abort', () => {
          clearTimeout(timer);
          resolve();
        });
      });
    }

    const responseText = await this.responder(request.prompt, this.metadata.id);
    return { responseText, model: MOCK_METADATA.defaultModel };
  }

  async close(): Promise<void> {
    this.queries = [];
  }
}

export function createMockAdapter(config: MockAdapterConfig = {}): MockAdapter {
  return new MockAdapter(config);
}
