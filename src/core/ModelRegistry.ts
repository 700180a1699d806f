import { type ProviderAdapter } from '../providers/base.js';
import { type ModelInfo } from '../types/provider.js';
import { UnknownModelError } from '../utils/errors.js';
import { type Logger, silentLogger } from '../utils/logger.js';

/**
 * Resolves a model name to the adapter that serves it.
 * Adapters are consulted in registration order; the first that supports the model wins.
 */
export class ModelRegistry {
  private readonly adapters: ProviderAdapter[];
  private readonly logger: Logger;

  constructor(adapters: ProviderAdapter[], logger: Logger = silentLogger) {
    this.adapters = adapters;
    this.logger = logger;
  }

  get size(): number {
    return this.adapters.length;
  }

  resolve(model: string): ProviderAdapter {
    const adapter = this.adapters.find((a) => a.supportsModel(model));
    if (!adapter) throw new UnknownModelError(model);
    return adapter;
  }

  /**
   * Every model from every adapter. An adapter whose listing fails contributes nothing.
   */
  async listModels(): Promise<ModelInfo[]> {
    const listings = await Promise.all(
      this.adapters.map(async (adapter) => {
        try {
          const models = await adapter.listModels();
          return models.map((id): ModelInfo => ({ id, object: 'model', owned_by: adapter.provider }));
        } catch (err) {
          this.logger.warn(
            { provider: adapter.provider, err: err instanceof Error ? err.message : String(err) },
            'list models failed'
          );
          return [];
        }
      })
    );
    return listings.flat();
  }
}
