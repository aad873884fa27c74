import type { Cost } from '../policy/resolve.js';
import type { GenerationRequest } from '../types/index.js';

export interface AdapterInvocation {
  provider: string;
  capability: string;
  request: GenerationRequest;
  /** Absolute epoch milliseconds after which the result is no longer wanted */
  deadline: number;
  /** Aborted when the attempt times out */
  signal: AbortSignal;
}

export interface AdapterResult<TPayload> {
  payload: TPayload;
  /** Actual cost reported by the backend; the rate card fills the gaps */
  cost?: Partial<Cost>;
}

export interface ProviderAdapter<TPayload> {
  readonly id: string;
  invoke(invocation: AdapterInvocation): Promise<AdapterResult<TPayload>>;
}

/**
 * Explicit provider table. Providers are registered up front; nothing is
 * discovered at run time.
 */
export class AdapterRegistry<TPayload> {
  private readonly adapters = new Map<string, ProviderAdapter<TPayload>>();

  constructor(adapters: Iterable<ProviderAdapter<TPayload>> = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  /**
   * @throws Error when the provider id is already registered
   */
  register(adapter: ProviderAdapter<TPayload>): this {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Adapter already registered for provider "${adapter.id}"`);
    }
    this.adapters.set(adapter.id, adapter);
    return this;
  }

  get(provider: string): ProviderAdapter<TPayload> | undefined {
    return this.adapters.get(provider);
  }

  has(provider: string): boolean {
    return this.adapters.has(provider);
  }

  list(): string[] {
    return [...this.adapters.keys()];
  }
}
