import {
  AllProvidersFailedError,
  JobCancelledError,
  ProviderUnavailableError,
  errorMessageOf,
  type ProviderAttempt
} from './errors.js';
import { logger } from './logger.js';
import type { ProviderInfo, SubmitOutcome, VideoProvider } from './providers/types.js';
import type { GenerationRequest } from './types.js';

export const AUTO_PROVIDER = 'auto';

export interface ProviderRouterOptions {
  providers: VideoProvider[];
  /** Fallback order. Registered providers missing from it are appended in registration order. */
  priority: string[];
  /** Provider name, or `auto` to rely on the priority order alone. */
  defaultProvider: string;
  /** When true an unavailable explicit provider fails instead of being overridden. */
  strictExplicitProvider: boolean;
}

export interface ProviderSelection {
  provider: VideoProvider;
  reason: string;
  /** True only when the caller's explicit choice is being honored. */
  explicit: boolean;
}

export interface RoutedResult<T> {
  value: T;
  providerUsed: string;
  fallbackUsed: boolean;
  selectionReason: string;
  attempts: ProviderAttempt[];
}

function isExplicit(name: string | undefined): name is string {
  return name !== undefined && name !== '' && name !== AUTO_PROVIDER;
}

export class ProviderRouter {
  private readonly providers = new Map<string, VideoProvider>();
  private readonly order: string[];
  private readonly defaultProvider: string | null;
  private readonly strictExplicitProvider: boolean;

  constructor(options: ProviderRouterOptions) {
    for (const provider of options.providers) {
      this.providers.set(provider.name, provider);
    }

    const ranked = options.priority.filter((name, index) => this.providers.has(name) && options.priority.indexOf(name) === index);
    const unranked = options.providers.map((p) => p.name).filter((name) => !ranked.includes(name));
    this.order = [...ranked, ...unranked];

    this.defaultProvider =
      isExplicit(options.defaultProvider) && this.providers.has(options.defaultProvider)
        ? options.defaultProvider
        : null;
    this.strictExplicitProvider = options.strictExplicitProvider;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  listProviders(): ProviderInfo[] {
    return this.order.map((name) => {
      const provider = this.lookup(name);
      return { name, available: provider.isAvailable(), modelId: provider.modelId };
    });
  }

  /** Provider automatic mode tries first. */
  get preferredProvider(): string | null {
    return this.defaultProvider ?? this.order[0] ?? null;
  }

  select(explicitProvider?: string): ProviderSelection {
    if (isExplicit(explicitProvider)) {
      const requested = this.providers.get(explicitProvider);
      if (!requested) {
        throw new ProviderUnavailableError(explicitProvider, `Provider ${explicitProvider} is not registered`);
      }
      if (requested.isAvailable()) {
        return { provider: requested, reason: `Explicit request honored: ${explicitProvider}`, explicit: true };
      }
      if (this.strictExplicitProvider) {
        throw new ProviderUnavailableError(explicitProvider);
      }

      const substitute = this.firstAvailable();
      return {
        provider: substitute,
        reason: `Explicit request for ${explicitProvider} overridden (unavailable); using ${substitute.name}`,
        explicit: false
      };
    }

    if (this.defaultProvider) {
      const provider = this.lookup(this.defaultProvider);
      if (provider.isAvailable()) {
        return { provider, reason: `Default provider from config: ${provider.name}`, explicit: false };
      }
    }

    const provider = this.firstAvailable();
    const preferred = this.preferredProvider;
    if (preferred !== null && preferred !== provider.name) {
      return { provider, reason: `Auto-fallback from ${preferred} (unavailable) to ${provider.name}`, explicit: false };
    }
    return { provider, reason: `Auto-selected ${provider.name} (first available in priority order)`, explicit: false };
  }

  /**
   * Runs `call` against the selected provider. In automatic mode a failure
   * moves on to each remaining available provider in priority order, once.
   */
  async route<T>(explicitProvider: string | undefined, call: (provider: VideoProvider) => Promise<T>): Promise<RoutedResult<T>> {
    const selection = this.select(explicitProvider);
    const attempts: ProviderAttempt[] = [];

    if (selection.explicit) {
      logger.info({ provider: selection.provider.name, reason: selection.reason }, 'Routing to provider');
      const value = await call(selection.provider);
      return {
        value,
        providerUsed: selection.provider.name,
        fallbackUsed: false,
        selectionReason: selection.reason,
        attempts
      };
    }

    const candidates = [selection.provider, ...this.order.filter((name) => name !== selection.provider.name).map((name) => this.lookup(name))];

    for (const provider of candidates) {
      if (provider !== selection.provider && !provider.isAvailable()) {
        continue;
      }

      const previous = attempts.at(-1);
      const reason = previous
        ? `Auto-fallback from ${previous.provider} (failed) to ${provider.name}`
        : selection.reason;
      logger.info({ provider: provider.name, reason }, 'Routing to provider');

      try {
        const value = await call(provider);
        return {
          value,
          providerUsed: provider.name,
          fallbackUsed: provider.name !== this.preferredProvider,
          selectionReason: reason,
          attempts
        };
      } catch (error) {
        if (error instanceof JobCancelledError) {
          throw error;
        }
        const message = errorMessageOf(error);
        attempts.push({ provider: provider.name, error: message });
        logger.warn({ provider: provider.name, error: message }, 'Provider attempt failed');
      }
    }

    throw new AllProvidersFailedError(attempts);
  }

  async generate(request: GenerationRequest, explicitProvider?: string): Promise<RoutedResult<SubmitOutcome>> {
    return await this.route(explicitProvider, (provider) => provider.submit(request));
  }

  private firstAvailable(): VideoProvider {
    for (const name of this.order) {
      const provider = this.lookup(name);
      if (provider.isAvailable()) {
        return provider;
      }
    }
    throw new ProviderUnavailableError(null, 'No video provider is configured');
  }

  private lookup(name: string): VideoProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new ProviderUnavailableError(name, `Provider ${name} is not registered`);
    }
    return provider;
  }
}
