/**
 * Capability registry
 * Name → provider lookup used by plan validation and the step runner
 */

import type { CapabilityProvider } from '../types/capability';

export class CapabilityRegistry {
  private readonly providers = new Map<string, CapabilityProvider>();

  constructor(providers: CapabilityProvider[] = []) {
    for (const provider of providers) {
      this.register(provider);
    }
  }

  /**
   * Register a provider; a second provider with the same name replaces the first
   */
  register(provider: CapabilityProvider): this {
    this.providers.set(provider.name, provider);
    return this;
  }

  get(name: string): CapabilityProvider | undefined {
    return this.providers.get(name);
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  /**
   * Registered names, sorted
   */
  names(): string[] {
    return [...this.providers.keys()].sort();
  }
}
