/**
 * Source Registry
 *
 * Adapters are registered explicitly at startup and handed to the
 * orchestrator. There is no process-wide instance.
 */

import type { SanctionSource } from '@sanctionwatch/db'
import { UnknownSourceError } from '../domain/errors.js'
import type { SourceAdapter } from './types.js'

export class SourceRegistry {
  private readonly adapters = new Map<SanctionSource, SourceAdapter>()

  constructor(adapters: SourceAdapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter)
    }
  }

  /**
   * @throws Error if an adapter for the same source is already registered
   */
  register(adapter: SourceAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Adapter for source '${adapter.id}' is already registered`)
    }
    this.adapters.set(adapter.id, adapter)
  }

  /**
   * @throws UnknownSourceError when no adapter handles the source
   */
  get(source: string): SourceAdapter {
    for (const adapter of this.adapters.values()) {
      if (adapter.id === source) return adapter
    }
    throw new UnknownSourceError(source)
  }

  has(source: string): boolean {
    return [...this.adapters.keys()].some(id => id === source)
  }

  list(): SourceAdapter[] {
    return Array.from(this.adapters.values())
  }

  ids(): SanctionSource[] {
    return Array.from(this.adapters.keys())
  }
}
