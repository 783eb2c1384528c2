/**
 * Strategy Registry
 *
 * Plain keyed collection of decision functions populated at startup.
 * Prefer static registration over dynamic scanning for determinism.
 */

import { StrategyNotFoundError } from '../errors.js';
import type { Strategy } from './contract.js';

export class StrategyRegistry {
  private strategies = new Map<string, Strategy>();

  constructor(strategies: Iterable<Strategy> = []) {
    for (const strategy of strategies) {
      this.register(strategy);
    }
  }

  /**
   * Register a strategy
   *
   * @throws Error if a strategy with the same name already exists
   */
  register(strategy: Strategy): void {
    if (this.strategies.has(strategy.name)) {
      throw new Error(`Strategy '${strategy.name}' is already registered`);
    }
    this.strategies.set(strategy.name, strategy);
  }

  get(name: string): Strategy | undefined {
    return this.strategies.get(name);
  }

  /**
   * @throws StrategyNotFoundError
   */
  require(name: string): Strategy {
    const strategy = this.strategies.get(name);
    if (!strategy) {
      throw new StrategyNotFoundError(name, this.listNames());
    }
    return strategy;
  }

  has(name: string): boolean {
    return this.strategies.has(name);
  }

  /**
   * Registered names in registration order
   */
  listNames(): string[] {
    return Array.from(this.strategies.keys());
  }

  list(): Strategy[] {
    return Array.from(this.strategies.values());
  }

  get size(): number {
    return this.strategies.size;
  }
}
