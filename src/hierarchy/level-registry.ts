/**
 * Level Registry
 * @module hierarchy/level-registry
 *
 * Name-indexed lookup that backs the non-owning links between levels.
 * Levels hold neighbour names; the registry resolves them at call time.
 */

import { ConfigurationError } from '../errors/index.js';
import { CachePort, LevelTopology } from '../cache/types.js';

export class LevelRegistry implements LevelTopology {
  private readonly levels = new Map<string, CachePort>();

  register(level: CachePort): void {
    if (this.levels.has(level.name)) {
      throw ConfigurationError.topology(`Duplicate level name ${level.name}`, level.name);
    }
    this.levels.set(level.name, level);
  }

  resolve(name: string): CachePort | undefined {
    return this.levels.get(name);
  }

  has(name: string): boolean {
    return this.levels.has(name);
  }

  names(): string[] {
    return [...this.levels.keys()];
  }

  get size(): number {
    return this.levels.size;
  }
}
