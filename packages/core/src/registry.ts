/**
 * Generic registry for pluggable implementations.
 *
 * Factories receive the options the caller resolved (for backends, the dtype).
 */
import { BackendError } from "./errors.js";

export class Registry<T, O = void> {
  private readonly _map = new Map<string, (opts: O) => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: (opts: O) => T): void {
    this._map.set(name, factory);
  }

  get(name: string, opts: O): T {
    const factory = this._map.get(name);
    if (!factory) {
      const avail = [...this._map.keys()].join(", ");
      throw new BackendError({
        message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`,
      });
    }
    return factory(opts);
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
