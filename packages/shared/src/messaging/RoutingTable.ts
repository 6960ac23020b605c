import { ConfigurationError } from '../errors';

export interface Binding {
  queue: string;
  pattern: string;
}

const SINGLE = '*';
const MULTI = '#';

/**
 * Topic match on dot-delimited keys: `*` is exactly one segment, `#` is zero
 * or more segments.
 */
export const matchesTopic = (pattern: string, routingKey: string): boolean =>
  matchSegments(pattern.split('.'), 0, routingKey.split('.'), 0);

const matchSegments = (pattern: string[], pi: number, key: string[], ki: number): boolean => {
  if (pi === pattern.length) {
    return ki === key.length;
  }

  const segment = pattern[pi];
  if (segment === MULTI) {
    for (let next = ki; next <= key.length; next++) {
      if (matchSegments(pattern, pi + 1, key, next)) return true;
    }
    return false;
  }

  if (ki === key.length) return false;
  if (segment !== SINGLE && segment !== key[ki]) return false;
  return matchSegments(pattern, pi + 1, key, ki + 1);
};

const validateBinding = (binding: Binding): Binding => {
  if (!binding.queue.trim()) {
    throw new ConfigurationError(`Binding for pattern "${binding.pattern}" has an empty queue name`);
  }
  if (!binding.pattern || binding.pattern.split('.').some((segment) => segment.length === 0)) {
    throw new ConfigurationError(`Binding for queue "${binding.queue}" has an invalid pattern "${binding.pattern}"`);
  }
  return Object.freeze({ queue: binding.queue, pattern: binding.pattern });
};

const sameBinding = (a: Binding, b: Binding): boolean => a.queue === b.queue && a.pattern === b.pattern;

/**
 * Immutable binding table. Routing is a pure function of the table and the
 * routing key; changes produce a new version instead of mutating this one.
 */
export class RoutingTable {
  private readonly bindings: readonly Binding[];

  constructor(bindings: readonly Binding[] = [], readonly version: number = 1) {
    const unique: Binding[] = [];
    for (const binding of bindings.map(validateBinding)) {
      if (!unique.some((existing) => sameBinding(existing, binding))) {
        unique.push(binding);
      }
    }
    this.bindings = Object.freeze(unique);
  }

  /** Queues bound to `routingKey`, each at most once, in binding order. */
  route(routingKey: string): string[] {
    const queues: string[] = [];
    for (const binding of this.bindings) {
      if (queues.includes(binding.queue)) continue;
      if (matchesTopic(binding.pattern, routingKey)) {
        queues.push(binding.queue);
      }
    }
    return queues;
  }

  withBinding(binding: Binding): RoutingTable {
    return new RoutingTable([...this.bindings, binding], this.version + 1);
  }

  withoutBinding(binding: Binding): RoutingTable {
    return new RoutingTable(
      this.bindings.filter((existing) => !sameBinding(existing, binding)),
      this.version + 1
    );
  }

  getBindings(): readonly Binding[] {
    return this.bindings;
  }

  queues(): string[] {
    return [...new Set(this.bindings.map((binding) => binding.queue))];
  }

  /** Bindings that no known event type would route through. */
  unmatchedBindings(knownEventTypes: readonly string[]): Binding[] {
    return this.bindings.filter(
      (binding) => !knownEventTypes.some((eventType) => matchesTopic(binding.pattern, eventType))
    );
  }
}
