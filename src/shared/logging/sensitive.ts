/**
 * Sensitive field registry.
 * Fields registered here are masked whenever SafeLogger serializes an instance of the class.
 *
 * @example
 * class Account {
 *   constructor(public owner: string, public iban: string) {}
 * }
 * registerSensitiveFields(Account, { iban: { showLast: 4 } });
 */

export interface SensitiveOptions {
  /** Character used for masking */
  maskChar?: string;
  /** Number of trailing characters left visible */
  showLast?: number;
}

type Constructor = abstract new (...args: never[]) => unknown;

const registry = new WeakMap<object, Map<string, SensitiveOptions>>();

export function registerSensitiveFields(
  target: Constructor,
  fields: Record<string, SensitiveOptions | true>
): void {
  const existing = registry.get(target) ?? new Map<string, SensitiveOptions>();
  for (const [field, options] of Object.entries(fields)) {
    existing.set(field, options === true ? {} : options);
  }
  registry.set(target, existing);
}

/**
 * Look up sensitive options for a field of an object, following the prototype chain
 * so fields registered on a base class also apply to subclasses
 */
export function getSensitiveOptions(instance: object, field: string): SensitiveOptions | undefined {
  let proto: unknown = Object.getPrototypeOf(instance);
  while (typeof proto === 'object' && proto !== null && proto !== Object.prototype) {
    const ctor: unknown = Reflect.get(proto, 'constructor');
    if (typeof ctor === 'function') {
      const options = registry.get(ctor)?.get(field);
      if (options) return options;
    }
    proto = Object.getPrototypeOf(proto);
  }
  return undefined;
}
