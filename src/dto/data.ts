import { ConfigurationException } from '../core/exceptions.js';
import { isRecord, type UnknownRecord } from '../core/types.js';
import type { DTOBackend } from './backend.js';

function cloneBuiltins(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(cloneBuiltins);
  if (isRecord(value) && Object.getPrototypeOf(value) === Object.prototype) {
    const copy: UnknownRecord = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = cloneBuiltins(item);
    }
    return copy;
  }
  return value;
}

/** Sets `value` under the `__`-separated path, creating records on the way. */
function setNestedValue(target: UnknownRecord, path: string[], value: unknown): void {
  const [head, ...rest] = path;
  if (head === undefined) return;
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const current = target[head];
  const child: UnknownRecord = isRecord(current) ? current : {};
  target[head] = child;
  setNestedValue(child, rest, value);
}

/**
 * Decoded request data not yet turned into a domain value.
 *
 * Lets a handler add values the client may not send (ids, owners, timestamps)
 * before the domain value is built.
 *
 * @example
 * ```ts
 * handle: ({ data }) => {
 *   if (!(data instanceof DTOData)) throw new Error('expected DTOData');
 *   return repo.insert(data.createInstance({ id: randomUUID(), address__country: 'NL' }));
 * }
 * ```
 */
export class DTOData {
  private readonly backend: DTOBackend;
  private readonly builtins: unknown;

  constructor(backend: DTOBackend, builtins: unknown) {
    this.backend = backend;
    this.builtins = builtins;
  }

  /** A deep copy of the decoded data, keyed by field name. */
  asBuiltins(): unknown {
    return cloneBuiltins(this.builtins);
  }

  /**
   * Builds the domain value. Keys of `overrides` containing `__` set nested
   * values (`address__city` sets `city` of `address`).
   */
  createInstance(overrides: UnknownRecord = {}): unknown {
    return this.backend.transferFromBuiltins(this.merged(overrides));
  }

  /**
   * Assigns every decoded field (and override) onto `target`. Fields absent
   * from the payload are left untouched.
   */
  updateInstance<U extends object>(target: U, overrides: UnknownRecord = {}): U {
    const values = this.backend.transferFromBuiltins(this.merged(overrides), { output: 'record' });
    if (!isRecord(values)) {
      throw new ConfigurationException('updateInstance() needs data of a single model', {
        handlerId: this.backend.handlerId,
      });
    }
    Object.assign(target, values);
    return target;
  }

  private merged(overrides: UnknownRecord): unknown {
    const data = cloneBuiltins(this.builtins);
    if (!isRecord(data)) {
      if (Object.keys(overrides).length > 0) {
        throw new ConfigurationException('Overrides need data of a single model', {
          handlerId: this.backend.handlerId,
        });
      }
      return data;
    }
    for (const [key, value] of Object.entries(overrides)) {
      setNestedValue(data, key.split('__'), value);
    }
    return data;
  }
}
