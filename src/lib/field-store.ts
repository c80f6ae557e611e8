import type { Row } from './connection-types.js';
import type Schema from './schema.js';

/**
 * Per-record value map gated by the table schema.
 *
 * Writes through {@link FieldStore.set} are validated against the schema;
 * names the schema does not know are dropped without an error so callers can
 * pass superset payloads (such as raw request bodies) straight into `fill`.
 * Values are stored untyped, exactly as given or as the driver returned them.
 */
export class FieldStore {
  readonly schema: Schema;
  private values: Map<string, unknown>;

  constructor(schema: Schema) {
    this.schema = schema;
    this.values = new Map();
  }

  get(name: string): unknown {
    return this.values.has(name) ? this.values.get(name) : null;
  }

  has(name: string): boolean {
    const value = this.values.get(name);
    return value !== undefined && value !== null;
  }

  /**
   * @returns Whether the value was stored
   */
  set(name: string, value: unknown): boolean {
    if (!this.schema.accepts(name)) {
      return false;
    }
    this.values.set(name, value);
    return true;
  }

  unset(name: string): void {
    this.values.delete(name);
  }

  /**
   * Replace every value with the columns of a fetched row. Unlike `set`, no
   * schema gating applies: extra result columns are kept.
   */
  replace(row: Row): void {
    this.values = new Map(Object.entries(row));
  }

  clear(): void {
    this.values = new Map();
  }

  toMap(): Row {
    return Object.fromEntries(this.values);
  }

  get size(): number {
    return this.values.size;
  }
}

export default FieldStore;
