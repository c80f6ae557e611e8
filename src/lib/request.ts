/**
 * Contracts owned by the HTTP dispatcher. The mapper reads requests through
 * these shapes and hands back plain data for the dispatcher to serialize.
 */

export type RequestMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | (string & {});

export interface CurrentRequest {
  method: RequestMethod;
  /**
   * Path segments after the route prefix, already split on `/`.
   */
  segments: readonly string[];
  query: Readonly<Record<string, string>>;
  body: unknown;
}

/**
 * Key-path configuration store (`DATABASE.URL` style keys).
 */
export interface ConfigStore {
  get(keyPath: string): unknown;
  set(keyPath: string, value: unknown): void;
}
