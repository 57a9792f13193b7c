export type Whenever<T> = T | Promise<T>;

export type Scalar = string | number | boolean | Date | null;

/**
 * A record as handed out by a store. Every stored record carries a string
 * id; the remaining attributes are whatever the model schema declares.
 */
export type Entity = { id: string; [attribute: string]: unknown };

/**
 * A record that has not been stored yet
 */
export type Draft = { [attribute: string]: unknown };

export type FieldType =
  | StringConstructor
  | NumberConstructor
  | BooleanConstructor
  | DateConstructor
  | ArrayConstructor;

/**
 * Decodes one URI component. Malformed percent-encoding yields null.
 */
export const decodeComponent = (value: string): string | null => {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
};

export const isPlainObject = (
  value: unknown
): value is Record<string, unknown> =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Date);
