export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** A quote record as it appears in the source files. Moved, never mutated. */
export type Item = JsonValue;
