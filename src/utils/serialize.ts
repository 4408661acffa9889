export type Serialized<T> = T extends Date
  ? string
  : T extends (infer Item)[]
    ? Serialized<Item>[]
    : T extends object
      ? { [K in keyof T]: Serialized<T[K]> }
      : T;

function deepConvert(input: unknown): unknown {
  if (input instanceof Date) return input.toISOString();
  if (Array.isArray(input)) return input.map((item) => deepConvert(item));

  if (input && typeof input === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      out[key] = deepConvert(value);
    }
    return out;
  }

  return input;
}

export function serialize<T>(doc: T): Serialized<T> {
  return deepConvert(doc) as Serialized<T>;
}
