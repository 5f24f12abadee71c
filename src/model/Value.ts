/**
 * Intermediate value tree shared by the HL7v2 and XML parsers.
 *
 * HL7v2 fields only ever use the primitive and composite kinds: a field is
 * primitive or a composite of components, and a component is primitive or a
 * composite of primitive sub-components. XML documents normalize into nested
 * mappings whose leaves are primitives.
 */

export interface PrimitiveValue {
  readonly kind: 'primitive';
  readonly value: string;
}

export interface CompositeValue {
  readonly kind: 'composite';
  readonly components: readonly Value[];
}

export interface MappingValue {
  readonly kind: 'mapping';
  readonly entries: ReadonlyMap<string, Repeated<Value>>;
}

export type Value = PrimitiveValue | CompositeValue | MappingValue;

/**
 * A slot that holds one value, or an ordered list once the same key was seen
 * more than once.
 */
export type Repeated<T> = { readonly kind: 'one'; readonly value: T } | { readonly kind: 'many'; readonly values: readonly T[] };

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function primitive(value: string): PrimitiveValue {
  return { kind: 'primitive', value };
}

export function composite(components: readonly Value[]): CompositeValue {
  return { kind: 'composite', components };
}

export function mapping(entries: ReadonlyMap<string, Repeated<Value>>): MappingValue {
  return { kind: 'mapping', entries };
}

export function one<T>(value: T): Repeated<T> {
  return { kind: 'one', value };
}

/**
 * Ordered view of a repeated slot. A single value yields a one-element list.
 */
export function toList<T>(repeated: Repeated<T> | undefined): readonly T[] {
  if (!repeated) return [];
  return repeated.kind === 'one' ? [repeated.value] : repeated.values;
}

/**
 * First value of a repeated slot
 */
export function first<T>(repeated: Repeated<T> | undefined): T | undefined {
  if (!repeated) return undefined;
  return repeated.kind === 'one' ? repeated.value : repeated.values[0];
}

/**
 * Insert into a map of repeated slots, promoting `one` to `many` on the
 * second occurrence of a key. Source order is preserved.
 */
export function appendRepeated<T>(target: Map<string, Repeated<T>>, key: string, value: T): void {
  const existing = target.get(key);
  if (!existing) {
    target.set(key, { kind: 'one', value });
  } else if (existing.kind === 'one') {
    target.set(key, { kind: 'many', values: [existing.value, value] });
  } else {
    target.set(key, { kind: 'many', values: [...existing.values, value] });
  }
}

/**
 * Component at a 0-based index of a composite. A primitive is treated as a
 * composite with a single component.
 */
export function component(value: Value | undefined, index: number): Value | undefined {
  if (!value) return undefined;
  switch (value.kind) {
    case 'primitive':
      return index === 0 ? value : undefined;
    case 'composite':
      return value.components[index];
    case 'mapping':
      return undefined;
  }
}

/**
 * Leading text of a value: the primitive itself, or the first component of a
 * composite (recursively). Mappings have no text.
 */
export function leadingText(value: Value | undefined): string {
  if (!value) return '';
  switch (value.kind) {
    case 'primitive':
      return value.value;
    case 'composite':
      return leadingText(value.components[0]);
    case 'mapping':
      return '';
  }
}

/**
 * Convert a value tree to plain JSON. Composites become arrays, mappings
 * become objects and repeated entries become arrays.
 */
export function valueToJSON(value: Value): JsonValue {
  switch (value.kind) {
    case 'primitive':
      return value.value;
    case 'composite':
      return value.components.map(valueToJSON);
    case 'mapping': {
      const result: JsonObject = {};
      for (const [key, entry] of value.entries) {
        result[key] =
          entry.kind === 'one' ? valueToJSON(entry.value) : entry.values.map(valueToJSON);
      }
      return result;
    }
  }
}
