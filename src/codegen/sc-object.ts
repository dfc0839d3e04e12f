/**
 * Parameter-object tree handed to the target-engine emitter.
 *
 * Each ScObject names a class (or unit generator), an optional method such as
 * "ar", an ordered argument list and an ordered property list. The emitter
 * turns these into source text; nothing here produces text.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ScValue =
  | { type: "float"; value: number }
  | { type: "int"; value: number }
  | { type: "string"; value: string }
  | { type: "symbol"; value: string }
  | { type: "array"; items: ScValue[] }
  | { type: "object"; object: ScObject };

export interface ScProperty {
  name: string;
  value: ScValue;
}

export interface ScObject {
  className: string;
  method?: string;
  args: ScValue[];
  properties: ScProperty[];
}

/** Strings become string literals; use `symbol()` for symbols. */
type ScInput = ScValue | string | boolean;

// ---------------------------------------------------------------------------
// Value constructors
// ---------------------------------------------------------------------------

export const float = (value: number): ScValue => ({ type: "float", value });
export const int = (value: number): ScValue => ({ type: "int", value: Math.trunc(value) });
export const str = (value: string): ScValue => ({ type: "string", value });
export const symbol = (value: string): ScValue => ({ type: "symbol", value });
export const list = (items: ScValue[]): ScValue => ({ type: "array", items });
export const floats = (values: readonly number[]): ScValue => list(values.map(float));
export const nested = (object: ScObject): ScValue => ({ type: "object", object });

function toValue(input: ScInput): ScValue {
  if (typeof input === "string") return str(input);
  if (typeof input === "boolean") return int(input ? 1 : 0);
  return input;
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export class ScObjectBuilder {
  private readonly object: ScObject;

  constructor(className: string) {
    this.object = { className, args: [], properties: [] };
  }

  method(name: string): this {
    this.object.method = name;
    return this;
  }

  /** Shorthand for `.method("ar")`. */
  ar(): this {
    return this.method("ar");
  }

  arg(value: ScInput): this {
    this.object.args.push(toValue(value));
    return this;
  }

  prop(name: string, value: ScInput): this {
    this.object.properties.push({ name, value: toValue(value) });
    return this;
  }

  build(): ScObject {
    return {
      ...this.object,
      args: [...this.object.args],
      properties: [...this.object.properties],
    };
  }
}

export function scObject(className: string): ScObjectBuilder {
  return new ScObjectBuilder(className);
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

/** The first property with the given name. */
export function getProperty(object: ScObject, name: string): ScValue | undefined {
  return object.properties.find((p) => p.name === name)?.value;
}

/** Numeric payload of a float or int value. */
export function numberValue(value: ScValue | undefined): number | undefined {
  if (value && (value.type === "float" || value.type === "int")) return value.value;
  return undefined;
}

/** Text payload of a string or symbol value. */
export function textValue(value: ScValue | undefined): string | undefined {
  if (value && (value.type === "string" || value.type === "symbol")) return value.value;
  return undefined;
}
