/**
 * Tool Parameters
 *
 * Typed parameter declarations for device tools, their JSON Schema
 * rendering for tools/list, and binding of raw call arguments.
 *
 * Binding rules:
 * - Properties are matched by exact name
 * - A value of the wrong JSON type counts as missing
 * - Missing values fall back to the declared default, if any
 * - Integers are truncated toward zero, then range-checked
 */

import { z } from 'zod';

// =============================================================================
// TYPES
// =============================================================================

export type PropertyType = 'boolean' | 'integer' | 'string';

export type PropertyValue = boolean | number | string;

type ValueOf<T extends PropertyType> =
  T extends 'boolean' ? boolean :
  T extends 'integer' ? number :
  string;

export interface PropertySchema {
  type: PropertyType;
  default?: PropertyValue;
  minimum?: number;
  maximum?: number;
}

export interface IntegerOptions {
  defaultValue?: number;
  min?: number;
  max?: number;
}

const VALUE_SCHEMAS: Record<PropertyType, z.ZodType<PropertyValue, z.ZodTypeDef, unknown>> = {
  boolean: z.boolean(),
  integer: z.number().finite().transform(Math.trunc),
  string: z.string(),
};

// =============================================================================
// PROPERTY
// =============================================================================

export class Property<T extends PropertyType = PropertyType> {
  readonly name: string;
  readonly type: T;
  readonly defaultValue: ValueOf<T> | undefined;
  readonly min: number | undefined;
  readonly max: number | undefined;

  private constructor(name: string, type: T, defaultValue?: ValueOf<T>, min?: number, max?: number) {
    if (min !== undefined && max !== undefined && min > max) {
      throw new RangeError(`Invalid range for ${name}: ${min} > ${max}`);
    }
    this.name = name;
    this.type = type;
    this.min = min;
    this.max = max;
    this.defaultValue = defaultValue;
    if (typeof defaultValue === 'number') {
      this.checkRange(defaultValue);
    }
  }

  static boolean(name: string, defaultValue?: boolean): Property<'boolean'> {
    return new Property(name, 'boolean', defaultValue);
  }

  static integer(name: string, options: IntegerOptions = {}): Property<'integer'> {
    return new Property(name, 'integer', options.defaultValue, options.min, options.max);
  }

  static string(name: string, defaultValue?: string): Property<'string'> {
    return new Property(name, 'string', defaultValue);
  }

  get hasDefaultValue(): boolean {
    return this.defaultValue !== undefined;
  }

  /**
   * Convert a raw JSON value. Returns undefined when the JSON type does not
   * match; throws RangeError when an integer falls outside [min, max].
   */
  accept(raw: unknown): PropertyValue | undefined {
    const parsed = VALUE_SCHEMAS[this.type].safeParse(raw);
    if (!parsed.success) return undefined;

    if (typeof parsed.data === 'number') {
      this.checkRange(parsed.data);
    }
    return parsed.data;
  }

  toJSON(): PropertySchema {
    const schema: PropertySchema = { type: this.type };
    if (this.defaultValue !== undefined) schema.default = this.defaultValue;
    if (this.min !== undefined) schema.minimum = this.min;
    if (this.max !== undefined) schema.maximum = this.max;
    return schema;
  }

  private checkRange(value: number): void {
    if (this.min !== undefined && value < this.min) {
      throw new RangeError(`Value is below minimum allowed: ${this.min}`);
    }
    if (this.max !== undefined && value > this.max) {
      throw new RangeError(`Value exceeds maximum allowed: ${this.max}`);
    }
  }
}

// =============================================================================
// BOUND ARGUMENTS
// =============================================================================

/**
 * Concrete values for every property of a tool, handed to its callback.
 */
export class BoundArguments {
  constructor(private readonly values: ReadonlyMap<string, PropertyValue>) {}

  boolean(name: string): boolean {
    const value = this.require(name);
    if (typeof value !== 'boolean') throw new TypeError(`Argument ${name} is not a boolean`);
    return value;
  }

  integer(name: string): number {
    const value = this.require(name);
    if (typeof value !== 'number') throw new TypeError(`Argument ${name} is not an integer`);
    return value;
  }

  string(name: string): string {
    const value = this.require(name);
    if (typeof value !== 'string') throw new TypeError(`Argument ${name} is not a string`);
    return value;
  }

  toJSON(): Record<string, PropertyValue> {
    return Object.fromEntries(this.values);
  }

  private require(name: string): PropertyValue {
    const value = this.values.get(name);
    if (value === undefined) throw new Error(`Unknown argument: ${name}`);
    return value;
  }
}

export type BindResult =
  | { ok: true; arguments: BoundArguments }
  | { ok: false; error: string };

// =============================================================================
// PROPERTY LIST
// =============================================================================

export class PropertyList {
  private readonly properties: readonly Property[];

  constructor(properties: Property[] = []) {
    const seen = new Set<string>();
    for (const property of properties) {
      if (seen.has(property.name)) {
        throw new Error(`Duplicate property: ${property.name}`);
      }
      seen.add(property.name);
    }
    this.properties = [...properties];
  }

  get size(): number {
    return this.properties.length;
  }

  get(name: string): Property | undefined {
    return this.properties.find(p => p.name === name);
  }

  [Symbol.iterator](): Iterator<Property> {
    return this.properties[Symbol.iterator]();
  }

  /**
   * Names of properties the caller must supply
   */
  getRequired(): string[] {
    return this.properties.filter(p => !p.hasDefaultValue).map(p => p.name);
  }

  toJSON(): Record<string, PropertySchema> {
    const out: Record<string, PropertySchema> = {};
    for (const property of this.properties) {
      out[property.name] = property.toJSON();
    }
    return out;
  }

  /**
   * Bind raw call arguments. Stops at the first property that cannot be
   * satisfied; nothing is partially applied.
   */
  bind(args: Record<string, unknown> | undefined): BindResult {
    const values = new Map<string, PropertyValue>();

    for (const property of this.properties) {
      let value: PropertyValue | undefined;
      if (args !== undefined && Object.prototype.hasOwnProperty.call(args, property.name)) {
        try {
          value = property.accept(args[property.name]);
        } catch (error) {
          return { ok: false, error: error instanceof Error ? error.message : String(error) };
        }
      }

      if (value === undefined) {
        if (property.defaultValue === undefined) {
          return { ok: false, error: `Missing valid argument: ${property.name}` };
        }
        value = property.defaultValue;
      }
      values.set(property.name, value);
    }

    return { ok: true, arguments: new BoundArguments(values) };
  }
}
