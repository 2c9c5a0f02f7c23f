/**
 * Runtime tokens naming the type a response body decodes to.
 */

import { ApiError, isApiError } from '../errors/index.js';

/**
 * Turns one JSON object into a domain value.
 */
export type Converter<T> = (data: Record<string, unknown>) => T;

/**
 * A type token. Decoding is delegated to the tag so each variant keeps
 * its own result type.
 */
export abstract class TypeTag<T> {
  readonly name: string;

  protected constructor(name: string) {
    this.name = name;
  }

  /**
   * Decodes a parsed JSON value using converters registered by `owner`.
   *
   * @throws {ApiError}
   */
  abstract decode(json: unknown, owner: object): T;

  /**
   * True when `owner` can decode this tag.
   */
  abstract isDecodable(owner: object): boolean;

  toString(): string {
    return this.name;
  }
}

/**
 * Tag for a JSON object decoded by a registered converter.
 */
export class ObjectTag<T> extends TypeTag<T> {
  // Keyed by registry so separate registries stay independent.
  private readonly converters = new WeakMap<object, Converter<T>>();

  constructor(name: string) {
    super(name);
  }

  bind(owner: object, converter: Converter<T>): void {
    this.converters.set(owner, converter);
  }

  unbind(owner: object): void {
    this.converters.delete(owner);
  }

  isDecodable(owner: object): boolean {
    return this.converters.has(owner);
  }

  decode(json: unknown, owner: object): T {
    const converter = this.converters.get(owner);
    if (!converter) {
      throw ApiError.dataConversion(`No converter registered for type ${this.name}`);
    }
    if (!isJsonObject(json)) {
      throw ApiError.dataConversion(`Expected a JSON object for ${this.name}, got ${describeJson(json)}`);
    }
    try {
      return converter(json);
    } catch (error) {
      if (isApiError(error)) {
        throw error;
      }
      throw ApiError.dataConversion(`Failed to convert ${this.name}`, error);
    }
  }
}

/**
 * Tag for a JSON array whose elements decode to `E`.
 */
export class ListTag<E> extends TypeTag<E[]> {
  readonly element: TypeTag<E>;

  constructor(element: TypeTag<E>) {
    super(`List<${element.name}>`);
    this.element = element;
  }

  isDecodable(owner: object): boolean {
    return this.element.isDecodable(owner);
  }

  decode(json: unknown, owner: object): E[] {
    if (!this.element.isDecodable(owner)) {
      throw ApiError.dataConversion(`No converter registered for type ${this.element.name}`);
    }
    if (!Array.isArray(json)) {
      throw ApiError.dataConversion(`Expected a JSON array for ${this.name}, got ${describeJson(json)}`);
    }
    return json.map((item: unknown, index) => {
      try {
        return this.element.decode(item, owner);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw ApiError.indexedConversion(index, `Error at index ${index}: ${reason}`, error);
      }
    });
  }
}

/**
 * Tag for a value checked by a type guard, needing no registration.
 */
export class PrimitiveTag<T> extends TypeTag<T> {
  private readonly guard: (value: unknown) => value is T;

  constructor(name: string, guard: (value: unknown) => value is T) {
    super(name);
    this.guard = guard;
  }

  isDecodable(): boolean {
    return true;
  }

  decode(json: unknown): T {
    if (!this.guard(json)) {
      throw ApiError.dataConversion(`Expected ${this.name}, got ${describeJson(json)}`);
    }
    return json;
  }
}

/**
 * Declares a named type decoded by a converter.
 */
export function defineType<T>(name: string): ObjectTag<T> {
  return new ObjectTag<T>(name);
}

/**
 * Tag for a list of `element`.
 */
export function listOf<E>(element: TypeTag<E>): ListTag<E> {
  return new ListTag(element);
}

/** Any parsed JSON value, returned as is. */
export const JsonValue: TypeTag<unknown> = new PrimitiveTag('JsonValue', (_value: unknown): _value is unknown => true);

export const StringValue: TypeTag<string> = new PrimitiveTag(
  'String',
  (value: unknown): value is string => typeof value === 'string'
);

export const NumberValue: TypeTag<number> = new PrimitiveTag(
  'Number',
  (value: unknown): value is number => typeof value === 'number'
);

export const BooleanValue: TypeTag<boolean> = new PrimitiveTag(
  'Boolean',
  (value: unknown): value is boolean => typeof value === 'boolean'
);

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeJson(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}
