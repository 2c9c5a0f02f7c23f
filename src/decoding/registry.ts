/**
 * Converter registry and response decoder.
 */

import type { z } from 'zod';
import { ApiError } from '../errors/index.js';
import type { Converter, ObjectTag, TypeTag } from './type-tag.js';

/**
 * Maps type tags to converters. Registering a type also makes lists of
 * it decodable.
 */
export class ConverterRegistry {
  private readonly registered = new Map<string, ObjectTag<unknown>>();

  register<T>(type: ObjectTag<T>, converter: Converter<T>): this {
    type.bind(this, converter);
    this.registered.set(type.name, type);
    return this;
  }

  /**
   * Registers a converter that validates with a zod schema.
   */
  registerSchema<T>(type: ObjectTag<T>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): this {
    return this.register(type, (data) => schema.parse(data));
  }

  unregister(type: ObjectTag<unknown>): boolean {
    type.unbind(this);
    return this.registered.delete(type.name);
  }

  has(type: TypeTag<unknown>): boolean {
    return type.isDecodable(this);
  }

  /** Names of the registered types. */
  registeredTypes(): string[] {
    return [...this.registered.keys()];
  }

  /**
   * Decodes an already-parsed JSON value.
   *
   * @throws {ApiError} `DataConversionFailed` or `IndexedConversion`.
   */
  convert<T>(type: TypeTag<T>, json: unknown): T {
    return type.decode(json, this);
  }
}

/**
 * Parses response bodies and hands them to a registry.
 */
export class ResponseDecoder {
  readonly registry: ConverterRegistry;

  constructor(registry: ConverterRegistry = new ConverterRegistry()) {
    this.registry = registry;
  }

  decode<T>(type: TypeTag<T>, body: Uint8Array | string): T {
    const text = typeof body === 'string' ? body : Buffer.from(body).toString('utf8');
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw ApiError.dataConversion(`Response body is not valid JSON for ${type.name}`, error);
    }
    return this.registry.convert(type, json);
  }
}
