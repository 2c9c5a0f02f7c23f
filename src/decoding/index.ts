export {
  TypeTag,
  ObjectTag,
  ListTag,
  PrimitiveTag,
  defineType,
  listOf,
  isJsonObject,
  JsonValue,
  StringValue,
  NumberValue,
  BooleanValue,
} from './type-tag.js';
export type { Converter } from './type-tag.js';
export { ConverterRegistry, ResponseDecoder } from './registry.js';
