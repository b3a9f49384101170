export * from './types.js';
export * from './errors.js';
export * from './logger.js';
export * from './http.js';
export * from './config.js';
export * from './transport.js';
export * from './document.js';
export { coerceToInt, coerceToStr, isIntegerLike } from './jsonstat/coerce.js';
export {
  dimensionDescriptor,
  dimensionLayout,
  dimensionName,
  isVersion2,
  resolveDimension,
  resolveDimensions,
  type ResolvedDimensions
} from './jsonstat/dimension.js';
export { cubeSize, product, resolveValues, valueAt } from './jsonstat/values.js';
export { assertNaming, generateRows, odometer, rowCount } from './jsonstat/rows.js';
export { decode, decodeAll, decodeDimension, type DecodeOptions } from './jsonstat/decode.js';
export {
  encode,
  encodeAll,
  encodeDimension,
  MAX_DENSE_CELLS,
  type EncodeOptions,
  type EncodeAllOptions
} from './jsonstat/encode.js';
export {
  dimensionIndices,
  flatIndex,
  locateValue,
  pointLookup,
  unflattenIndex,
  type PointLookupResult
} from './jsonstat/radix.js';
export type { OrderedOrIndexed, DimensionDescriptor } from './jsonstat/schema.js';
