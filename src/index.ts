export { ContentType, classify, canonicalMime, lookupContentType, acceptedMimes, listContentTypes } from './codec/content-type.js';
export type { LogicalContentType } from './codec/content-type.js';
export { CoercionError, toCoercionError } from './codec/errors.js';
export { decode, encode, tryDecode, tryEncode, coerceRequest, coerceResponse } from './codec/coerce.js';
export type { CoercionResult, CoercedRequest, CoercedResponse } from './codec/coerce.js';
export { CodecRegistry, defaultRegistry, getCodec, listCodecs } from './codec/registry.js';
export { createXmlCodec } from './codec/xml.js';
export type { FormatCodec } from './codec/types.js';
export { text, document, fromSchema } from './codec/shapes.js';
export type { Decodable, Encodable, Coercible } from './codec/shapes.js';
export { loadConfig, parseListener } from './config.js';
export type { FunctionConfig, Listener } from './config.js';
export { RuntimeContext } from './function/context.js';
export { handleCall, FDK_VERSION } from './function/invoke.js';
export type { FunctionHandler, FunctionShapes, FunctionCall, CallResult } from './function/invoke.js';
export { startFunction, stopFunction } from './connectors/http.js';
