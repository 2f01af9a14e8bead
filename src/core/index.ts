export type { LogLevel, Logger, RandomSource } from './types';
export type { G60Config, ResolvedG60Config } from './config';
export type { G60ErrorCode, G60ErrorDetails } from './errors';
export type { DecodeResult } from './decode';
export type { G60Codec } from './codec';
export { G60ConfigError, normalizeConfig } from './config';
export { G60Error } from './errors';
export { alphabet } from './alphabet';
export { computeDecodedSize, computeEncodedSize } from './groups';
export { encode, encodeInto } from './encode';
export { decode, decodeInto, tryDecode } from './decode';
export { isValid, verify } from './verify';
export { decodeToString, encodeStr } from './text';
export { randomBytes, randomString } from './random';
export { G60String } from './g60_string';
export { createCodec } from './codec';
