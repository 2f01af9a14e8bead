import type { G60Config, ResolvedG60Config } from './config';
import { normalizeConfig } from './config';
import type { DecodeResult } from './decode';
import { decode, tryDecode } from './decode';
import { encode } from './encode';
import { G60Error } from './errors';
import { logWithLevel } from './logger';
import { randomBytes, randomString } from './random';
import { decodeToString, encodeStr } from './text';
import { isValid, verify } from './verify';

export interface G60Codec {
  readonly config: ResolvedG60Config;
  encode(bytes: Uint8Array): string;
  decode(text: string): Uint8Array;
  tryDecode(text: string): DecodeResult;
  encodeStr(text: string): string;
  decodeToString(text: string): string;
  verify(text: string): void;
  isValid(text: string): boolean;
  randomBytes(byteLength: number): string;
  randomString(maxLength: number): string;
}

export function createCodec(config?: G60Config): G60Codec {
  const resolved = normalizeConfig(config);

  const logRejection = (error: G60Error, operation: string): void => {
    const { bytes, ...details } = error.details;
    logWithLevel(resolved.logger, 'debug', resolved.logLevel, 'g60: decode rejected', {
      operation,
      code: error.code,
      ...details,
      ...(bytes ? { byteLength: bytes.length } : {}),
    });
  };

  const guarded = <T>(operation: string, fn: () => T): T => {
    try {
      return fn();
    } catch (error) {
      if (error instanceof G60Error) {
        logRejection(error, operation);
      }
      throw error;
    }
  };

  return {
    config: resolved,
    encode: (bytes) => encode(bytes),
    decode: (text) => guarded('decode', () => decode(text)),
    tryDecode: (text) => {
      const result = tryDecode(text);
      if (!result.ok) {
        logRejection(result.error, 'tryDecode');
      }
      return result;
    },
    encodeStr: (text) => encodeStr(text),
    decodeToString: (text) => guarded('decodeToString', () => decodeToString(text)),
    verify: (text) => guarded('verify', () => verify(text)),
    isValid: (text) => isValid(text),
    randomBytes: (byteLength) => randomBytes(byteLength, resolved.random),
    randomString: (maxLength) => randomString(maxLength, resolved.random),
  };
}
