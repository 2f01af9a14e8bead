export type G60ErrorCode =
  | 'INVALID_CHARACTER'
  | 'INVALID_LENGTH'
  | 'VALUE_OUT_OF_RANGE'
  | 'INVALID_TEXT'
  | 'NOT_ENOUGH_SPACE';

export interface G60ErrorDetails {
  /**
   * Position in the encoded string: the offending character for
   * `INVALID_CHARACTER`, the first symbol of the group for `VALUE_OUT_OF_RANGE`.
   */
  index?: number;
  character?: string;
  /**
   * Length of the rejected encoded string.
   */
  length?: number;
  /**
   * Decoded bytes that are not well-formed UTF-8.
   */
  bytes?: Uint8Array;
  required?: number;
  actual?: number;
}

export class G60Error extends Error {
  code: G60ErrorCode;
  details: G60ErrorDetails;

  constructor(code: G60ErrorCode, message: string, details: G60ErrorDetails = {}) {
    super(message);
    this.code = code;
    this.details = details;
  }
}

export function notEnoughSpace(required: number, actual: number): G60Error {
  return new G60Error(
    'NOT_ENOUGH_SPACE',
    `g60: target buffer too small (need ${required}, got ${actual})`,
    { required, actual },
  );
}
