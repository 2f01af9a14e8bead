import { decode } from './decode';
import { G60Error } from './errors';

/**
 * Throws the `G60Error` that decoding `text` would raise, if any.
 */
export function verify(text: string): void {
  decode(text);
}

/**
 * True when `text` is exactly the encoding of some byte sequence.
 */
export function isValid(text: string): boolean {
  try {
    verify(text);
    return true;
  } catch (error) {
    if (error instanceof G60Error) {
      return false;
    }
    throw error;
  }
}
