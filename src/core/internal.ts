export { blockToDigits, digitsToBlock } from './block';
export { blockBytes, blockLength, groupLength, groupSymbols } from './groups';
export { radix, symbolCode, symbolValue } from './alphabet';
export { logWithLevel } from './logger';
