/**
 * Parameter Coercion
 *
 * Strict text-to-value conversion. Nothing is trimmed or defaulted; text
 * that is not a literal of the declared type is rejected.
 */

import {
  InvalidParameterFormatError,
  UnsupportedParameterTypeError,
} from '../errors/errors.ts';
import type { BoundValue, ParamType } from './params.ts';

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;
const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

/**
 * Convert raw text to the declared parameter type
 */
export function coerceParam(name: string, type: ParamType, raw: string): BoundValue {
  switch (type) {
    case 'int': {
      const value = INTEGER.test(raw) ? Number(raw) : NaN;
      if (!Number.isInteger(value) || value < INT_MIN || value > INT_MAX) {
        throw new InvalidParameterFormatError(name, type, raw);
      }
      return value;
    }
    case 'long': {
      if (!INTEGER.test(raw)) {
        throw new InvalidParameterFormatError(name, type, raw);
      }
      const value = BigInt(raw);
      if (value < LONG_MIN || value > LONG_MAX) {
        throw new InvalidParameterFormatError(name, type, raw);
      }
      return value;
    }
    case 'float': {
      if (!DECIMAL.test(raw)) {
        throw new InvalidParameterFormatError(name, type, raw);
      }
      return Number(raw);
    }
    case 'boolean': {
      if (raw === 'true') return true;
      if (raw === 'false') return false;
      throw new InvalidParameterFormatError(name, type, raw);
    }
    case 'string':
      return raw;
    default:
      throw new UnsupportedParameterTypeError(name, String(type));
  }
}
