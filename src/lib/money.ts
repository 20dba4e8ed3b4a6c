import Big from 'big.js';

// 20 decimals should be plenty; round half up like banks
Big.DP = 20;
Big.RM = Big.roundHalfUp;

export const dec = (n?: number | string | null) => new Big(n ?? 0);

export const add = (a: Big, b: Big) => a.plus(b);

/**
 * Reads an amount as it arrives from the HRIS API (JSON number or numeric string).
 * Returns null for anything absent or non-numeric so callers can skip it.
 */
export function toDecimal(v: unknown): Big | null {
  if (typeof v === 'number') {
    return Number.isFinite(v) ? new Big(v) : null;
  }
  if (typeof v === 'string' && v.trim() !== '') {
    try {
      return new Big(v.trim());
    } catch {
      return null; // Big throws on "abc", "1,000" etc.
    }
  }
  return null;
}

export const toNum = (v: Big): number => v.toNumber();
