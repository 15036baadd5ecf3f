// Amounts are carried as integer paise (1/100 rupee) while computing,
// and as 2-decimal numbers at the API and database edges.

// Column limits: prices are NUMERIC(12, 2), invoice amounts NUMERIC(14, 2)
export const MAX_PRICE = 9999999999.99;
export const MAX_AMOUNT_MINOR = 99_999_999_999_999;

export function toMinorUnits(value: number | string): number {
     const numeric = Number(value);
     if (!Number.isFinite(numeric)) {
          throw new Error(`Invalid monetary amount: ${value}`);
     }
     return Math.round(numeric * 100);
}

export function fromMinorUnits(minor: number): number {
     return minor / 100;
}

/** SQL literal for a NUMERIC(…, 2) column. */
export function formatMinorUnits(minor: number): string {
     const sign = minor < 0 ? '-' : '';
     const abs = Math.abs(minor);
     const rupees = Math.floor(abs / 100);
     const paise = abs % 100;
     return `${sign}${rupees}.${paise.toString().padStart(2, '0')}`;
}

/**
 * Integer division rounding half away from zero, for non-negative operands.
 */
export function divideHalfUp(numerator: number, denominator: number): number {
     if (numerator < 0 || denominator <= 0) {
          throw new RangeError('divideHalfUp expects numerator >= 0 and denominator > 0');
     }
     return Math.floor((2 * numerator + denominator) / (2 * denominator));
}

/** Percentage expressed in hundredths of a percent (18% -> 1800). */
export function toBasisPoints(percent: number): number {
     return Math.round(percent * 100);
}
