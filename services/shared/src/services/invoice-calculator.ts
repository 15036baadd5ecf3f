import { InvoiceTotals, Product } from '../types/billing.types';
import { ValidationError } from '../utils/errors';
import {
     divideHalfUp,
     fromMinorUnits,
     MAX_AMOUNT_MINOR,
     toBasisPoints,
     toMinorUnits,
} from '../utils/money';

export interface PricingLine {
     product: Product;
     quantity: number;
}

export interface PricedLine extends PricingLine {
     unitPriceMinor: number;
     lineTotalMinor: number;
}

export interface PricedInvoice {
     lines: PricedLine[];
     subtotalMinor: number;
     cgstMinor: number;
     sgstMinor: number;
     totalMinor: number;
     totals: InvoiceTotals;
}

/**
 * Prices lines at each product's current selling price and splits GST evenly
 * into CGST and SGST. Line totals are exact in paise; each tax half is rounded
 * half-up once, on the subtotal. Throws AMOUNT_OUT_OF_RANGE when the total
 * cannot be stored, before any stock is reserved or a number is taken.
 */
export function priceInvoice(lines: PricingLine[], gstRatePercent: number): PricedInvoice {
     const priced = lines.map((line) => {
          const unitPriceMinor = toMinorUnits(line.product.sellingPrice);
          return {
               ...line,
               unitPriceMinor,
               lineTotalMinor: unitPriceMinor * line.quantity,
          };
     });

     const subtotalMinor = priced.reduce((sum, line) => sum + line.lineTotalMinor, 0);

     const basisPoints = toBasisPoints(gstRatePercent);
     if (!Number.isSafeInteger(subtotalMinor) || !Number.isSafeInteger(subtotalMinor * basisPoints)) {
          throw amountOutOfRange();
     }

     // basis points / 2 halves, / 10000 to a fraction
     const taxMinor = divideHalfUp(subtotalMinor * basisPoints, 20000);
     const cgstMinor = taxMinor;
     const sgstMinor = taxMinor;
     const totalMinor = subtotalMinor + cgstMinor + sgstMinor;

     if (totalMinor > MAX_AMOUNT_MINOR) {
          throw amountOutOfRange();
     }

     const halfRate = basisPoints / 200;

     return {
          lines: priced,
          subtotalMinor,
          cgstMinor,
          sgstMinor,
          totalMinor,
          totals: {
               subtotal: fromMinorUnits(subtotalMinor),
               cgstRate: halfRate,
               sgstRate: halfRate,
               cgst: fromMinorUnits(cgstMinor),
               sgst: fromMinorUnits(sgstMinor),
               total: fromMinorUnits(totalMinor),
          },
     };
}

function amountOutOfRange(): ValidationError {
     return new ValidationError(
          `Invoice total must not exceed ${fromMinorUnits(MAX_AMOUNT_MINOR)}`,
          'AMOUNT_OUT_OF_RANGE'
     );
}
