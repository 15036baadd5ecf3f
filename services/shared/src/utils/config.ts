export interface BillingConfig {
     /** Total GST percentage, split evenly into CGST and SGST. */
     gstRatePercent: number;
     invoiceNumberPrefix: string;
     invoiceNumberPadding: number;
     /** Extra attempts after a serialization failure or deadlock. */
     transactionRetries: number;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
     const raw = env[name];
     if (raw === undefined || raw.trim() === '') {
          return fallback;
     }

     const value = Number(raw);
     if (!Number.isFinite(value)) {
          throw new Error(`${name} must be a number, got "${raw}"`);
     }
     return value;
}

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
     const value = readNumber(env, name, fallback);
     if (!Number.isInteger(value) || value < min) {
          throw new Error(`${name} must be an integer >= ${min}, got ${value}`);
     }
     return value;
}

export function loadBillingConfig(env: NodeJS.ProcessEnv = process.env): BillingConfig {
     const gstRatePercent = readNumber(env, 'GST_RATE_PERCENT', 18);
     if (gstRatePercent < 0 || gstRatePercent > 100) {
          throw new Error(`GST_RATE_PERCENT must be between 0 and 100, got ${gstRatePercent}`);
     }

     return {
          gstRatePercent,
          invoiceNumberPrefix: env.INVOICE_NUMBER_PREFIX?.trim() || 'INV',
          invoiceNumberPadding: readInteger(env, 'INVOICE_NUMBER_PADDING', 6, 1),
          transactionRetries: readInteger(env, 'TRANSACTION_RETRIES', 1, 0),
     };
}

export function requireEnv(name: string, env: NodeJS.ProcessEnv = process.env): string {
     const value = env[name]?.trim();
     if (!value) {
          throw new Error(`${name} must be set`);
     }
     return value;
}
