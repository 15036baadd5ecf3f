import { loadBillingConfig, requireEnv } from '@stockbill/shared/src/utils/config';

describe('loadBillingConfig', () => {
     it('should apply defaults', () => {
          expect(loadBillingConfig({})).toEqual({
               gstRatePercent: 18,
               invoiceNumberPrefix: 'INV',
               invoiceNumberPadding: 6,
               transactionRetries: 1,
          });
     });

     it('should read overrides from the environment', () => {
          expect(
               loadBillingConfig({
                    GST_RATE_PERCENT: '12',
                    INVOICE_NUMBER_PREFIX: ' BILL ',
                    INVOICE_NUMBER_PADDING: '4',
                    TRANSACTION_RETRIES: '0',
               })
          ).toEqual({
               gstRatePercent: 12,
               invoiceNumberPrefix: 'BILL',
               invoiceNumberPadding: 4,
               transactionRetries: 0,
          });
     });

     it.each([
          [{ GST_RATE_PERCENT: 'eighteen' }, 'GST_RATE_PERCENT must be a number, got "eighteen"'],
          [{ GST_RATE_PERCENT: '120' }, 'GST_RATE_PERCENT must be between 0 and 100, got 120'],
          [{ INVOICE_NUMBER_PADDING: '0' }, 'INVOICE_NUMBER_PADDING must be an integer >= 1, got 0'],
          [{ TRANSACTION_RETRIES: '1.5' }, 'TRANSACTION_RETRIES must be an integer >= 0, got 1.5'],
     ])('should reject %p', (env, message) => {
          expect(() => loadBillingConfig(env)).toThrow(message);
     });
});

describe('requireEnv', () => {
     it('should return a trimmed value', () => {
          expect(requireEnv('BILLING_API_KEY', { BILLING_API_KEY: ' test-secret ' })).toBe('test-secret');
     });

     it('should throw when unset or blank', () => {
          expect(() => requireEnv('BILLING_API_KEY', {})).toThrow('BILLING_API_KEY must be set');
          expect(() => requireEnv('BILLING_API_KEY', { BILLING_API_KEY: '  ' })).toThrow(
               'BILLING_API_KEY must be set'
          );
     });
});
