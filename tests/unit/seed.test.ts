import { loadSeedProducts } from '@stockbill/shared/src/db/seed';

describe('loadSeedProducts', () => {
     it('should read the bundled sample catalog', () => {
          const products = loadSeedProducts();

          expect(products).toHaveLength(7);
          expect(products[0]).toEqual({
               productName: 'Basmati Rice',
               weight: '5kg',
               quantity: 40,
               costPrice: 420,
               sellingPrice: 500,
          });
          expect(products.every((p) => p.sellingPrice > 0)).toBe(true);
     });
});
