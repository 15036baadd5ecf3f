import { ProductKey } from '../types/billing.types';

export function normalizeProductKey(key: { productName: string; weight?: string | null }): ProductKey {
     return {
          productName: key.productName.trim(),
          weight: (key.weight ?? '').trim(),
     };
}

export function productKeyId(key: ProductKey): string {
     return JSON.stringify([key.productName, key.weight]);
}

export function fullProductName(key: ProductKey): string {
     return key.weight ? `${key.productName} (${key.weight})` : key.productName;
}
