/**
 * Agrarian BNPL - Product Catalog
 *
 * Financing products, their base terms and target crops.
 */

import { CropType, PRODUCT_CODES, ProductCode } from '../../shared/types/applicant.types';

// ============================================================================
// PRODUCT DEFINITIONS
// ============================================================================

export interface BnplProduct {
  code: ProductCode;
  name: string;
  description: string;
  baseLimit: number;
  baseTenorMonths: number;
  targetCrops: CropType[] | 'all';
}

export const BNPL_PRODUCTS: Readonly<Record<ProductCode, BnplProduct>> = Object.freeze({
  Seeds_BNPL: {
    code: 'Seeds_BNPL',
    name: 'Seeds BNPL',
    description: 'Seed financing for maize/rice farmers',
    baseLimit: 20000,
    baseTenorMonths: 4,          // One crop cycle
    targetCrops: ['maize', 'rice'],
  },
  Fertilizer_BNPL: {
    code: 'Fertilizer_BNPL',
    name: 'Fertilizer BNPL',
    description: 'Input financing for high-intensity crops',
    baseLimit: 35000,
    baseTenorMonths: 3,          // Short-season input
    targetCrops: ['vegetables', 'horticulture'],
  },
  Equipment_Lease: {
    code: 'Equipment_Lease',
    name: 'Equipment Lease',
    description: 'Machinery leasing for commercial farms',
    baseLimit: 150000,
    baseTenorMonths: 12,         // Durable asset amortization
    targetCrops: 'all',
  },
  Input_Bundle: {
    code: 'Input_Bundle',
    name: 'Input Bundle',
    description: 'Multi-input package for diversified farms',
    baseLimit: 50000,
    baseTenorMonths: 6,
    targetCrops: ['mixed', 'livestock'],
  },
  Cash_Advance: {
    code: 'Cash_Advance',
    name: 'Cash Advance',
    description: 'Short-term cash bridge for small needs',
    baseLimit: 10000,
    baseTenorMonths: 2,
    targetCrops: 'all',
  },
  Premium_BNPL: {
    code: 'Premium_BNPL',
    name: 'Premium BNPL',
    description: 'General BNPL for established customers',
    baseLimit: 75000,
    baseTenorMonths: 6,
    targetCrops: 'all',
  },
});

export function getProductInfo(code: ProductCode): BnplProduct {
  return BNPL_PRODUCTS[code];
}

export function listProducts(): BnplProduct[] {
  return PRODUCT_CODES.map(code => BNPL_PRODUCTS[code]);
}

export function isProductCode(value: string): value is ProductCode {
  return (PRODUCT_CODES as readonly string[]).includes(value);
}
