/**
 * Agrarian BNPL - Synthetic Data Module
 */

export * from './random';
export * from './generator';
