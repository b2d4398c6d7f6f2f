/**
 * Agrarian BNPL - Decisioning Module
 */

export * from './pipeline';
export * from './decision.service';
export * from './decision.repository';
