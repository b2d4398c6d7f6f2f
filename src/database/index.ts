/**
 * Agrarian BNPL - Database Module
 */

export { getPool, closePool, testConnection } from './connection';
