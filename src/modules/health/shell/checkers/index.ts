/**
 * Health checker factories
 */

export { makeDbHealthChecker, type DbHealthCheckerOptions } from './db-checker.js';
