/**
 * Veilpost - Types Index
 * Re-exports all types from this module
 */

export * from './crypto.js';
