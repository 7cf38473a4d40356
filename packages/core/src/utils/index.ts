/**
 * Utility exports for bfvm core
 */

// Byte and text conversions
export * from './bytes'
