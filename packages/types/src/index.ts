/**
 * Centralized Type Definitions for bfvm
 *
 * Result tuples, error codes and the interfaces shared between the VM
 * runtime and the front ends that drive it.
 */

// Error codes and classes
export * from './errors'
// Safe result tuples
export * from './safe'
// VM interfaces
export * from './vm'
