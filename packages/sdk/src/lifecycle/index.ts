/**
 * Lifecycle module - Transition tables for record status
 */

export type { LifecycleDefinition, LifecycleState } from "./types.js";
export { LedgerError } from "./types.js";
export { Lifecycle } from "./lifecycle.js";
