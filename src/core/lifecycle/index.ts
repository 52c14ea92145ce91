/**
 * Container lifecycle module exports
 */

export { type CoordinatorOptions, LifecycleCoordinator, type PausedBody } from "./coordinator";
