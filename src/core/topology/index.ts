/**
 * Topology module exports
 */

export { TopologyIndex } from "./topology-index";
