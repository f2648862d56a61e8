/**
 * Dependencies module exports
 */

export { type DependencyNode, DependencyGraph } from './graph.js';
