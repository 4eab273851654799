export { DependencyGraph, type Edge, type EdgeKind } from './graph.js';
export { buildGraph } from './builder.js';
export { findReadyTasks } from './ready.js';
export { PlanGraph } from './plan-graph.js';
