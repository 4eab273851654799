import { debug } from '../lib/utils/debug.js';
import type { Plan } from '../plan/types.js';
import { DependencyGraph } from './graph.js';

/**
 * Flatten a plan into a fresh graph.
 * Stories point at their epic and tasks at their story (`component_of`);
 * every depends_on entry becomes a `depends_on` edge whether or not its
 * target exists.
 */
export function buildGraph(plan: Plan): DependencyGraph {
  const graph = new DependencyGraph();

  for (const epic of plan.epics) {
    graph.addNode(epic);
    for (const story of epic.stories) {
      graph.addNode(story);
      graph.addEdge(story.id, epic.id, 'component_of');
      for (const task of story.tasks) {
        graph.addNode(task);
        graph.addEdge(task.id, story.id, 'component_of');
        for (const dep of task.depends_on) {
          graph.addEdge(task.id, dep, 'depends_on');
        }
      }
    }
  }

  debug('graph', `built ${graph.nodeCount} nodes, ${graph.edgeCount} edges`);
  return graph;
}
