import { describe, it, expect } from 'vitest';
import { PlanGraph } from '../src/graph/plan-graph.js';
import { PlanGraphError } from '../src/lib/errors.js';
import { fixturePath, loadFixture, planXml } from './helpers/test-context.js';

function buildFailure(engine: PlanGraph, file: string): PlanGraphError {
  try {
    engine.buildFromFile(fixturePath(file));
  } catch (err) {
    if (err instanceof PlanGraphError) return err;
    throw err;
  }
  throw new Error(`expected ${file} to fail`);
}

describe('PlanGraph', () => {
  it('starts empty', () => {
    const engine = new PlanGraph();
    expect(engine.plan).toBeNull();
    expect(engine.graph.nodeCount).toBe(0);
    expect(engine.getReadyTasks()).toEqual([]);
    expect(engine.toOutline()).toBe('');
  });

  it('validates files and strings', () => {
    const engine = new PlanGraph();
    expect(engine.validateFile(fixturePath('sample-plan.xml'))).toBe(true);
    expect(engine.validateDocument(loadFixture('sample-plan.xml'))).toBe(true);
    expect(() => engine.validateFile(fixturePath('invalid-plan.xml'))).toThrow(PlanGraphError);
  });

  it('builds the plan and graph from a file', () => {
    const engine = new PlanGraph();
    engine.buildFromFile(fixturePath('sample-plan.xml'));
    expect(engine.plan?.version).toBe('1.0');
    expect(engine.plan?.epics).toHaveLength(2);
    expect(engine.graph.nodeCount).toBe(11);
    expect(engine.getReadyTasks()).toEqual(['task2', 'task6']);
    expect(engine.getReadyTasks({ include_in_progress: true })).toEqual(['task2', 'task4', 'task6']);
  });

  it('counts only elements that survive parsing', () => {
    const engine = new PlanGraph();
    engine.buildFromFile(fixturePath('dropped-elements.xml'));
    expect(engine.graph.allNodes().map((n) => n.id)).toEqual(['E1', 'S1', 'T1', 'T4']);
    expect(engine.graph.hasNode('T2')).toBe(false);
    expect(engine.getReadyTasks()).toEqual(['T4']);
  });

  it('replaces the previous graph on rebuild', () => {
    const engine = new PlanGraph();
    engine.buildFromFile(fixturePath('sample-plan.xml'));
    engine.buildFromString(
      planXml('<epic id="X1" status="pending"><story id="Y1" status="pending"><task id="Z1" status="pending"/></story></epic>', '9'),
    );
    expect(engine.plan?.version).toBe('9');
    expect(engine.graph.allNodes().map((n) => n.id)).toEqual(['X1', 'Y1', 'Z1']);
    expect(engine.graph.hasNode('epic1')).toBe(false);
    expect(engine.getReadyTasks()).toEqual(['Z1']);
  });

  it('rebuilds identically from the same document', () => {
    const engine = new PlanGraph();
    engine.buildFromFile(fixturePath('sample-plan.xml'));
    const nodes = engine.graph.allNodes();
    const edges = engine.graph.allEdges();
    engine.buildFromFile(fixturePath('sample-plan.xml'));
    expect(engine.graph.allNodes()).toEqual(nodes);
    expect(engine.graph.allEdges()).toEqual(edges);
  });

  it('keeps the previous build when validation fails', () => {
    const engine = new PlanGraph();
    engine.buildFromFile(fixturePath('sample-plan.xml'));
    const plan = engine.plan;
    const graph = engine.graph;

    expect(buildFailure(engine, 'invalid-plan.xml').code).toBe('SCHEMA_VIOLATION');
    expect(buildFailure(engine, 'malformed-plan.xml').code).toBe('MALFORMED_DOCUMENT');
    expect(buildFailure(engine, 'missing.xml').code).toBe('IO_FAILURE');

    expect(engine.plan).toBe(plan);
    expect(engine.graph).toBe(graph);
  });

  it('marks build failures', () => {
    const err = buildFailure(new PlanGraph(), 'missing.xml');
    expect(err.isBuildFailure).toBe(true);
    expect(err.cause).toBeDefined();
  });

  it('renders all three formats', () => {
    const engine = new PlanGraph();
    engine.buildFromFile(fixturePath('sample-plan.xml'));
    expect(engine.toOutline({ include_status: false }).split('\n')[0]).toBe('- epic1: Implement core model system');
    expect(engine.toFlowchart({ include_descriptions: false }).split('\n')[1]).toBe('    story1 --> epic1');
    expect(engine.toDot({ include_descriptions: false }).split('\n')[1]).toBe('    "story1" -> "epic1"');
  });

  it('rejects malformed options with INVALID_OPTIONS', () => {
    const engine = new PlanGraph();
    engine.buildFromFile(fixturePath('sample-plan.xml'));
    try {
      engine.getReadyTasks(JSON.parse('{"include_in_progress":null}'));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PlanGraphError);
      expect((err as PlanGraphError).code).toBe('INVALID_OPTIONS');
      expect((err as PlanGraphError).isBuildFailure).toBe(false);
    }
  });
});
