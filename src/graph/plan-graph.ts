import type { z } from 'zod';
import type {
  dotOptionsSchema,
  flowchartOptionsSchema,
  outlineOptionsSchema,
  readyOptionsSchema,
} from '../config/options.js';
import { SchemaValidator, type PlanDocument } from '../plan/schema.js';
import { parsePlanDocument } from '../plan/parser.js';
import type { Plan } from '../plan/types.js';
import { renderDot } from '../render/dot.js';
import { renderFlowchart } from '../render/flowchart.js';
import { renderOutline } from '../render/outline.js';
import { buildGraph } from './builder.js';
import { DependencyGraph } from './graph.js';
import { findReadyTasks } from './ready.js';

/**
 * Owns the current plan and its graph.
 *
 * Every build validates first; a failed validation throws PlanGraphError and
 * leaves the previous plan and graph as they were. A successful build replaces
 * both wholesale. Not safe for concurrent builds.
 */
export class PlanGraph {
  private validator: SchemaValidator | null = null;
  private currentPlan: Plan | null = null;
  private currentGraph = new DependencyGraph();

  get plan(): Plan | null {
    return this.currentPlan;
  }

  get graph(): DependencyGraph {
    return this.currentGraph;
  }

  private schema(): SchemaValidator {
    this.validator ??= new SchemaValidator();
    return this.validator;
  }

  // ── Validation ──

  validateFile(filePath: string): true {
    this.schema().validateFile(filePath);
    return true;
  }

  validateDocument(content: string): true {
    this.schema().validateDocument(content);
    return true;
  }

  // ── Build ──

  buildFromFile(filePath: string): void {
    this.replace(this.schema().validateFile(filePath));
  }

  buildFromString(content: string): void {
    this.replace(this.schema().validateDocument(content));
  }

  private replace(document: PlanDocument): void {
    const plan = parsePlanDocument(document);
    const graph = buildGraph(plan);
    this.currentPlan = plan;
    this.currentGraph = graph;
  }

  // ── Queries ──

  getReadyTasks(options: z.input<typeof readyOptionsSchema> = {}): string[] {
    return findReadyTasks(this.currentGraph, options);
  }

  toOutline(options: z.input<typeof outlineOptionsSchema> = {}): string {
    return renderOutline(this.currentGraph, options);
  }

  toFlowchart(options: z.input<typeof flowchartOptionsSchema> = {}): string {
    return renderFlowchart(this.currentGraph, options);
  }

  toDot(options: z.input<typeof dotOptionsSchema> = {}): string {
    return renderDot(this.currentGraph, options);
  }
}
