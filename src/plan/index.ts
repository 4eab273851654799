export { parsePlanDocument, parseEpic, parseStory, parseTask, collectDependencies } from './parser.js';
export { SchemaValidator, createDocumentSchema, formatSchemaError } from './schema.js';
export type { PlanDocument, EpicElement, StoryElement, TaskElement } from './schema.js';
export type { Plan, PlanNode, EpicNode, StoryNode, TaskNode, Status, NodeKind } from './types.js';
export { statusSchema, nodeFieldsSchema, storyFieldsSchema, STATUSES, FIELD_DEFAULTS } from './types.js';
