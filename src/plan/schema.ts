import { readFileSync } from 'node:fs';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z, type ZodError } from 'zod';
import { PlanGraphError, ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';

// ── XML reading ──

/** Element paths that may repeat; the parser always yields arrays for them */
const REPEATED_PATHS = new Set([
  'plan.epic',
  'plan.epic.story',
  'plan.epic.story.task',
  'plan.epic.story.task.depends_on',
  'plan.epic.story.task.dependencies.depends_on',
]);

function createXmlParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    // Element text is read trimmed: ids, integers and descriptions alike
    trimValues: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    isArray: (_tagName, jPath) => REPEATED_PATHS.has(jPath),
  });
}

/** Same reading rules, but children kept as an ordered list per element */
function createOrderedXmlParser(): XMLParser {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
  });
}

// ── Dependency order ──
//
// The object form splits a task's direct <depends_on> children from those
// under <dependencies>, losing how they interleave. The ordered form keeps it.

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function childElements(children: unknown, tag: string): unknown[] {
  if (!Array.isArray(children)) return [];
  const found: unknown[] = [];
  for (const child of children) {
    if (isRecord(child) && tag in child) found.push(child[tag]);
  }
  return found;
}

function textOf(children: unknown): string {
  if (!Array.isArray(children)) return '';
  return children
    .map((child) => (isRecord(child) && typeof child['#text'] === 'string' ? child['#text'] : ''))
    .join('');
}

function collectText(children: unknown, tag: string, into: string[]): string[] {
  if (!Array.isArray(children)) return into;
  for (const child of children) {
    if (!isRecord(child)) continue;
    for (const [key, value] of Object.entries(child)) {
      if (key === tag) into.push(textOf(value));
      else if (key !== ':@' && key !== '#text') collectText(value, tag, into);
    }
  }
  return into;
}

/** One list per task, tasks in document order, each list in document order */
export function readDependencyOrder(ordered: unknown): string[][] {
  const lists: string[][] = [];
  for (const plan of childElements(ordered, 'plan')) {
    for (const epic of childElements(plan, 'epic')) {
      for (const story of childElements(epic, 'story')) {
        for (const task of childElements(story, 'task')) {
          lists.push(collectText(task, 'depends_on', []));
        }
      }
    }
  }
  return lists;
}

// ── Document schema ──

/**
 * Structural rules for a plan document, over the parser's object form
 * (attributes prefixed with `@_`). `status`, `priority` and `points` are
 * plain strings here: their values are judged per element by the plan parser.
 */
export function createDocumentSchema() {
  const text = z.string();
  const attribute = (name: string) =>
    z.string({ required_error: `attribute "${name}" is required` });

  const identity = {
    '@_id': attribute('id'),
    '@_status': attribute('status'),
    description: text.optional(),
    priority: text.optional(),
  };

  // An empty <dependencies/> reads as an empty string
  const dependencies = z.union([
    z.literal(''),
    z.object({ depends_on: z.array(text).optional() }).strict(),
  ]);

  const task = z
    .object({
      ...identity,
      depends_on: z.array(text).optional(),
      dependencies: dependencies.optional(),
    })
    .strict();

  const story = z
    .object({
      ...identity,
      points: text.optional(),
      task: z.array(task).optional(),
    })
    .strict();

  const epic = z
    .object({
      ...identity,
      story: z.array(story).optional(),
    })
    .strict();

  const plan = z
    .object({
      '@_version': attribute('version'),
      epic: z.array(epic).optional(),
    })
    .strict();

  return z.object({ plan }).strict();
}

export type DocumentSchema = ReturnType<typeof createDocumentSchema>;

type RawDocument = z.infer<DocumentSchema>;
type RawEpic = NonNullable<RawDocument['plan']['epic']>[number];
type RawStory = NonNullable<RawEpic['story']>[number];
type RawTask = NonNullable<RawStory['task']>[number];

/** A task with every depends_on beneath it gathered into one list, in document order */
export type TaskElement = Omit<RawTask, 'depends_on' | 'dependencies'> & { depends_on: string[] };
export type StoryElement = Omit<RawStory, 'task'> & { task?: TaskElement[] };
export type EpicElement = Omit<RawEpic, 'story'> & { story?: StoryElement[] };
export interface PlanDocument {
  plan: Omit<RawDocument['plan'], 'epic'> & { epic?: EpicElement[] };
}

function normalizeDocument(raw: RawDocument, order: readonly string[][]): PlanDocument {
  let position = 0;
  const task = (element: RawTask): TaskElement => ({
    '@_id': element['@_id'],
    '@_status': element['@_status'],
    description: element.description,
    priority: element.priority,
    depends_on: order[position++] ?? [],
  });
  const story = ({ task: tasks, ...fields }: RawStory): StoryElement => ({
    ...fields,
    task: tasks?.map(task),
  });
  const epic = ({ story: stories, ...fields }: RawEpic): EpicElement => ({
    ...fields,
    story: stories?.map(story),
  });
  const { epic: epics, ...plan } = raw.plan;
  return { plan: { ...plan, epic: epics?.map(epic) } };
}

// ── Error formatting ──

export function formatSchemaError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map((part) => String(part).replace(/^@_/, '@')).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('\n  ');
}

// ── Validator ──

/**
 * Validates plan documents against the fixed plan schema.
 * The schema is built on first use and reused for every later validation.
 */
export class SchemaValidator {
  private schema: DocumentSchema | null = null;
  private readonly xml = createXmlParser();
  private readonly orderedXml = createOrderedXmlParser();

  private loadSchema(): DocumentSchema {
    if (this.schema === null) {
      this.schema = createDocumentSchema();
      debug('schema', 'plan schema loaded');
    }
    return this.schema;
  }

  /**
   * Validate document text. Returns the validated document, with each task's
   * dependencies flattened in document order, or throws PlanGraphError.
   */
  validateDocument(content: string, source = '<string>'): PlanDocument {
    const wellFormed = XMLValidator.validate(content);
    if (wellFormed !== true) {
      const { msg, line, col } = wellFormed.err;
      throw new PlanGraphError(
        ErrorCode.MALFORMED_DOCUMENT,
        `Malformed XML in ${source} (line ${line}, column ${col}): ${msg}`,
        'Check the document for unclosed tags, stray characters or multiple root elements',
        wellFormed.err,
      );
    }

    let raw: unknown;
    let ordered: unknown;
    try {
      raw = this.xml.parse(content);
      ordered = this.orderedXml.parse(content);
    } catch (err) {
      throw new PlanGraphError(
        ErrorCode.MALFORMED_DOCUMENT,
        `Malformed XML in ${source}: ${err instanceof Error ? err.message : String(err)}`,
        undefined,
        err,
      );
    }

    const result = this.loadSchema().safeParse(raw);
    if (!result.success) {
      throw new PlanGraphError(
        ErrorCode.SCHEMA_VIOLATION,
        `Schema validation failed for ${source}:\n  ${formatSchemaError(result.error)}`,
        'Fix the issues above and try again',
        result.error,
      );
    }

    return normalizeDocument(result.data, readDependencyOrder(ordered));
  }

  /** Read and validate a plan file. */
  validateFile(filePath: string): PlanDocument {
    let content: string;
    try {
      content = readFileSync(filePath, 'utf-8');
    } catch (err) {
      throw new PlanGraphError(
        ErrorCode.IO_FAILURE,
        `Cannot read plan file: ${filePath}`,
        'Check that the file exists and is readable',
        err,
      );
    }

    return this.validateDocument(content, filePath);
  }
}
