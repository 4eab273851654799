import { describe, it, expect, vi } from 'vitest';
import { SchemaValidator } from '../src/plan/schema.js';
import { PlanGraphError } from '../src/lib/errors.js';
import { fixturePath, loadFixture, planXml } from './helpers/test-context.js';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof PlanGraphError) return err.code;
    throw err;
  }
  return undefined;
}

// ── Accepted documents ──

describe('SchemaValidator.validateFile', () => {
  it('accepts sample-plan.xml', () => {
    const document = new SchemaValidator().validateFile(fixturePath('sample-plan.xml'));
    expect(document.plan['@_version']).toBe('1.0');
    expect(document.plan.epic).toHaveLength(2);
    expect(document.plan.epic?.[0]?.story?.[0]?.task).toHaveLength(3);
  });

  it('keeps element text as strings', () => {
    const document = new SchemaValidator().validateFile(fixturePath('sample-plan.xml'));
    const story = document.plan.epic?.[0]?.story?.[0];
    expect(story?.points).toBe('5');
    expect(story?.task?.[1]?.depends_on).toEqual(['task1']);
    expect(story?.task?.[2]?.depends_on).toEqual(['task2']);
    expect(story?.task?.[2]).not.toHaveProperty('dependencies');
  });

  it('accepts unknown status and non-numeric priority (judged by the parser)', () => {
    expect(() => new SchemaValidator().validateFile(fixturePath('dropped-elements.xml'))).not.toThrow();
  });

  it('reports a missing file as IO_FAILURE', () => {
    expect(codeOf(() => new SchemaValidator().validateFile(fixturePath('no-such-plan.xml')))).toBe('IO_FAILURE');
  });

  it('reports broken XML as MALFORMED_DOCUMENT', () => {
    expect(codeOf(() => new SchemaValidator().validateFile(fixturePath('malformed-plan.xml')))).toBe(
      'MALFORMED_DOCUMENT',
    );
  });

  it('reports structural problems as SCHEMA_VIOLATION', () => {
    const validator = new SchemaValidator();
    expect(codeOf(() => validator.validateFile(fixturePath('invalid-plan.xml')))).toBe('SCHEMA_VIOLATION');
    try {
      validator.validateFile(fixturePath('invalid-plan.xml'));
    } catch (err) {
      expect(err).toBeInstanceOf(PlanGraphError);
      expect((err as PlanGraphError).message).toContain('plan.epic.0.@id: attribute "id" is required');
      expect((err as PlanGraphError).cause).toBeDefined();
    }
  });
});

describe('SchemaValidator.validateDocument', () => {
  it('accepts an empty plan', () => {
    const document = new SchemaValidator().validateDocument(planXml('', '3.1'));
    expect(document.plan['@_version']).toBe('3.1');
    expect(document.plan.epic).toBeUndefined();
  });

  it('requires the version attribute', () => {
    const validator = new SchemaValidator();
    expect(codeOf(() => validator.validateDocument('<plan><epic id="E1" status="pending"/></plan>'))).toBe(
      'SCHEMA_VIOLATION',
    );
  });

  it('rejects a different root element', () => {
    expect(codeOf(() => new SchemaValidator().validateDocument('<roadmap version="1.0"/>'))).toBe(
      'SCHEMA_VIOLATION',
    );
  });

  it('rejects unknown child elements', () => {
    const xml = planXml('<epic id="E1" status="pending"><owner>someone</owner></epic>');
    expect(codeOf(() => new SchemaValidator().validateDocument(xml))).toBe('SCHEMA_VIOLATION');
  });

  it('rejects a repeated description', () => {
    const xml = planXml(
      '<epic id="E1" status="pending"><description>a</description><description>b</description></epic>',
    );
    expect(codeOf(() => new SchemaValidator().validateDocument(xml))).toBe('SCHEMA_VIOLATION');
  });

  it('rejects tasks placed directly under an epic', () => {
    const xml = planXml('<epic id="E1" status="pending"><task id="T1" status="pending"/></epic>');
    expect(codeOf(() => new SchemaValidator().validateDocument(xml))).toBe('SCHEMA_VIOLATION');
  });

  it('accepts an empty dependencies wrapper', () => {
    const xml = planXml(
      '<epic id="E1" status="pending"><story id="S1" status="pending">' +
        '<task id="T1" status="pending"><dependencies/></task></story></epic>',
    );
    const document = new SchemaValidator().validateDocument(xml);
    expect(document.plan.epic?.[0]?.story?.[0]?.task?.[0]?.depends_on).toEqual([]);
  });

  it('flattens dependencies in document order', () => {
    const xml = planXml(
      '<epic id="E1" status="pending"><story id="S1" status="pending">' +
        '<task id="T1" status="pending"><depends_on>A</depends_on>' +
        '<dependencies><depends_on>B</depends_on></dependencies>' +
        '<depends_on>C</depends_on></task></story></epic>',
    );
    const document = new SchemaValidator().validateDocument(xml);
    expect(document.plan.epic?.[0]?.story?.[0]?.task?.[0]?.depends_on).toEqual(['A', 'B', 'C']);
  });

  it('still rejects unknown children inside dependencies', () => {
    const xml = planXml(
      '<epic id="E1" status="pending"><story id="S1" status="pending">' +
        '<task id="T1" status="pending"><dependencies><blocks>A</blocks></dependencies></task></story></epic>',
    );
    expect(codeOf(() => new SchemaValidator().validateDocument(xml))).toBe('SCHEMA_VIOLATION');
  });

  it('trims surrounding whitespace from element text', () => {
    const xml = planXml(
      '<epic id="E1" status="pending"><description>  padded  </description>' +
        '<story id="S1" status="pending"><task id="T1" status="pending">' +
        '<depends_on> E1 </depends_on></task></story></epic>',
    );
    const epic = new SchemaValidator().validateDocument(xml).plan.epic?.[0];
    expect(epic?.description).toBe('padded');
    expect(epic?.story?.[0]?.task?.[0]?.depends_on).toEqual(['E1']);
  });

  it('reports two root elements as MALFORMED_DOCUMENT', () => {
    const xml = '<plan version="1.0"></plan><plan version="2.0"></plan>';
    expect(codeOf(() => new SchemaValidator().validateDocument(xml))).toBe('MALFORMED_DOCUMENT');
  });

  it('builds the schema once per validator', () => {
    vi.stubEnv('PLANGRAPH_DEBUG', 'schema');
    const logs = vi.spyOn(console, 'error').mockImplementation(() => {});

    const validator = new SchemaValidator();
    validator.validateDocument(loadFixture('sample-plan.xml'));
    validator.validateDocument(loadFixture('sample-plan.xml'));

    expect(logs).toHaveBeenCalledTimes(1);
    expect(logs.mock.calls[0]?.[1]).toBe('plan schema loaded');
  });
});
