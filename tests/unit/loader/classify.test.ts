import { describe, it, expect } from 'vitest';
import { classifyNode, narrowNode, structuralKeywords } from '../../../src/lib/loader/classify.js';
import { MalformedSchemaNodeError } from '../../../src/utils/errors.js';

describe('classifyNode', () => {
  it('should keep booleans apart', () => {
    expect(classifyNode(true, 'd.json', '#/a')).toEqual({
      kind: 'boolean',
      documentId: 'd.json',
      path: '#/a',
      value: true,
    });
    expect(classifyNode(false, 'd.json', '#/a').kind).toBe('boolean');
  });

  it('should rank references above combinators', () => {
    const node = classifyNode({ $ref: '#/x', allOf: [{}] }, 'd.json', '#');
    expect(node.kind).toBe('reference');
    if (node.kind === 'reference') {
      expect(node.keyword).toBe('$ref');
      expect(node.ref).toBe('#/x');
    }
  });

  it('should classify dynamic and recursive references', () => {
    const dynamic = classifyNode({ $dynamicRef: '#node' }, 'd.json', '#');
    const recursive = classifyNode({ $recursiveRef: '#' }, 'd.json', '#');
    expect(dynamic.kind === 'reference' && dynamic.keyword).toBe('$dynamicRef');
    expect(recursive.kind === 'reference' && recursive.keyword).toBe('$recursiveRef');
  });

  it('should list the combinators present', () => {
    const node = classifyNode({ oneOf: [{}], allOf: [{}] }, 'd.json', '#');
    expect(node.kind === 'combinator' && node.combinators).toEqual(['allOf', 'oneOf']);
  });

  it('should infer arrays and objects from their keywords', () => {
    expect(classifyNode({ items: { type: 'string' } }, 'd.json', '#').kind).toBe('array');
    expect(classifyNode({ properties: {} }, 'd.json', '#').kind).toBe('object');
    expect(classifyNode({ type: 'object' }, 'd.json', '#').kind).toBe('object');
    expect(classifyNode({ type: 'string', minLength: 1 }, 'd.json', '#').kind).toBe('scalar');
    expect(classifyNode({}, 'd.json', '#').kind).toBe('scalar');
  });

  it('should record nullability from type lists and the nullable flag', () => {
    const listed = classifyNode({ type: ['string', 'null'] }, 'd.json', '#');
    const flagged = classifyNode({ type: 'string', nullable: true }, 'd.json', '#');
    expect(listed.kind !== 'boolean' && listed.nullable).toBe(true);
    expect(flagged.kind !== 'boolean' && flagged.nullable).toBe(true);
  });

  it('should treat several concrete types as scalar until narrowed', () => {
    const node = classifyNode({ type: ['object', 'string'], properties: { a: {} } }, 'd.json', '#');
    expect(node.kind).toBe('scalar');
    expect(narrowNode(node, 'object').kind).toBe('object');
    expect(narrowNode(node, 'string').kind).toBe('scalar');
  });

  it('should reject values that are not schemas', () => {
    expect(() => classifyNode(42, 'd.json', '#/x')).toThrow(MalformedSchemaNodeError);
    expect(() => classifyNode([1], 'd.json', '#/x')).toThrow(
      'Malformed schema node at d.json#/x: expected a schema object or boolean, got array',
    );
    expect(() => classifyNode({ $ref: 5 }, 'd.json', '#')).toThrow(MalformedSchemaNodeError);
    expect(() => classifyNode({ allOf: [] }, 'd.json', '#')).toThrow(MalformedSchemaNodeError);
    expect(() => classifyNode({ type: 3 }, 'd.json', '#')).toThrow(MalformedSchemaNodeError);
  });

  it('should separate structural keywords from annotations', () => {
    expect(
      structuralKeywords({ title: 'T', $comment: 'c', 'x-tag': 1, minLength: 2, type: 'string' }),
    ).toEqual(['minLength', 'type']);
  });
});
