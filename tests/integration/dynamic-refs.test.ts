/**
 * Integration test: $dynamicRef and $recursiveRef through a full pass
 */

import { describe, it, expect } from 'vitest';
import { ModelGraphBackend } from '../../src/lib/emitter/model-graph.js';
import { synthesizeModels } from '../../src/lib/pass/index.js';
import type { SchemaDocumentInput } from '../../src/types/schema-node.js';

const tree: SchemaDocumentInput = {
  id: 'tree.json',
  root: {
    $id: 'https://example.com/tree',
    $dynamicAnchor: 'node',
    type: 'object',
    properties: {
      data: true,
      children: { type: 'array', items: { $dynamicRef: '#node' } },
    },
  },
};

const strictTree: SchemaDocumentInput = {
  id: 'strict-tree.json',
  root: {
    $id: 'https://example.com/strict-tree',
    $dynamicAnchor: 'node',
    $ref: 'tree',
    required: ['children'],
  },
};

describe('Dynamic references', () => {
  it('should bind a dynamic ref to its own resource', () => {
    const graph = new ModelGraphBackend().render(synthesizeModels([tree]));

    expect(graph.models.map((model) => model.name)).toEqual(['Tree']);
    expect(graph.models[0]?.fields.map((field) => [field.name, field.type])).toEqual([
      ['data', 'unknown'],
      ['children', 'list[Tree]'],
    ]);
    expect(graph.roots).toEqual({ 'tree.json': 'Tree' });
  });

  it('should bind to the outermost resource declaring the anchor', () => {
    const graph = new ModelGraphBackend().render(synthesizeModels([tree, strictTree]));

    expect(graph.models.map((model) => model.name)).toEqual(['Tree', 'StrictTree']);
    expect(
      graph.models[1]?.fields.map((field) => [field.name, field.type, field.required]),
    ).toEqual([
      ['data', 'unknown', false],
      ['children', 'list[StrictTree]', true],
    ]);
    expect(graph.models[0]?.fields[1]?.type).toBe('list[Tree]');
    expect(graph.roots).toEqual({ 'tree.json': 'Tree', 'strict-tree.json': 'StrictTree' });
  });

  it('should follow $recursiveRef to the recursive anchor', () => {
    const graph = new ModelGraphBackend().render(
      synthesizeModels([
        {
          id: 'list.json',
          root: {
            $recursiveAnchor: true,
            type: 'object',
            properties: { head: { type: 'string' }, tail: { $recursiveRef: '#' } },
            required: ['head'],
          },
        },
      ]),
    );

    expect(graph.models.map((model) => [model.name, model.fields.map((field) => field.type)])).toEqual([
      ['List', ['string', 'List']],
    ]);
  });
});
