import { describe, it, expect } from 'vitest';
import { DocumentSet } from '../../../src/lib/loader/index.js';
import { ReferenceResolver } from '../../../src/lib/resolver/index.js';
import type { SchemaDocumentInput, ScopeFrame } from '../../../src/types/schema-node.js';
import {
  DanglingReferenceError,
  UnsupportedPointerDialectError,
} from '../../../src/utils/errors.js';

const petstore = {
  id: 'schemas/pets.json',
  root: {
    $defs: {
      Pet: { type: 'object', properties: { owner: { $ref: 'people.json#/$defs/Person' } } },
      Tag: { $anchor: 'tag', type: 'string' },
      'a/b': { type: 'integer' },
    },
  },
};

const people = {
  id: 'schemas/people.json',
  root: { $defs: { Person: { type: 'object' } } },
};

function resolverFor(...inputs: SchemaDocumentInput[]) {
  const documents = new DocumentSet(inputs);
  return { documents, resolver: new ReferenceResolver(documents) };
}

const origin = { documentId: 'schemas/pets.json', path: '#/$defs/Pet' };

describe('ReferenceResolver', () => {
  it('should resolve local pointers', () => {
    const { resolver } = resolverFor(petstore, people);
    const resolved = resolver.resolveRef('#/$defs/Pet', origin);
    expect(resolved.key).toBe('schemas/pets.json#/$defs/Pet');
    expect(resolved.dialect).toBe('local');
    expect(resolved.crossedDocument).toBe(false);
    expect(resolved.cycle).toBe(false);
    expect(resolved.target.kind).toBe('object');
  });

  it('should resolve escaped and anchor fragments', () => {
    const { resolver } = resolverFor(petstore, people);
    expect(resolver.resolveRef('#/$defs/a~1b', origin).key).toBe('schemas/pets.json#/$defs/a~1b');
    expect(resolver.resolveRef('#tag', origin).key).toBe('schemas/pets.json#/$defs/Tag');
  });

  it('should resolve relative document ids against the origin directory', () => {
    const { resolver } = resolverFor(petstore, people);
    const resolved = resolver.resolveRef('people.json#/$defs/Person', {
      documentId: 'schemas/pets.json',
      path: '#/$defs/Pet/properties/owner',
    });
    expect(resolved.key).toBe('schemas/people.json#/$defs/Person');
    expect(resolved.dialect).toBe('cross-document');
    expect(resolved.crossedDocument).toBe(true);
  });

  it('should return the cached resolution for a repeated reference', () => {
    const { resolver } = resolverFor(petstore, people);
    const first = resolver.resolveRef('#/$defs/Pet', origin);
    const second = resolver.resolveRef('#/$defs/Pet', origin);
    expect(second).toBe(first);
    expect(resolver.stats()).toEqual({ entries: 1, hits: 1 });
  });

  it('should mark a target already on the stack as a cycle', () => {
    const { resolver } = resolverFor(petstore, people);
    const resolved = resolver.resolveRef('#/$defs/Pet', origin);

    const inner = resolver.track(resolved, () => resolver.resolveRef('#/$defs/Pet', origin));
    expect(inner.cycle).toBe(true);
    expect(inner.resolutionPath).toEqual(['schemas/pets.json#/$defs/Pet']);
    expect(resolver.isActive(resolved.key)).toBe(false);
    expect(resolver.resolveRef('#/$defs/Pet', origin).cycle).toBe(false);
  });

  it('should report dangling targets', () => {
    const { resolver } = resolverFor(petstore, people);
    expect(() => resolver.resolveRef('#/$defs/Nope', origin)).toThrow(DanglingReferenceError);
    expect(() => resolver.resolveRef('missing.json#/x', origin)).toThrow(
      'Unresolvable reference "missing.json#/x" at schemas/pets.json#/$defs/Pet',
    );
    expect(() => resolver.resolveRef('#nope', origin)).toThrow(DanglingReferenceError);
  });

  it('should refuse pointer dialects it cannot follow', () => {
    const { resolver } = resolverFor(petstore, people);
    expect(() => resolver.resolveRef('1/foo', origin)).toThrow(UnsupportedPointerDialectError);
    expect(() => resolver.resolveRef('ftp://example.com/a.json', origin)).toThrow(
      'unsupported URI scheme "ftp"',
    );
    expect(() => resolver.resolveRef('#not an anchor', origin)).toThrow(
      'fragment is neither a JSON pointer nor an anchor name',
    );
    expect(() => resolver.resolveRef('#/x', origin, [], '$recursiveRef')).toThrow(
      '$recursiveRef only supports "#"',
    );
  });

  it('should look up pointers directly', () => {
    const { resolver } = resolverFor(petstore, people);
    expect(resolver.resolvePointer('schemas/people.json', '#/$defs/Person').kind).toBe('object');
    expect(() => resolver.resolvePointer('schemas/people.json', '#/$defs/Nope')).toThrow(
      DanglingReferenceError,
    );
  });
});

describe('dynamic references', () => {
  const tree = {
    id: 'tree.json',
    root: {
      $id: 'https://example.com/tree',
      $dynamicAnchor: 'node',
      type: 'object',
      properties: { children: { type: 'array', items: { $dynamicRef: '#node' } } },
    },
  };
  const strictTree = {
    id: 'strict-tree.json',
    root: {
      $id: 'https://example.com/strict-tree',
      $dynamicAnchor: 'node',
      $ref: 'tree',
      required: ['children'],
    },
  };
  const itemsOrigin = { documentId: 'tree.json', path: '#/properties/children/items' };
  const frame = (resourceUri: string, documentId: string): ScopeFrame => ({
    resourceUri,
    documentId,
    pointer: '#',
  });

  it('should bind to the resource itself without an outer scope', () => {
    const { resolver } = resolverFor(tree, strictTree);
    const resolved = resolver.resolveRef(
      '#node',
      itemsOrigin,
      [frame('https://example.com/tree', 'tree.json')],
      '$dynamicRef',
    );
    expect(resolved.key).toBe('tree.json#');
    expect(resolved.dialect).toBe('dynamic');
  });

  it('should bind to the outermost scope that declares the anchor', () => {
    const { resolver } = resolverFor(tree, strictTree);
    const resolved = resolver.resolveRef(
      '#node',
      itemsOrigin,
      [
        frame('https://example.com/strict-tree', 'strict-tree.json'),
        frame('https://example.com/tree', 'tree.json'),
      ],
      '$dynamicRef',
    );
    expect(resolved.key).toBe('strict-tree.json#');
    expect(resolved.crossedDocument).toBe(true);
  });

  it('should cache dynamic resolutions per bound resource', () => {
    const { resolver } = resolverFor(tree, strictTree);
    const scope = [frame('https://example.com/tree', 'tree.json')];
    const outer = [frame('https://example.com/strict-tree', 'strict-tree.json'), ...scope];
    resolver.resolveRef('#node', itemsOrigin, scope, '$dynamicRef');
    resolver.resolveRef('#node', itemsOrigin, outer, '$dynamicRef');
    resolver.resolveRef('#node', itemsOrigin, outer, '$dynamicRef');
    expect(resolver.stats()).toEqual({ entries: 2, hits: 1 });
  });

  it('should follow $recursiveRef to the outermost recursive anchor', () => {
    const { resolver } = resolverFor(
      {
        id: 'base.json',
        root: { $recursiveAnchor: true, type: 'object', properties: { next: { $recursiveRef: '#' } } },
      },
      {
        id: 'ext.json',
        root: { $recursiveAnchor: true, $ref: 'base.json', properties: { extra: { type: 'string' } } },
      },
    );
    const resolved = resolver.resolveRef(
      '#',
      { documentId: 'base.json', path: '#/properties/next' },
      [frame('ext.json', 'ext.json'), frame('base.json', 'base.json')],
      '$recursiveRef',
    );
    expect(resolved.key).toBe('ext.json#');
    expect(resolved.dialect).toBe('dynamic');
  });
});
