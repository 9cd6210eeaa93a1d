/**
 * Integration test: allOf composition as inheritance or flattening
 */

import { describe, it, expect } from 'vitest';
import { ModelGraphBackend } from '../../src/lib/emitter/model-graph.js';
import { ModelSynthesisPass, synthesizeModels } from '../../src/lib/pass/index.js';
import type { EngineConfig } from '../../src/types/config.js';
import type { JsonObject } from '../../src/types/json.js';
import type { ModelGraphDocument, ModelRecord } from '../../src/lib/emitter/types.js';
import { ErrorCode, PassFailedError } from '../../src/utils/errors.js';

const pet = {
  type: 'object',
  properties: { name: { type: 'string' } },
  required: ['name'],
};

function render(defs: JsonObject, config: Partial<EngineConfig> = {}): ModelGraphDocument {
  const plan = synthesizeModels([{ id: 'zoo.json', root: { $defs: defs } }], { config });
  return new ModelGraphBackend().render(plan);
}

function fieldsOf(model: ModelRecord | undefined): Array<[string, string, boolean]> {
  return (model?.fields ?? []).map((field) => [field.name, field.type, field.required]);
}

describe('allOf composition', () => {
  const dog: JsonObject = {
    allOf: [{ $ref: '#/$defs/Pet' }, { type: 'object', properties: { bark: { type: 'boolean' } } }],
  };

  it('should keep a referenced member as a base class', () => {
    const graph = render({ Pet: pet, Dog: dog });
    expect(graph.models.map((model) => [model.name, model.bases])).toEqual([
      ['Pet', []],
      ['Dog', ['Pet']],
    ]);
    expect(fieldsOf(graph.models[1])).toEqual([['bark', 'boolean', false]]);
  });

  it('should copy every member field under the flatten policy', () => {
    const graph = render({ Pet: pet, Dog: dog }, { allOfPolicy: 'flatten' });
    const flat = graph.models.find((model) => model.name === 'Dog');
    expect(flat?.bases).toEqual([]);
    expect(fieldsOf(flat)).toEqual([
      ['name', 'string', true],
      ['bark', 'boolean', false],
    ]);
  });

  it('should flatten when a member redefines a base field', () => {
    const graph = render({
      Pet: pet,
      Puppy: {
        allOf: [
          { $ref: '#/$defs/Pet' },
          { properties: { name: { type: 'string', maxLength: 10 }, age: { type: 'integer' } } },
        ],
      },
    });
    const puppy = graph.models.find((model) => model.name === 'Puppy');
    expect(puppy?.bases).toEqual([]);
    expect(fieldsOf(puppy)).toEqual([
      ['name', 'string', true],
      ['age', 'integer', false],
    ]);
  });

  it('should chain bases through several levels', () => {
    const graph = render({
      Animal: { type: 'object', properties: { legs: { type: 'integer' } } },
      Pet: { allOf: [{ $ref: '#/$defs/Animal' }, { properties: { name: { type: 'string' } } }] },
      Dog: { allOf: [{ $ref: '#/$defs/Pet' }, { properties: { bark: { type: 'boolean' } } }] },
    });
    expect(graph.models.map((model) => [model.name, model.bases])).toEqual([
      ['Animal', []],
      ['Pet', ['Animal']],
      ['Dog', ['Pet']],
    ]);
  });

  it('should fail the pass on an inheritance cycle', () => {
    const pass = new ModelSynthesisPass([
      {
        id: 'cycle.json',
        root: {
          $defs: {
            A: { allOf: [{ $ref: '#/$defs/B' }, { properties: { x: { type: 'string' } } }] },
            B: { allOf: [{ $ref: '#/$defs/A' }, { properties: { y: { type: 'string' } } }] },
          },
        },
      },
    ]);
    let failure: unknown;
    try {
      pass.run();
    } catch (error) {
      failure = error;
    }
    expect(failure).toBeInstanceOf(PassFailedError);
    expect(failure).toHaveProperty(
      'message',
      'Model synthesis failed with 1 fatal error(s): Cyclic inheritance: B -> A -> B',
    );
  });

  describe('unsupported member references', () => {
    const defs = { Pet: pet, Cat: { allOf: [{ $ref: '#/$defs/Pet' }, { $ref: '1/x' }] } };

    function run(config: Partial<EngineConfig> = {}): { graph: ModelGraphDocument; pass: ModelSynthesisPass } {
      const pass = new ModelSynthesisPass([{ id: 'zoo.json', root: { $defs: defs } }], { config });
      return { graph: new ModelGraphBackend().render(pass.run()), pass };
    }

    it('should keep the resolvable bases and warn once about the rest', () => {
      const { graph, pass } = run();
      expect(graph.models.map((model) => [model.name, model.bases])).toEqual([
        ['Pet', []],
        ['Cat', ['Pet']],
      ]);
      expect(pass.diagnostics.all().map((d) => [d.severity, d.code, d.path, d.message])).toEqual([
        [
          'warning',
          ErrorCode.UNSUPPORTED_POINTER_DIALECT,
          '#/$defs/Cat/allOf/1',
          'Unsupported reference "1/x" at zoo.json#/$defs/Cat/allOf/1: relative JSON pointers are not supported',
        ],
      ]);
    });

    it('should keep the resolvable member fields under the flatten policy', () => {
      const { graph, pass } = run({ allOfPolicy: 'flatten' });
      expect(fieldsOf(graph.models.find((model) => model.name === 'Cat'))).toEqual([['name', 'string', true]]);
      expect(pass.diagnostics.all().map((d) => [d.severity, d.code, d.path])).toEqual([
        ['warning', ErrorCode.UNSUPPORTED_POINTER_DIALECT, '#/$defs/Cat/allOf/1'],
      ]);
    });
  });
});
