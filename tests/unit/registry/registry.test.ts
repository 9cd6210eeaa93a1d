import { describe, it, expect } from 'vitest';
import { ModelRegistry, type RegistryConfig } from '../../../src/lib/registry/index.js';
import {
  containerOf,
  modelRef,
  scalarOf,
  type CanonicalType,
} from '../../../src/types/canonical-type.js';
import { DEFAULT_ENGINE_CONFIG } from '../../../src/types/config.js';
import type { FieldDefinition, ModelCandidate, NameHint } from '../../../src/types/model.js';
import { ErrorCode } from '../../../src/utils/errors.js';

function field(originalName: string, type: CanonicalType, required = false): FieldDefinition {
  return { name: originalName, originalName, type, required, metadata: {}, provenance: [] };
}

function candidate(nameHint: NameHint, overrides: Partial<ModelCandidate> = {}): ModelCandidate {
  return {
    kind: 'object',
    nameHint,
    fields: [],
    bases: [],
    closed: false,
    metadata: { extensions: {} },
    provenance: { documentId: 'd.json', path: `#/$defs/${nameHint.name ?? ''}`, fragments: [] },
    scope: 'd.json',
    ...overrides,
  };
}

function registry(config: Partial<RegistryConfig> = {}): ModelRegistry {
  return new ModelRegistry({ ...DEFAULT_ENGINE_CONFIG, ...config });
}

const street = [field('street', scalarOf('string'), true)];

describe('ModelRegistry', () => {
  describe('deduplication', () => {
    it('should collapse identical shapes and remember the other name', () => {
      const models = registry();
      const first = models.registerCandidate(
        candidate({ source: 'definition', name: 'Address' }, { fields: street }),
      );
      const second = models.registerCandidate(
        candidate({ source: 'definition', name: 'Location' }, { fields: street }),
      );
      expect(first).toBe('m1');
      expect(second).toBe('m1');
      expect(models.size()).toBe(1);
      expect(models.get('m1')?.alsoKnownAs).toEqual(['Location']);
    });

    it('should keep identical shapes apart when deduplication is off', () => {
      const models = registry({ deduplicate: false });
      models.registerCandidate(candidate({ source: 'definition', name: 'Address' }, { fields: street }));
      const second = models.registerCandidate(
        candidate({ source: 'definition', name: 'Location' }, { fields: street }),
      );
      expect(second).toBe('m2');
      expect(models.size()).toBe(2);
    });

    it('should treat distinct required flags as different shapes', () => {
      const models = registry();
      models.registerCandidate(candidate({ source: 'definition', name: 'A' }, { fields: street }));
      const optional = models.registerCandidate(
        candidate({ source: 'definition', name: 'B' }, { fields: [field('street', scalarOf('string'))] }),
      );
      expect(optional).toBe('m2');
    });

    it('should collapse identical self-recursive models', () => {
      const models = registry();
      const first = models.reserve({ source: 'definition', name: 'NodeA' });
      models.registerCandidate(
        candidate({ source: 'definition', name: 'NodeA' }, { fields: [field('next', modelRef(first))] }),
        first,
      );
      const second = models.reserve({ source: 'definition', name: 'NodeB' });
      const registered = models.registerCandidate(
        candidate({ source: 'definition', name: 'NodeB' }, { fields: [field('next', modelRef(second))] }),
        second,
      );
      expect(registered).toBe('m1');
      expect(models.canonical('m2')).toBe('m1');
      expect(models.get('m1')?.alsoKnownAs).toEqual(['NodeB']);

      const plan = models.finalize();
      expect(plan.order).toEqual(['m1']);
      expect(plan.models.get('m1')?.fields[0]?.type).toEqual(modelRef('m1'));
    });

    it('should take the stronger name hint of a duplicate', () => {
      const models = registry();
      models.registerCandidate(candidate({ source: 'property', name: 'home' }, { fields: street }));
      models.registerCandidate(candidate({ source: 'title', name: 'Postal Address' }, { fields: street }));
      models.finalize();
      expect(models.get('m1')?.name).toBe('PostalAddress');
    });
  });

  describe('reservations', () => {
    it('should give the reserved hint to a nameless candidate', () => {
      const models = registry();
      const id = models.reserve({ source: 'definition', name: 'Tree' });
      models.registerCandidate(candidate({ source: 'synthetic' }), id);
      models.finalize();
      expect(models.get(id)?.name).toBe('Tree');
    });

    it('should reject a second definition for the same id', () => {
      const models = registry();
      const id = models.reserve({ source: 'definition', name: 'Tree' });
      models.registerCandidate(candidate({ source: 'definition', name: 'Tree' }), id);
      expect(() =>
        models.registerCandidate(candidate({ source: 'definition', name: 'Other' }), id),
      ).toThrow('Model m1 is already defined');
    });

    it('should follow aliases to the canonical id', () => {
      const models = registry();
      const target = models.registerCandidate(candidate({ source: 'definition', name: 'Pet' }));
      const reserved = models.reserve({ source: 'definition', name: 'Animal' });
      models.alias(reserved, target);
      expect(models.canonical(reserved)).toBe(target);
      expect(models.isDefined(reserved)).toBe(true);
    });
  });

  describe('naming', () => {
    it('should let a title win over a definition name', () => {
      const models = registry();
      models.registerCandidate(
        candidate({ source: 'definition', name: 'Pet' }, { fields: [field('a', scalarOf('string'))] }),
      );
      models.registerCandidate(
        candidate({ source: 'title', name: 'Pet' }, { fields: [field('b', scalarOf('string'))] }),
      );
      models.finalize();
      expect(models.get('m1')?.name).toBe('Pet1');
      expect(models.get('m2')?.name).toBe('Pet');
    });

    it('should let equal names live in different documents under document scope', () => {
      const models = registry({ nameScope: 'document' });
      models.registerCandidate(
        candidate({ source: 'definition', name: 'Pet' }, { scope: 'schemas/a.json', fields: street }),
      );
      models.registerCandidate(
        candidate({ source: 'definition', name: 'Pet' }, { scope: 'schemas/b.json', fields: [] }),
      );
      models.finalize();
      expect([models.get('m1')?.name, models.get('m2')?.name]).toEqual(['Pet', 'Pet']);
    });

    it('should suffix reserved and unnamed models', () => {
      const models = registry({ reservedNames: ['Object'] });
      models.registerCandidate(candidate({ source: 'definition', name: 'object' }));
      models.registerCandidate(candidate({ source: 'synthetic' }, { fields: street }));
      models.finalize();
      expect(models.get('m1')?.name).toBe('Object1');
      expect(models.get('m2')?.name).toBe('Model_1');
    });

    it('should style field names and keep them unique', () => {
      const models = registry({ fieldNameStyle: 'snake', reservedFieldNames: ['class'] });
      models.registerCandidate(
        candidate(
          { source: 'definition', name: 'User' },
          {
            fields: [
              field('userId', scalarOf('string')),
              field('user_id', scalarOf('string')),
              field('class', scalarOf('string')),
            ],
          },
        ),
      );
      models.finalize();
      expect(models.get('m1')?.fields.map((f) => f.name)).toEqual(['user_id', 'user_id_1', 'class_']);
      expect(models.get('m1')?.fields.map((f) => f.originalName)).toEqual(['userId', 'user_id', 'class']);
    });
  });

  describe('validation', () => {
    it('should report references to models that were never defined', () => {
      const models = registry();
      models.registerCandidate(
        candidate({ source: 'definition', name: 'Holder' }, { fields: [field('item', modelRef('m9'))] }),
      );
      const { errors } = models.finalize();
      expect(errors.map((error) => [error.code, error.message])).toEqual([
        [ErrorCode.DANGLING_MODEL_REFERENCE, 'Model m9 is referenced by Holder but was never defined'],
      ]);
    });

    it('should report an inheritance cycle once', () => {
      const models = registry();
      const a = models.reserve({ source: 'definition', name: 'A' });
      const b = models.registerCandidate(
        candidate({ source: 'definition', name: 'B' }, { bases: [a], fields: [field('y', scalarOf('string'))] }),
      );
      models.registerCandidate(
        candidate({ source: 'definition', name: 'A' }, { bases: [b], fields: [field('x', scalarOf('string'))] }),
        a,
      );
      const { errors } = models.finalize();
      expect(errors.map((error) => error.message)).toEqual(['Cyclic inheritance: B -> A -> B']);
    });
  });

  describe('finalize', () => {
    it('should order dependencies first and note forward references', () => {
      const models = registry();
      const person = models.reserve({ source: 'definition', name: 'Person' });
      const address = models.registerCandidate(
        candidate({ source: 'definition', name: 'Address' }, { fields: street }),
      );
      models.registerCandidate(
        candidate(
          { source: 'definition', name: 'Person' },
          { fields: [field('home', modelRef(address)), field('friends', containerOf('list', [modelRef(person)]))] },
        ),
        person,
      );
      const plan = models.finalize();
      expect(plan.order).toEqual([address, person]);
      expect(plan.graph.edges).toEqual([{ from: person, to: address, kind: 'field' }]);
      expect(plan.forwardReferences.size).toBe(0);
    });

    it('should emit a base before its subclass inside a cycle', () => {
      const models = registry();
      const dog = models.reserve({ source: 'definition', name: 'Dog' });
      const pet = models.registerCandidate(
        candidate({ source: 'definition', name: 'Pet' }, { fields: [field('favorite', modelRef(dog))] }),
      );
      models.registerCandidate(
        candidate({ source: 'definition', name: 'Dog' }, { bases: [pet], fields: street }),
        dog,
      );
      const plan = models.finalize();
      expect(plan.order).toEqual([pet, dog]);
      expect(plan.forwardReferences.get(pet)).toEqual([dog]);
    });

    it('should list base fields first', () => {
      const models = registry();
      const pet = models.registerCandidate(
        candidate({ source: 'definition', name: 'Pet' }, { fields: [field('name', scalarOf('string'))] }),
      );
      const dog = models.registerCandidate(
        candidate({ source: 'definition', name: 'Dog' }, { bases: [pet], fields: [field('bark', scalarOf('boolean'))] }),
      );
      expect(models.allFields(dog).map((f) => f.originalName)).toEqual(['name', 'bark']);
    });

    it('should freeze models and refuse new registrations', () => {
      const models = registry();
      const id = models.registerCandidate(candidate({ source: 'definition', name: 'Pet' }));
      const plan = models.finalize();
      expect(models.finalize()).toBe(plan);
      expect(Object.isFrozen(plan.models.get(id))).toBe(true);
      expect(() => models.registerCandidate(candidate({ source: 'definition', name: 'Late' }))).toThrow(
        'Model registry is finalized',
      );
    });
  });
});
