/**
 * Integration test: references across documents, fetched on demand
 */

import { describe, it, expect, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { ModelGraphBackend } from '../../src/lib/emitter/model-graph.js';
import { createFileFetcher, readSchemaDocument } from '../../src/lib/loader/index.js';
import { ModelSynthesisPass, synthesizeModels } from '../../src/lib/pass/index.js';
import type { DocumentFetcher, SchemaDocumentInput } from '../../src/types/schema-node.js';
import { ErrorCode, FileIOError, PassFailedError } from '../../src/utils/errors.js';

const PETSTORE = fileURLToPath(new URL('../fixtures/petstore/api.yaml', import.meta.url));
const OWNER = fileURLToPath(new URL('../fixtures/petstore/owner.yaml', import.meta.url));

function person(ref: string): SchemaDocumentInput {
  return {
    id: 'schemas/person.json',
    root: {
      $defs: {
        Person: {
          type: 'object',
          properties: { name: { type: 'string' }, address: { $ref: ref } },
        },
      },
    },
  };
}

describe('Cross-document references', () => {
  it('should fetch a sibling document once', () => {
    const fetch = vi.fn<DocumentFetcher>((documentId) =>
      documentId === 'schemas/address.json'
        ? { $defs: { Address: { type: 'object', properties: { street: { type: 'string' } } } } }
        : undefined,
    );
    const plan = synthesizeModels([person('address.json#/$defs/Address')], { fetch });
    const graph = new ModelGraphBackend().render(plan);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith('schemas/address.json');
    expect(graph.models.map((model) => [model.name, model.source])).toEqual([
      ['Address', 'schemas/address.json#/$defs/Address'],
      ['Person', 'schemas/person.json#/$defs/Person'],
    ]);
    expect(graph.models[1]?.fields.map((field) => field.type)).toEqual(['string', 'Address']);
  });

  it('should fail the pass when a document cannot be found', () => {
    const pass = new ModelSynthesisPass([person('missing.json#/$defs/X')], { fetch: () => undefined });
    let failure: unknown;
    try {
      pass.run();
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(PassFailedError);
    expect(pass.diagnostics.bySeverity('fatal')).toEqual([
      {
        severity: 'fatal',
        code: ErrorCode.DANGLING_REFERENCE,
        message:
          'Unresolvable reference "missing.json#/$defs/X" at schemas/person.json#/$defs/Person/properties/address',
        documentId: 'schemas/person.json',
        path: '#/$defs/Person/properties/address',
        details: {
          ref: 'missing.json#/$defs/X',
          documentId: 'schemas/person.json',
          path: '#/$defs/Person/properties/address',
        },
      },
    ]);
  });

  it('should load YAML documents and their siblings from disk', () => {
    const plan = synthesizeModels([readSchemaDocument(PETSTORE)], { fetch: createFileFetcher() });
    const graph = new ModelGraphBackend().render(plan);

    expect(graph.models.map((model) => model.name)).toEqual(['Owner', 'Status', 'Pet']);
    expect(graph.models[0]?.source).toBe(`${OWNER}#/$defs/Owner`);
    expect(graph.models[0]?.fields.map((field) => field.type)).toEqual(['email']);
    expect(graph.models[1]?.members?.map((member) => member.name)).toEqual(['AVAILABLE', 'SOLD']);
    expect(graph.models[2]?.fields.map((field) => [field.name, field.type, field.required])).toEqual([
      ['id', 'int64', true],
      ['name', 'string', true],
      ['owner', 'Owner', false],
      ['status', 'Status', false],
    ]);
    expect(graph.roots).toEqual({});
  });

  it('should degrade a reference to an unreadable document and keep going', () => {
    const pass = new ModelSynthesisPass([person('address.json#/$defs/Address')], {
      fetch: (documentId) => {
        throw new FileIOError(`Failed to read schema document: ${documentId}`, { filePath: documentId });
      },
    });
    const graph = new ModelGraphBackend().render(pass.run());

    expect(graph.models[0]?.fields.map((field) => [field.name, field.type])).toEqual([
      ['name', 'string'],
      ['address', 'unknown'],
    ]);
    expect(pass.diagnostics.all()).toEqual([
      {
        severity: 'error',
        code: ErrorCode.FILE_IO_ERROR,
        message:
          'Failed to load "address.json#/$defs/Address" at schemas/person.json#/$defs/Person/properties/address: Failed to read schema document: schemas/address.json',
        documentId: 'schemas/person.json',
        path: '#/$defs/Person/properties/address',
        details: {
          filePath: 'schemas/address.json',
          ref: 'address.json#/$defs/Address',
          documentId: 'schemas/person.json',
          path: '#/$defs/Person/properties/address',
        },
      },
    ]);
  });

  it('should report a sibling path that is a directory without failing the pass', () => {
    const dir = mkdtempSync(join(tmpdir(), 'modelsmith-siblings-'));
    try {
      const file = join(dir, 'person.json');
      writeFileSync(file, JSON.stringify(person('addr.json#/$defs/Address').root));
      mkdirSync(join(dir, 'addr.json'));

      const pass = new ModelSynthesisPass([readSchemaDocument(file)], { fetch: createFileFetcher() });
      const graph = new ModelGraphBackend().render(pass.run());

      expect(graph.models[0]?.fields.map((field) => field.type)).toEqual(['string', 'unknown']);
      expect(pass.diagnostics.all().map((d) => [d.severity, d.code, d.path])).toEqual([
        ['error', ErrorCode.FILE_IO_ERROR, '#/$defs/Person/properties/address'],
      ]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
