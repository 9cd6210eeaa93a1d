/**
 * JSON Array Writer Tests
 * Verifies JSON array format output
 */

import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import {
  createJSONWriter,
  createModelGraphStream,
} from '../../../src/lib/emitter/json-writer.js';
import type { ModelRecord } from '../../../src/lib/emitter/types.js';
import { synthesizeModels } from '../../../src/lib/pass/index.js';

function record(name: string): ModelRecord {
  return {
    name,
    kind: 'object',
    bases: [],
    fields: [],
    closed: false,
    alsoKnownAs: [],
    forwardReferences: [],
    extensions: {},
    source: `d.json#/$defs/${name}`,
  };
}

async function collect(stream: Readable): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(String(chunk));
  }
  return chunks.join('');
}

describe('JSON Array Writer', () => {
  it('should write records as a JSON array', async () => {
    const records = [record('Alpha'), record('Beta')];
    const output = await collect(Readable.from(records).pipe(createJSONWriter()));

    expect(JSON.parse(output)).toEqual(records);
    expect(output).toBe(
      `[\n  ${JSON.stringify(records[0])},\n  ${JSON.stringify(records[1])}\n]\n`,
    );
  });

  it('should handle an empty stream', async () => {
    const output = await collect(Readable.from([]).pipe(createJSONWriter()));

    expect(output).toBe('[\n\n]\n');
  });

  it('should stream a plan in declaration order', async () => {
    const plan = synthesizeModels([
      {
        id: 'd.json',
        root: {
          $defs: {
            Person: {
              type: 'object',
              properties: { home: { $ref: '#/$defs/Address' } },
            },
            Address: { type: 'object', properties: { street: { type: 'string' } } },
          },
        },
      },
    ]);
    const output = await collect(createModelGraphStream(plan));
    const parsed: ModelRecord[] = JSON.parse(output);

    expect(parsed.map((item) => item.name)).toEqual(['Address', 'Person']);
  });
});
