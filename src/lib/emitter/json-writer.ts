/**
 * JSON array writer - Transform stream that converts model records to a JSON array
 */

import { Readable, Transform, type TransformCallback } from "stream";
import type { EmissionPlan } from "../../types/model.js";
import { renderModelRecords } from "./model-graph.js";
import type { ModelRecord } from "./types.js";

/**
 * Transform stream that converts objects to a JSON array
 * Writes [ at start, comma-separated JSON objects, and ] at end
 */
export class JSONWriter extends Transform {
  private isFirstItem = true;

  constructor() {
    super({
      objectMode: true,
      writableObjectMode: true, // Input is records
      readableObjectMode: false, // Output is strings
    });
  }

  _construct(callback: (error?: Error | null) => void): void {
    this.push("[\n");
    callback();
  }

  _transform(
    chunk: ModelRecord,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    try {
      const json = JSON.stringify(chunk);
      this.push(this.isFirstItem ? `  ${json}` : `,\n  ${json}`);
      this.isFirstItem = false;
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }

  _flush(callback: TransformCallback): void {
    this.push("\n]\n");
    callback();
  }
}

/**
 * Create a JSON array writer transform stream
 */
export function createJSONWriter(): Transform {
  return new JSONWriter();
}

/**
 * Stream the plan's models, in declaration order, as a JSON array
 */
export function createModelGraphStream(plan: EmissionPlan): Readable {
  return Readable.from(renderModelRecords(plan)).pipe(createJSONWriter());
}
