/**
 * NDJSON Writer - Transform stream that converts records to NDJSON
 */

import { Transform, TransformCallback } from "stream";
import { DataRecord } from "../../types/data-model.js";

/**
 * Transform stream that converts object-mode records to NDJSON strings
 */
export class NDJSONWriter extends Transform {
  constructor() {
    super({
      writableObjectMode: true,
      readableObjectMode: false,
    });
  }

  _transform(chunk: DataRecord, _encoding: BufferEncoding, callback: TransformCallback): void {
    try {
      this.push(JSON.stringify(chunk) + "\n");
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }
}

/**
 * Create NDJSON writer transform stream
 */
export function createNDJSONWriter(): Transform {
  return new NDJSONWriter();
}
