// backend/services/shared/src/http/bodyLimit.ts
/**
 * Purpose:
 * - Byte ceiling on a request body stream. Reading past `maxBytes` fails the
 *   returned stream with BodyTooLargeError (never an opaque I/O error).
 *
 * Notes:
 * - Once the ceiling trips, the source is unpiped and drained without
 *   buffering, so the connection stays usable for the 413 response.
 * - Source errors are forwarded to the returned stream.
 */

import { Transform, type Readable, type TransformCallback } from "node:stream";
import { BodyTooLargeError } from "./errors";

class ByteCeiling extends Transform {
  private seen = 0;

  constructor(private readonly maxBytes: number) {
    super();
  }

  public override _transform(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    this.seen += chunk.length;
    if (this.seen > this.maxBytes) {
      callback(new BodyTooLargeError(this.maxBytes));
      return;
    }
    callback(null, chunk);
  }
}

export function limitBody(source: Readable, maxBytes: number): Readable {
  const limited = new ByteCeiling(maxBytes);

  source.on("error", (err) => limited.destroy(err));
  limited.on("error", () => {
    source.unpipe(limited);
    source.resume();
  });

  return source.pipe(limited);
}
