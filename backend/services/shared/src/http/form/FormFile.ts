// backend/services/shared/src/http/form/FormFile.ts
/**
 * Purpose:
 * - Handle for one uploaded multipart file. Small files live in memory;
 *   files past the form's in-memory ceiling live in a temp file on disk.
 * - Field names follow the multer File shape (fieldname / originalname /
 *   mimetype) so handlers read the same properties either way.
 */

import fs from "node:fs";
import fsp from "node:fs/promises";
import { Readable } from "node:stream";

export type FormFileInit = {
  fieldname: string;
  originalname: string;
  encoding: string;
  mimetype: string;
  size: number;
  buffer?: Buffer;
  path?: string;
};

export class FormFile {
  public readonly fieldname: string;
  public readonly originalname: string;
  public readonly encoding: string;
  public readonly mimetype: string;
  public readonly size: number;
  /** Present when the content stayed in memory. */
  public readonly buffer?: Buffer;
  /** Present when the content was spilled to disk. */
  public readonly path?: string;

  constructor(init: FormFileInit) {
    this.fieldname = init.fieldname;
    this.originalname = init.originalname;
    this.encoding = init.encoding;
    this.mimetype = init.mimetype;
    this.size = init.size;
    this.buffer = init.buffer;
    this.path = init.path;
  }

  public get inMemory(): boolean {
    return this.path === undefined;
  }

  public open(): Readable {
    if (this.path !== undefined) return fs.createReadStream(this.path);
    return Readable.from(this.buffer && this.buffer.length > 0 ? [this.buffer] : [], {
      objectMode: false,
    });
  }

  public async read(): Promise<Buffer> {
    if (this.path !== undefined) return fsp.readFile(this.path);
    return this.buffer ?? Buffer.alloc(0);
  }

  /** Delete the spilled temp file, if any. Missing files are fine. */
  public async remove(): Promise<void> {
    if (this.path === undefined) return;
    await fsp.rm(this.path, { force: true });
  }
}
