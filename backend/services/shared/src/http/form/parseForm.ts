// backend/services/shared/src/http/form/parseForm.ts
/**
 * Purpose:
 * - Parse an application/x-www-form-urlencoded or multipart/form-data body
 *   with busboy into a ParsedForm.
 * - Uploaded files are held in memory while the running total stays within
 *   `maxMemory`; a file that would cross it is written to a temp file instead.
 *
 * Invariants:
 * - Resolves only after the whole body has been consumed and every spilled
 *   file is flushed; rejects on the first error (source, parser or disk).
 * - On rejection every temp file already written is removed.
 * - A single non-file value, and any field name, may not exceed MAX_VALUE_BYTES.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { randomUUID } from "node:crypto";
import type { Readable } from "node:stream";
import busboy from "busboy";
import { FormFile } from "./FormFile";
import { ParsedForm } from "./ParsedForm";

export const DEFAULT_MULTIPART_MEMORY = 8 << 20;
export const MAX_VALUE_BYTES = 1 << 20;

export type ParseFormOptions = {
  contentType: string;
  /** In-memory ceiling for uploaded file bytes. */
  maxMemory?: number;
  tmpDir?: string;
};

type MemoryBudget = { used: number; readonly max: number };

type FileInfo = { filename: string; encoding: string; mimeType: string };

function collectFile(
  name: string,
  stream: Readable,
  info: FileInfo,
  budget: MemoryBudget,
  tmpDir: string
): Promise<FormFile> {
  return new Promise<FormFile>((resolve, reject) => {
    let chunks: Buffer[] = [];
    let held = 0;
    let size = 0;
    let spill: fs.WriteStream | null = null;
    let spillTo: string | undefined;
    let failed = false;

    const meta = {
      fieldname: name,
      originalname: info.filename,
      encoding: info.encoding,
      mimetype: info.mimeType,
    };

    const abort = (err: unknown): void => {
      if (failed) return;
      failed = true;
      budget.used -= held;
      stream.resume();
      const partial = spillTo;
      if (spill) spill.destroy();
      if (partial === undefined) {
        reject(err);
        return;
      }
      // the original error is what callers need; removal is best effort
      fs.rm(partial, { force: true }, () => reject(err));
    };

    const openSpill = (): fs.WriteStream => {
      spillTo = path.join(tmpDir, `upload-${randomUUID()}`);
      const out = fs.createWriteStream(spillTo);
      out.on("error", abort);
      for (const c of chunks) out.write(c);
      budget.used -= held;
      held = 0;
      chunks = [];
      return out;
    };

    stream.on("data", (chunk: Buffer) => {
      if (failed) return;
      size += chunk.length;
      if (spill === null && budget.used + chunk.length <= budget.max) {
        chunks.push(chunk);
        held += chunk.length;
        budget.used += chunk.length;
        return;
      }
      if (spill === null) spill = openSpill();
      const out = spill;
      if (!out.write(chunk)) {
        stream.pause();
        out.once("drain", () => stream.resume());
      }
    });

    stream.on("error", abort);

    stream.on("end", () => {
      if (failed) return;
      if (spill === null) {
        resolve(new FormFile({ ...meta, size, buffer: Buffer.concat(chunks, held) }));
        return;
      }
      const filePath = spillTo;
      spill.end(() => resolve(new FormFile({ ...meta, size, path: filePath })));
    });
  });
}

async function removeCollected(pending: ReadonlyArray<Promise<FormFile>>): Promise<void> {
  const done = await Promise.allSettled(pending);
  await Promise.allSettled(
    done.map((r) => (r.status === "fulfilled" ? r.value.remove() : Promise.resolve()))
  );
}

export function parseForm(source: Readable, opts: ParseFormOptions): Promise<ParsedForm> {
  const maxMemory = opts.maxMemory ?? DEFAULT_MULTIPART_MEMORY;
  const tmpDir = opts.tmpDir ?? os.tmpdir();
  const form = new ParsedForm();
  const budget: MemoryBudget = { used: 0, max: maxMemory };

  return new Promise<ParsedForm>((resolve, reject) => {
    let bb: busboy.Busboy;
    try {
      bb = busboy({
        headers: { "content-type": opts.contentType },
        limits: { fieldSize: MAX_VALUE_BYTES, fieldNameSize: MAX_VALUE_BYTES },
        defParamCharset: "utf8",
      });
    } catch (err) {
      reject(err);
      return;
    }

    let settled = false;
    const pending: Array<Promise<FormFile>> = [];

    const fail = (err: unknown): void => {
      if (settled) return;
      settled = true;
      source.unpipe(bb);
      source.resume();
      bb.destroy();
      removeCollected(pending).then(
        () => reject(err),
        () => reject(err)
      );
    };

    bb.on("field", (name, value, info) => {
      if (info.nameTruncated) {
        fail(new Error(`form field name exceeds ${MAX_VALUE_BYTES} bytes`));
        return;
      }
      if (info.valueTruncated) {
        fail(new Error(`form value "${name}" exceeds ${MAX_VALUE_BYTES} bytes`));
        return;
      }
      form.addValue(name, value);
    });

    bb.on("file", (name, stream, info) => {
      if (settled) {
        stream.resume();
        return;
      }
      const p = collectFile(name, stream, info, budget, tmpDir);
      p.catch(fail);
      pending.push(p);
    });

    bb.on("error", fail);

    bb.on("close", () => {
      Promise.all(pending).then((files) => {
        if (settled) return;
        settled = true;
        for (const f of files) form.addFile(f);
        resolve(form);
      }, fail);
    });

    source.on("error", fail);
    source.pipe(bb);
  });
}
