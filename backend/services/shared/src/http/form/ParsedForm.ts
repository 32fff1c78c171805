// backend/services/shared/src/http/form/ParsedForm.ts
/**
 * Purpose:
 * - Result of parsing a URL-encoded or multipart body: ordinary values by key
 *   (submission order) and uploaded files by key (submission order).
 */

import type { FormFile } from "./FormFile";

export class ParsedForm {
  public readonly values = new Map<string, string[]>();
  public readonly files = new Map<string, FormFile[]>();

  public addValue(key: string, value: string): void {
    const list = this.values.get(key);
    if (list) list.push(value);
    else this.values.set(key, [value]);
  }

  public addFile(file: FormFile): void {
    const list = this.files.get(file.fieldname);
    if (list) list.push(file);
    else this.files.set(file.fieldname, [file]);
  }

  public fileCount(): number {
    let n = 0;
    for (const list of this.files.values()) n += list.length;
    return n;
  }

  /** Remove every spilled temp file. Resolves once all removals settle. */
  public async removeAll(): Promise<void> {
    const all = [...this.files.values()].flat();
    const results = await Promise.allSettled(all.map((f) => f.remove()));
    const failed = results.find(
      (r): r is PromiseRejectedResult => r.status === "rejected"
    );
    if (failed) throw failed.reason;
  }
}
