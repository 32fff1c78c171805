// backend/services/shared/test/descriptor.spec.ts
import { describe, it, expect } from "vitest";
import { field } from "@reqbind/shared/binding/dsl";
import {
  buildDescriptor,
  declaredKey,
  EMPTY_DESCRIPTOR,
  tagKey,
} from "@reqbind/shared/binding/descriptor";
import {
  DescriptorCache,
  descriptorOf,
  getDescriptor,
} from "@reqbind/shared/binding/DescriptorCache";

class Sample {
  static readonly fields = {
    id: field.int({ path: "id" }),
    name: field.string({ form: "name,omitempty", json: "full_name" }),
    secret: field.string({ form: "-" }),
    silent: field.string({ json: "-" }),
    token: field.string({ form: "token", json: "-" }),
    tags: field.list("string", { form: "tag" }),
    upload: field.file(),
    docs: field.files({ form: "doc" }),
    cid: field.string({ form: "client_id" }),
    cidAgain: field.string({ form: "client_id" }),
    csec: field.string({ form: "client_secret" }),
    bogus: { kind: "nope" },
    notAField: 42,
  };
}

describe("tag keys", () => {
  it("takes the segment before the first comma", () => {
    expect(tagKey("name,omitempty")).toBe("name");
    expect(tagKey("-")).toBe("-");
    expect(tagKey(undefined)).toBeUndefined();
  });

  it("resolves form → json → property name", () => {
    expect(declaredKey("p", { kind: "string", form: "f", json: "j" })).toBe("f");
    expect(declaredKey("p", { kind: "string", json: "j,omitempty" })).toBe("j");
    expect(declaredKey("p", { kind: "string" })).toBe("p");
    expect(declaredKey("p", { kind: "string", form: "-", json: "j" })).toBe("-");
  });
});

describe("buildDescriptor", () => {
  const d = buildDescriptor(Sample);

  it("skips ignored and malformed fields", () => {
    expect(d.fields.map((f) => f.fieldRef)).toEqual([
      "id",
      "name",
      "token",
      "tags",
      "upload",
      "docs",
      "cid",
      "cidAgain",
      "csec",
    ]);
  });

  it("collects de-duplicated declared keys in declaration order", () => {
    expect(d.allKeys).toEqual([
      "id",
      "name",
      "token",
      "tag",
      "upload",
      "doc",
      "client_id",
      "client_secret",
    ]);
  });

  it("records path fields with source and destination keys", () => {
    expect(d.pathFields).toEqual([{ fieldRef: "id", sourceKey: "id", destKey: "id" }]);
  });

  it("records file fields with their multiplicity", () => {
    expect(d.fileFields).toEqual([
      { fieldRef: "upload", formKey: "upload", multiplicity: "single" },
      { fieldRef: "docs", formKey: "doc", multiplicity: "many" },
    ]);
  });

  it("uses the first string field per credential key", () => {
    expect(d.credentialFields).toEqual({ clientIdField: "cid", clientSecretField: "csec" });
  });

  it("maps JSON keys, leaving out json:'-' and file fields", () => {
    expect([...d.byJsonKey.keys()]).toEqual([
      "id",
      "full_name",
      "tags",
      "cid",
      "cidAgain",
      "csec",
    ]);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(d)).toBe(true);
    expect(Object.isFrozen(d.fields)).toBe(true);
    expect(Object.isFrozen(d.pathFields[0])).toBe(true);
  });

  it("returns the empty descriptor for non-class input or a class without fields", () => {
    expect(buildDescriptor(undefined)).toBe(EMPTY_DESCRIPTOR);
    expect(buildDescriptor({ fields: {} })).toBe(EMPTY_DESCRIPTOR);
    class Bare {}
    expect(buildDescriptor(Bare)).toBe(EMPTY_DESCRIPTOR);
  });
});

describe("DescriptorCache", () => {
  it("builds once per type and returns the stored descriptor afterwards", () => {
    let builds = 0;
    const cache = new DescriptorCache((t) => {
      builds++;
      return buildDescriptor(t);
    });

    const a = cache.get(Sample);
    const b = cache.get(Sample);
    expect(a).toBe(b);
    expect(builds).toBe(1);
    expect(cache.size).toBe(1);
  });

  it("keeps the first stored descriptor on loadOrStore", () => {
    const cache = new DescriptorCache();
    const first = cache.get(Sample);
    const other = buildDescriptor(Sample);
    expect(cache.loadOrStore(Sample, other)).toBe(first);
  });

  it("never stores non-class keys", () => {
    const cache = new DescriptorCache();
    expect(cache.get("Sample")).toBe(EMPTY_DESCRIPTOR);
    expect(cache.get(null)).toBe(EMPTY_DESCRIPTOR);
    expect(cache.size).toBe(0);
  });

  it("gives concurrent first uses equal descriptors", async () => {
    class Fresh {
      static readonly fields = { q: field.string(), page: field.int() };
      q = "";
      page = 0;
    }

    const results = await Promise.all(
      Array.from({ length: 32 }, () => Promise.resolve().then(() => getDescriptor(Fresh)))
    );
    for (const r of results) {
      expect(r).toEqual(results[0]);
      expect(r.allKeys).toEqual(["q", "page"]);
    }
  });

  it("looks up a record instance by its constructor", () => {
    class Rec {
      static readonly fields = { q: field.string() };
      q = "";
    }
    expect(descriptorOf(new Rec())).toBe(getDescriptor(Rec));
  });
});
