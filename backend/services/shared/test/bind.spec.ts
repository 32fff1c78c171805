// backend/services/shared/test/bind.spec.ts
import { describe, it, expect } from "vitest";
import { field } from "@reqbind/shared/binding/dsl";
import { bind, defaultBinders, withMultipartMemory } from "@reqbind/shared/binding/bind";
import type { Binder, BinderKind } from "@reqbind/shared/binding/Binder";
import { FormBinder } from "@reqbind/shared/binding/binders/FormBinder";
import { JsonBinder } from "@reqbind/shared/binding/binders/JsonBinder";
import { QueryBinder } from "@reqbind/shared/binding/binders/QueryBinder";
import { BindError } from "@reqbind/shared/http/errors";
import { InboundRequest, type InboundRequestInit } from "@reqbind/shared/http/InboundRequest";

class Person {
  static readonly fields = {
    id: field.int({ path: "id" }),
    name: field.string(),
  };

  id = 0;
  name = "";
}

class Nothing {}

/** Records every call; optionally fails. */
class ProbeBinder implements Binder {
  public calls = 0;

  constructor(
    private readonly label: string,
    private readonly k: BinderKind,
    private readonly fail = false
  ) {}

  public name(): string {
    return this.label;
  }

  public kind(): BinderKind {
    return this.k;
  }

  public matches(): boolean {
    return true;
  }

  public async bind(): Promise<void> {
    this.calls++;
    if (this.fail) throw new BindError(this.label, `${this.label} failed`);
  }
}

function req(init: Partial<InboundRequestInit>): InboundRequest {
  return new InboundRequest({ url: "/", ...init });
}

describe("defaultBinders", () => {
  it("runs path, query, json, form in that order", () => {
    expect(defaultBinders().map((b) => b.name())).toEqual(["path", "query", "json", "form"]);
  });

  it("passes options through", () => {
    const [, , json, form] = defaultBinders({
      json: { disallowUnknownFields: false },
      multipartMemory: 1024,
    });
    expect(json instanceof JsonBinder && json.options).toEqual({
      disallowUnknownFields: false,
      disallowTrailingData: true,
    });
    expect(form instanceof FormBinder && form.maxMemory).toBe(1024);
  });
});

describe("withMultipartMemory", () => {
  it("replaces the form binder and keeps the input list intact", () => {
    const original = defaultBinders();
    const next = withMultipartMemory(original, 64);
    expect(next.map((b) => b.name())).toEqual(["path", "query", "json", "form"]);
    expect(next[3] instanceof FormBinder && next[3].maxMemory).toBe(64);
    expect(original[3] instanceof FormBinder && original[3].maxMemory).toBe(8 << 20);
    expect(next[0]).toBe(original[0]);
  });

  it("appends a form binder when the chain has none", () => {
    const next = withMultipartMemory([new QueryBinder()], 64);
    expect(next.map((b) => b.name())).toEqual(["query", "form"]);
  });
});

describe("bind", () => {
  it("lets the JSON body win over the query string", async () => {
    const rec = new Person();
    await bind(
      req({
        method: "POST",
        url: "/people?name=alice",
        headers: { "content-type": "application/json" },
        body: '{"name":"bob"}',
      }),
      rec
    );
    expect(rec.name).toBe("bob");
  });

  it("lets the query string win over the path", async () => {
    const rec = new Person();
    await bind(req({ url: "/people/7?id=8", pathParams: { id: "7" } }), rec);
    expect(rec.id).toBe(8);
  });

  it("keeps query values the body does not mention", async () => {
    const rec = new Person();
    await bind(
      req({
        method: "POST",
        url: "/people/5?name=alice",
        pathParams: { id: "5" },
        headers: { "content-type": "application/json" },
        body: "{}",
      }),
      rec
    );
    expect(rec).toMatchObject({ id: 5, name: "alice" });
  });

  it("runs at most one body binder", async () => {
    const first = new ProbeBinder("b1", "body");
    const second = new ProbeBinder("b2", "body");
    const meta = new ProbeBinder("m", "metadata");
    await bind(req({}), new Person(), [first, second, meta]);
    expect([first.calls, second.calls, meta.calls]).toEqual([1, 0, 1]);
  });

  it("stops at the first error and propagates it unchanged", async () => {
    const failing = new ProbeBinder("boom", "metadata", true);
    const after = new ProbeBinder("after", "metadata");
    await expect(bind(req({}), new Person(), [failing, after])).rejects.toThrow("boom failed");
    expect(after.calls).toBe(0);
  });

  it("skips binders that do not match", async () => {
    const rec = new Person();
    await bind(
      req({ method: "POST", headers: { "content-type": "text/plain" }, body: "name=zed" }),
      rec
    );
    expect(rec.name).toBe("");
  });

  it("binds an empty request onto a type without fields", async () => {
    const rec = new Nothing();
    await expect(bind(req({ url: "/?a=1" }), rec)).resolves.toBeUndefined();
  });
});
