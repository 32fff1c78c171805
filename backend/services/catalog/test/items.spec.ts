// backend/services/catalog/test/items.spec.ts
import { createHash } from "node:crypto";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { buildTestApp } from "./helpers/testApp";

const LAMP = {
  id: 1,
  sku: "LAMP-01",
  name: "Desk lamp",
  price: 24.5,
  tags: ["home", "lighting"],
  in_stock: true,
  attachment_count: 0,
};

const MUG = {
  id: 2,
  sku: "MUG-02",
  name: "Enamel mug",
  price: 9,
  tags: ["kitchen"],
  in_stock: true,
  attachment_count: 0,
};

const TENT = {
  id: 3,
  sku: "TENT-03",
  name: "Two-person tent",
  price: 129.99,
  tags: ["outdoor"],
  in_stock: false,
  attributes: { weight_kg: 2.1 },
  attachment_count: 0,
};

const sha256 = (s: string) => createHash("sha256").update(s).digest("hex");

describe("service stack", () => {
  it("answers /health with the request id", async () => {
    const { app } = buildTestApp();
    const res = await request(app).get("/health").set("X-Request-Id", "req-1");
    expect(res.status).toBe(200);
    expect(res.headers["x-request-id"]).toBe("req-1");
    expect(res.body).toEqual({ service: "catalog", ok: true, requestId: "req-1" });
  });

  it("answers unknown routes with a problem document", async () => {
    const { app } = buildTestApp();
    const res = await request(app).get("/nope").set("X-Request-Id", "req-2");
    expect(res.status).toBe(404);
    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toEqual({
      service: "catalog",
      type: "about:blank",
      title: "Not Found",
      status: 404,
      code: "NOT_FOUND",
      detail: "Route not found",
      requestId: "req-2",
    });
  });
});

describe("GET /items", () => {
  it("lists every item in an envelope with the trace id", async () => {
    const { app } = buildTestApp();
    const res = await request(app).get("/items").set("X-Trace-ID", "trace-abc");
    expect(res.status).toBe(200);
    expect(res.headers["x-trace-id"]).toBe("trace-abc");
    expect(res.headers["no-vary-search"]).toBe(
      'params, except=("q" "tag" "in_stock" "page" "limit")'
    );
    expect(res.body).toEqual({
      code: "OK",
      message: "success",
      data: { items: [LAMP, MUG, TENT], total: 3, page: 1, limit: 20 },
      trace_id: "trace-abc",
    });
  });

  it("falls back to the request id for the trace id", async () => {
    const { app } = buildTestApp();
    const res = await request(app).get("/items").set("X-Request-Id", "req-9");
    expect(res.body.trace_id).toBe("req-9");
    expect(res.headers["x-trace-id"]).toBe("req-9");
  });

  it("filters by name, tags and stock", async () => {
    const { app } = buildTestApp();

    const byName = await request(app).get("/items?q=LAMP");
    expect(byName.body.data.items).toEqual([LAMP]);

    const byTags = await request(app).get("/items?tag=kitchen&tag=outdoor");
    expect(byTags.body.data.items.map((i: { id: number }) => i.id)).toEqual([2, 3]);

    const inStock = await request(app).get("/items?in_stock=true");
    expect(inStock.body.data.total).toBe(2);
  });

  it("paginates", async () => {
    const { app } = buildTestApp();
    const res = await request(app).get("/items?page=2&limit=2");
    expect(res.body.data).toEqual({ items: [TENT], total: 3, page: 2, limit: 2 });
  });

  it("ignores query keys the record does not bind", async () => {
    const { app } = buildTestApp();
    const res = await request(app).get("/items?debugToken=x&utm_source=mail");
    expect(res.status).toBe(200);
    expect(res.body.data.total).toBe(3);
  });

  it("rejects unconvertible values with 400", async () => {
    const { app } = buildTestApp();
    const res = await request(app).get("/items?page=abc").set("X-Trace-ID", "t-1");
    expect(res.status).toBe(400);
    expect(res.headers["no-vary-search"]).toBeUndefined();
    expect(res.body).toEqual({
      code: "BAD_REQUEST",
      message: 'error converting value for "page"',
      trace_id: "t-1",
    });
  });

  it("rejects values the schema refuses", async () => {
    const { app } = buildTestApp();
    const res = await request(app).get("/items?limit=500").set("X-Trace-ID", "t-2");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      code: "VALIDATION_FAILED",
      message: "limit: Number must be less than or equal to 100",
      trace_id: "t-2",
    });
  });

  it("leaves No-Vary-Search off when configured", async () => {
    const { app } = buildTestApp({ noVarySearch: false });
    const res = await request(app).get("/items");
    expect(res.headers["no-vary-search"]).toBeUndefined();
  });
});

describe("GET /items/:id", () => {
  it("returns one item", async () => {
    const { app } = buildTestApp();
    const res = await request(app).get("/items/3");
    expect(res.status).toBe(200);
    expect(res.body.data).toEqual(TENT);
    expect(res.headers["no-vary-search"]).toBe('params, except=("id" "expand")');
  });

  it("answers 404 for a missing item", async () => {
    const { app } = buildTestApp();
    const res = await request(app).get("/items/99").set("X-Trace-ID", "t-3");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ code: "NOT_FOUND", message: "item 99 not found", trace_id: "t-3" });
  });

  it("answers 400 for a non-numeric id", async () => {
    const { app } = buildTestApp();
    const res = await request(app).get("/items/abc");
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('error converting value for "id"');
  });
});

describe("POST /items", () => {
  const lantern = {
    sku: "LANTERN-04",
    name: "Camp lantern",
    price: 35,
    tags: ["outdoor", "lighting"],
    in_stock: true,
    attributes: { lumens: 300 },
  };

  it("creates an item from a JSON body", async () => {
    const { app, repo } = buildTestApp();
    const res = await request(app).post("/items").send(lantern);
    expect(res.status).toBe(201);
    expect(res.body.data).toEqual({ id: 4, ...lantern, attachment_count: 0 });
    expect(repo.findBySku("LANTERN-04")?.inStock).toBe(true);
  });

  it("lets body values win over query values", async () => {
    const { app } = buildTestApp();
    const res = await request(app).post("/items?name=from-query").send(lantern);
    expect(res.body.data.name).toBe("Camp lantern");
  });

  it("rejects unknown JSON keys", async () => {
    const { app } = buildTestApp();
    const res = await request(app).post("/items").send({ ...lantern, color: "red" });
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('bind json error: unknown field "color"');
  });

  it("accepts unknown JSON keys when not strict", async () => {
    const { app } = buildTestApp({
      json: { disallowUnknownFields: false, disallowTrailingData: true },
    });
    const res = await request(app).post("/items").send({ ...lantern, color: "red" });
    expect(res.status).toBe(201);
  });

  it("rejects trailing data after the JSON value", async () => {
    const { app } = buildTestApp();
    const res = await request(app)
      .post("/items")
      .set("Content-Type", "application/json")
      .send(`${JSON.stringify(lantern)} {}`);
    expect(res.status).toBe(400);
    expect(res.body.message).toBe("bind json error: unexpected extra data in body");
  });

  it("validates the bound record", async () => {
    const { app } = buildTestApp();
    const res = await request(app).post("/items").send({ ...lantern, sku: "bad sku" });
    expect(res.status).toBe(400);
    expect(res.body.code).toBe("VALIDATION_FAILED");
    expect(res.body.message).toBe("sku: must be 3-32 chars of A-Z, 0-9 or -");
  });

  it("refuses duplicate SKUs", async () => {
    const { app } = buildTestApp();
    const res = await request(app).post("/items").send({ ...lantern, sku: "LAMP-01" });
    expect(res.status).toBe(409);
    expect(res.body.message).toBe('sku "LAMP-01" already exists');
  });

  it("answers 413 for a body over the ceiling", async () => {
    const { app, repo } = buildTestApp();
    const res = await request(app)
      .post("/items")
      .send({ ...lantern, name: "x".repeat(5000) });
    expect(res.status).toBe(413);
    expect(res.body.code).toBe("REQUEST_ENTITY_TOO_LARGE");
    expect(res.body.message).toBe("Request Entity Too Large");
    expect(repo.findBySku("LANTERN-04")).toBeUndefined();
  });
});

describe("POST /items/:id/attachments", () => {
  it("records uploaded files and their note", async () => {
    const { app } = buildTestApp();
    const res = await request(app)
      .post("/items/1/attachments")
      .field("note", "manual")
      .attach("file", Buffer.from("hello"), { filename: "a.txt", contentType: "text/plain" })
      .attach("extra", Buffer.from("xyz"), {
        filename: "b.bin",
        contentType: "application/octet-stream",
      });

    expect(res.status).toBe(201);
    expect(res.body.data).toEqual({
      item_id: 1,
      uploaded: [
        {
          name: "a.txt",
          mimetype: "text/plain",
          size: 5,
          sha256: sha256("hello"),
          in_memory: true,
          note: "manual",
        },
        {
          name: "b.bin",
          mimetype: "application/octet-stream",
          size: 3,
          sha256: sha256("xyz"),
          in_memory: true,
        },
      ],
      attachment_count: 2,
    });

    const item = await request(app).get("/items/1?expand=attachments");
    expect(item.body.data.attachments).toEqual([
      { name: "a.txt", mimetype: "text/plain", size: 5, note: "manual" },
      { name: "b.bin", mimetype: "application/octet-stream", size: 3 },
    ]);
  });

  it("spills files past the multipart memory to disk", async () => {
    const { app } = buildTestApp();
    const content = "z".repeat(2000);
    const res = await request(app)
      .post("/items/2/attachments")
      .attach("file", Buffer.from(content), { filename: "big.txt", contentType: "text/plain" });

    expect(res.status).toBe(201);
    expect(res.body.data.uploaded).toEqual([
      { name: "big.txt", mimetype: "text/plain", size: 2000, sha256: sha256(content), in_memory: false },
    ]);
  });

  it("requires a file", async () => {
    const { app } = buildTestApp();
    const res = await request(app).post("/items/1/attachments").field("note", "no file");
    expect(res.status).toBe(400);
    expect(res.body.code).toBe("VALIDATION_FAILED");
    expect(res.body.message).toBe("file is required");
  });

  it("answers 404 for a missing item", async () => {
    const { app } = buildTestApp();
    const res = await request(app)
      .post("/items/42/attachments")
      .attach("file", Buffer.from("hi"), { filename: "a.txt", contentType: "text/plain" });
    expect(res.status).toBe(404);
    expect(res.body.message).toBe("item 42 not found");
  });
});
