// backend/services/shared/test/serviceApp.spec.ts
import type { Response } from "express";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { createServiceApp } from "@reqbind/shared/app/createServiceApp";
import { field } from "@reqbind/shared/binding/dsl";
import { HttpError } from "@reqbind/shared/http/errors";
import { bindRoute } from "@reqbind/shared/http/express/bindRoute";
import type { PipelineOutcome, ResponseFormatter } from "@reqbind/shared/http/pipeline/types";

class Echo {
  static readonly fields = { id: field.int({ path: "id" }), q: field.string() };
  id = 0;
  q = "";
}

class PlainFormatter implements ResponseFormatter<Response> {
  public write(res: Response, outcome: PipelineOutcome<unknown>): void {
    if (outcome.ok) {
      res.status(200).json(outcome.value);
      return;
    }
    throw outcome.error;
  }
}

function buildApp() {
  return createServiceApp({
    serviceName: "echo",
    httpLogging: false,
    apiPrefix: "/api",
    mountRoutes: (r) => {
      r.get("/echo/:id", bindRoute(Echo, (rec) => ({ id: rec.id, q: rec.q }), { formatter: new PlainFormatter() }));
      r.get("/teapot", () => {
        throw new HttpError(418, "TEAPOT", "short and stout");
      });
      r.get("/crash", () => {
        throw new Error("kaboom");
      });
    },
  });
}

describe("createServiceApp", () => {
  it("mounts bound routes under the prefix", async () => {
    const res = await request(buildApp()).get("/api/echo/12?q=hi");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id: 12, q: "hi" });
    expect(res.headers["no-vary-search"]).toBeUndefined();
  });

  it("generates a request id when none is sent", async () => {
    const res = await request(buildApp()).get("/health");
    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
    expect(res.body.requestId).toBe(res.headers["x-request-id"]);
  });

  it("reuses a correlation id header", async () => {
    const res = await request(buildApp()).get("/health").set("X-Correlation-Id", "corr-1");
    expect(res.headers["x-request-id"]).toBe("corr-1");
  });

  it("turns an escaped HttpError into a problem document", async () => {
    const res = await request(buildApp()).get("/api/echo/abc").set("X-Request-Id", "r-1");
    expect(res.status).toBe(400);
    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toEqual({
      service: "echo",
      type: "about:blank",
      title: "Bad Request",
      status: 400,
      code: "BAD_REQUEST",
      detail: 'error converting value for "id"',
      requestId: "r-1",
    });
  });

  it("keeps unknown statuses with a generic title", async () => {
    const res = await request(buildApp()).get("/api/teapot");
    expect(res.status).toBe(418);
    expect(res.body.title).toBe("Request Failed");
    expect(res.body.code).toBe("TEAPOT");
  });

  it("hides unexpected errors behind a 500", async () => {
    const res = await request(buildApp()).get("/api/crash").set("X-Request-Id", "r-2");
    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      service: "echo",
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      code: "INTERNAL_ERROR",
      detail: "An unexpected error occurred.",
      requestId: "r-2",
    });
  });
});
