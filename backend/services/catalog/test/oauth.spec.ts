// backend/services/catalog/test/oauth.spec.ts
import request from "supertest";
import { describe, it, expect } from "vitest";
import { buildTestApp } from "./helpers/testApp";

const TOKEN_RE = /^[A-Za-z0-9_-]{32}$/;

describe("POST /oauth/token", () => {
  it("issues a token for form credentials", async () => {
    const { app } = buildTestApp();
    const res = await request(app)
      .post("/oauth/token")
      .type("form")
      .send("grant_type=client_credentials&client_id=demo-client&client_secret=test-secret&scope=read");

    expect(res.status).toBe(200);
    expect(res.headers["no-vary-search"]).toBeUndefined();
    expect(res.body).toEqual({
      access_token: expect.stringMatching(TOKEN_RE),
      token_type: "Bearer",
      expires_in: 3600,
      scope: "read",
    });
  });

  it("takes credentials from Basic auth when the form leaves them out", async () => {
    const { app } = buildTestApp();
    const res = await request(app)
      .post("/oauth/token")
      .auth("demo-client", "test-secret")
      .type("form")
      .send("grant_type=client_credentials");

    expect(res.status).toBe(200);
    expect(res.body.token_type).toBe("Bearer");
    expect(res.body.scope).toBeUndefined();
  });

  it("prefers form credentials over Basic auth", async () => {
    const { app } = buildTestApp();
    const res = await request(app)
      .post("/oauth/token")
      .auth("someone-else", "wrong")
      .type("form")
      .send("grant_type=client_credentials&client_id=demo-client&client_secret=test-secret");

    expect(res.status).toBe(200);
  });

  it("fills only the missing half from Basic auth", async () => {
    const { app } = buildTestApp();
    const res = await request(app)
      .post("/oauth/token")
      .auth("ignored-id", "test-secret")
      .type("form")
      .send("grant_type=client_credentials&client_id=demo-client");

    expect(res.status).toBe(200);
  });

  it("rejects bad credentials in the error envelope", async () => {
    const { app } = buildTestApp();
    const res = await request(app)
      .post("/oauth/token")
      .set("X-Trace-ID", "t-oauth")
      .type("form")
      .send("grant_type=client_credentials&client_id=demo-client&client_secret=nope");

    expect(res.status).toBe(401);
    expect(res.headers["x-trace-id"]).toBe("t-oauth");
    expect(res.body).toEqual({
      code: "UNAUTHORIZED",
      message: "invalid client credentials",
      trace_id: "t-oauth",
    });
  });

  it("rejects other grant types", async () => {
    const { app } = buildTestApp();
    const res = await request(app)
      .post("/oauth/token")
      .type("form")
      .send("grant_type=password&client_id=demo-client&client_secret=test-secret");

    expect(res.status).toBe(400);
    expect(res.body.code).toBe("VALIDATION_FAILED");
    expect(res.body.message).toBe('unsupported grant_type "password"');
  });

  it("requires a client id from some source", async () => {
    const { app } = buildTestApp();
    const res = await request(app)
      .post("/oauth/token")
      .set("Authorization", "Basic not-base64!")
      .type("form")
      .send("grant_type=client_credentials");

    expect(res.status).toBe(400);
    expect(res.body.message).toBe("client_id is required");
  });
});
