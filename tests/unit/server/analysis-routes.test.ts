import type { Server } from "node:http";
import axios from "axios";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { buildContainer } from "../../../src/app/container";
import { createApp } from "../../../src/server/app";
import { FakeBrowserDriver, ScriptedLLM, StubConfirmation, createAccount, createTestDb } from "../../helpers/fakes";

describe("GET /api/analysis/profiles/:id/analyses", () => {
  let server: Server;
  let baseURL: string;
  let knownProfileId: number;

  beforeAll(async () => {
    const db = createTestDb();
    const container = await buildContainer({
      db,
      browser: new FakeBrowserDriver(),
      llm: new ScriptedLLM([]),
      confirmation: new StubConfirmation(false),
      environment: {},
    });
    const account = await createAccount(db);
    const profile = await container.repos.profiles.upsertScraped(
      "known.one",
      "https://www.facebook.com/known.one",
      account.id,
      { name: "Known One" }
    );
    knownProfileId = profile.id;

    server = createApp(container).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("Server has no TCP address");
    baseURL = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it("returns 404 for an unknown profile", async () => {
    const response = await axios.get(`${baseURL}/api/analysis/profiles/999/analyses`, { validateStatus: () => true });

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ detail: "Profile 999 not found" });
  });

  it("returns an empty history for a profile that was never analyzed", async () => {
    const response = await axios.get(`${baseURL}/api/analysis/profiles/${knownProfileId}/analyses`, {
      validateStatus: () => true,
    });

    expect(response.status).toBe(200);
    expect(response.data).toEqual([]);
  });
});
