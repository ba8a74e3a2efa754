import { describe, it, expect } from "vitest";
import { SettingsStore } from "../../src/core/settings";
import { ConfigError } from "../../src/core/errors";
import { MemorySettingsSource } from "../helpers/fakes";

describe("SettingsStore", () => {
  it("starts from defaults", () => {
    const store = new SettingsStore(new MemorySettingsSource(), {});
    expect(store.current.postFetchLimit).toBe(20);
    expect(store.current.commentFetchLimit).toBe(20);
    expect(store.current.profileStaleHours).toBe(24);
    expect(store.current.analysisBatchSize).toBe(5);
    expect(store.current.analysisBatchDelayMs).toBe(2000);
    expect(store.current.analysisRecentDays).toBe(7);
    expect(store.current.tokenPrefix).toBe("EAAG");
    expect(store.current.graphBaseUrl).toBe("https://graph.facebook.com/v23.0");
  });

  it("reads environment overrides", () => {
    const store = new SettingsStore(new MemorySettingsSource(), { ANALYSIS_BATCH_SIZE: "3" });
    expect(store.current.analysisBatchSize).toBe(3);
  });

  it("lets stored rows win over the environment on reload", async () => {
    const source = new MemorySettingsSource();
    source.rows.set("analysisBatchSize", "7");
    const store = new SettingsStore(source, { ANALYSIS_BATCH_SIZE: "3" });

    expect(store.current.analysisBatchSize).toBe(3);
    await store.reload();
    expect(store.current.analysisBatchSize).toBe(7);
  });

  it("persists a valid update and reloads", async () => {
    const source = new MemorySettingsSource();
    const store = new SettingsStore(source, {});

    const updated = await store.set("postFetchLimit", "50");

    expect(updated.postFetchLimit).toBe(50);
    expect(store.current.postFetchLimit).toBe(50);
    expect(source.rows.get("postFetchLimit")).toBe("50");
  });

  it("rejects an invalid value without touching the snapshot or the store", async () => {
    const source = new MemorySettingsSource();
    const store = new SettingsStore(source, {});
    const before = store.current;

    await expect(store.set("analysisBatchSize", "0")).rejects.toThrow(ConfigError);

    expect(store.current).toBe(before);
    expect(source.rows.size).toBe(0);
  });

  it("rejects unknown keys", async () => {
    const store = new SettingsStore(new MemorySettingsSource(), {});
    await expect(store.set("noSuchSetting", "1")).rejects.toThrow("Unknown setting: noSuchSetting");
  });

  it("rejects an invalid environment", () => {
    expect(() => new SettingsStore(new MemorySettingsSource(), { FB_POST_FETCH_LIMIT: "lots" })).toThrow(ConfigError);
  });
});
