import os from "os";
import path from "path";
import fs from "fs-extra";
import { describe, expect, it } from "vitest";
import { NO_HANDLE_WARNING, NO_NEWS_WARNING } from "./analysis";
import { ValidationError } from "./errors";
import { calculateInfluenceScore } from "./influence";
import { FakeGenerator } from "./testing/helpers";
import { createTestService } from "./testing/service";

describe("AnalysisService.analyzePerson", () => {
  it("combines details, Twitter, news and image into a saved analysis", async () => {
    const { service, store } = createTestService({ random: () => 0 });

    const { analysis, cached } = await service.analyzePerson("  Ada   Lovelace ");

    expect(cached).toBe(false);
    expect(analysis.id).toBe(`ada-lovelace-${Date.parse("2024-06-15T12:00:00Z")}-000000`);
    expect(analysis.name).toBe("Ada Lovelace");
    expect(analysis.normalizedName).toBe("ada lovelace");
    expect(analysis.imageUrl).toBe("https://upload.example.org/ada.jpg");
    expect(analysis.details?.companies).toEqual(["Analytical Engines"]);
    expect(analysis.twitterHandle).toBe("ada");
    expect(analysis.twitter?.source).toBe("api");
    expect(analysis.twitter?.engagementRate).toBe(0.01);
    expect(analysis.news?.articles).toHaveLength(1);
    expect(analysis.warnings).toEqual([]);
    expect(analysis.createdAt).toBe("2024-06-15T12:00:00.000Z");
    expect(analysis.influence).toEqual(
      calculateInfluenceScore(analysis.details, analysis.twitter, analysis.news)
    );
    await expect(store.findById(analysis.id)).resolves.toEqual(analysis);
  });

  it("returns a cached analysis within the TTL unless refresh is set", async () => {
    const generator = new FakeGenerator("```json\n{}\n```");
    let current = new Date("2024-06-15T12:00:00Z");
    const { service } = createTestService({ generator, now: () => current });

    const first = await service.analyzePerson("Ada Lovelace");
    current = new Date("2024-06-15T18:00:00Z");
    const second = await service.analyzePerson("ada lovelace");

    expect(second.cached).toBe(true);
    expect(second.analysis.id).toBe(first.analysis.id);
    expect(generator.prompts).toHaveLength(1);

    const refreshed = await service.analyzePerson("Ada Lovelace", { refresh: true });
    expect(refreshed.cached).toBe(false);
    expect(refreshed.analysis.id).not.toBe(first.analysis.id);
    expect(generator.prompts).toHaveLength(2);
  });

  it("skips the cache when an explicit handle differs from the cached one", async () => {
    let current = new Date("2024-06-15T12:00:00Z");
    const { service } = createTestService({ now: () => current });

    const first = await service.analyzePerson("Ada Lovelace");
    current = new Date("2024-06-15T13:00:00Z");
    const second = await service.analyzePerson("Ada Lovelace", { twitterHandle: "someoneelse" });
    current = new Date("2024-06-15T14:00:00Z");
    const third = await service.analyzePerson("Ada Lovelace", { twitterHandle: "@someoneelse" });
    current = new Date("2024-06-15T15:00:00Z");
    const fourth = await service.analyzePerson("Ada Lovelace", { twitterHandle: "@ada" });

    expect(first.analysis.twitterHandle).toBe("ada");
    expect(second.cached).toBe(false);
    expect(second.analysis.twitterHandle).toBe("someoneelse");
    expect(third.cached).toBe(true);
    expect(third.analysis.id).toBe(second.analysis.id);
    expect(fourth.cached).toBe(false);
    expect(fourth.analysis.twitterHandle).toBe("ada");
  });

  it("gives refreshes within the same millisecond distinct IDs", async () => {
    const suffixes = [0.25, 0.5];
    const { service, store } = createTestService({ random: () => suffixes.shift() ?? 0 });

    const first = await service.analyzePerson("Ada Lovelace", { refresh: true });
    const second = await service.analyzePerson("Ada Lovelace", { refresh: true });

    expect(first.analysis.id).toBe(`ada-lovelace-${Date.parse("2024-06-15T12:00:00Z")}-900000`);
    expect(second.analysis.id).toBe(`ada-lovelace-${Date.parse("2024-06-15T12:00:00Z")}-i00000`);
    await expect(store.listRecent(10)).resolves.toHaveLength(2);
  });

  it("runs a fresh analysis once the cached one expires", async () => {
    let current = new Date("2024-06-15T12:00:00Z");
    const { service } = createTestService({ now: () => current });

    await service.analyzePerson("Ada Lovelace");
    current = new Date("2024-06-16T12:00:01Z");

    await expect(service.analyzePerson("Ada Lovelace")).resolves.toMatchObject({ cached: false });
  });

  it("records failed steps as warnings", async () => {
    const { service } = createTestService({
      generator: null,
      imageLookup: async () => {
        throw new Error("timeout of 10000ms exceeded");
      },
    });

    const { analysis } = await service.analyzePerson("Ada Lovelace");

    expect(analysis.details).toBeNull();
    expect(analysis.imageUrl).toBeNull();
    expect(analysis.warnings).toHaveLength(2);
    expect(analysis.warnings).toContain("Image lookup: timeout of 10000ms exceeded");
    expect(analysis.warnings).toContain("Person details: gemini: GEMINI_API_KEY is not configured");
  });

  it("warns when there is no Twitter handle or news", async () => {
    const { service } = createTestService();

    const { analysis } = await service.analyzePerson("Grace Hopper");

    expect(analysis.twitterHandle).toBeNull();
    expect(analysis.twitter).toBeNull();
    expect(analysis.news).toBeNull();
    expect(analysis.warnings).toEqual([NO_HANDLE_WARNING, NO_NEWS_WARNING]);
  });

  it("uses a handle override and flags synthetic profiles", async () => {
    const { service } = createTestService();

    const { analysis } = await service.analyzePerson("Ada Lovelace", { twitterHandle: "@someoneelse" });

    expect(analysis.twitterHandle).toBe("someoneelse");
    expect(analysis.twitter?.source).toBe("synthetic");
    expect(analysis.warnings).toEqual([
      "Twitter data for @someoneelse is synthetic and was left out of the influence score.",
    ]);
    expect(analysis.influence.components.reach).toBe(0);
  });

  it("rejects blank names", async () => {
    const { service } = createTestService();

    await expect(service.analyzePerson("   ")).rejects.toBeInstanceOf(ValidationError);
  });

  it("writes a JSON copy when a logs directory is set", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "influence-analysis-"));
    try {
      const { service } = createTestService({ logsDir: dir });
      const { analysis } = await service.analyzePerson("Ada Lovelace");

      const [day] = await fs.readdir(dir);
      const saved: unknown = await fs.readJson(
        path.join(dir, day ?? "", "ada_lovelace", "analysis.json")
      );
      expect(saved).toEqual(analysis);
    } finally {
      await fs.remove(dir);
    }
  });
});

describe("AnalysisService lookups", () => {
  it("rejects blank handles and names", async () => {
    const { service } = createTestService();

    await expect(service.getTwitterProfile("@")).rejects.toThrow("A Twitter handle is required");
    await expect(service.getNews("  ")).rejects.toThrow("A name is required");
  });

  it("resolves handles from mappings or an override", () => {
    const { service } = createTestService();

    expect(service.resolveHandle("ada lovelace")).toBe("ada");
    expect(service.resolveHandle("Ada Lovelace", "@other")).toBe("other");
    expect(service.resolveHandle("Nobody")).toBeNull();
  });
});
