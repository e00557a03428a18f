import { describe, expect, it, vi } from "vitest";
import {
  MAX_STEMMED_TOKEN_LENGTH,
  createTextNormalizer,
  loadNaturalAnnotator,
  normalizeWithRegex,
  type TextAnnotator,
} from "../services/text-normalizer.js";

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const splittingAnnotator: TextAnnotator = {
  annotate: (text) => text.split(/[^\p{L}\p{N}_]+/u).filter((token) => token.length > 0 && token !== "a"),
};

describe("symptom triage text normalizer", () => {
  it("strips punctuation and lower-cases on the regex path", () => {
    expect(normalizeWithRegex("I HAVE a Headache!!")).toBe("i have a headache");
    expect(normalizeWithRegex("Fever above 39°C, won't settle")).toBe("fever above 39c wont settle");
  });

  it("keeps non-latin letters and original whitespace", () => {
    expect(normalizeWithRegex("Fièvre  élevée\tnuit")).toBe("fièvre  élevée\tnuit");
  });

  it("falls back to regex normalization when the annotator is disabled", async () => {
    const normalizer = createTextNormalizer({ loader: null });
    expect(normalizer.status()).toBe("unavailable");
    await expect(normalizer.load()).resolves.toBe("unavailable");
    expect(normalizer.unavailableReason()).toBe("annotator disabled by config");

    const normalized = normalizer.normalize("I HAVE a Headache!!");
    expect(normalized).toBe("i have a headache");
    expect(normalized.split(" ")).toContain("headache");
  });

  it("logs a failed annotator load once and stays on the regex path", async () => {
    const logger = createLogger();
    const loader = vi.fn(async (): Promise<TextAnnotator> => {
      throw new Error("module not found");
    });
    const normalizer = createTextNormalizer({ loader, logger });

    await expect(normalizer.load()).resolves.toBe("unavailable");
    await expect(normalizer.load()).resolves.toBe("unavailable");

    expect(loader).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0]?.[0]).toContain("module not found");
    expect(normalizer.unavailableReason()).toBe("module not found");
    expect(normalizer.normalize("Runny NOSE!")).toBe("runny nose");
  });

  it("shares one in-flight load between concurrent callers", async () => {
    const loader = vi.fn(async () => splittingAnnotator);
    const normalizer = createTextNormalizer({ loader });

    const statuses = await Promise.all([normalizer.load(), normalizer.load(), normalizer.load()]);

    expect(statuses).toEqual(["ready", "ready", "ready"]);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it("joins annotator base forms with single spaces once loaded", async () => {
    const normalizer = createTextNormalizer({ loader: async () => splittingAnnotator });
    expect(normalizer.normalize("Severe Burn, now!")).toBe("severe burn now");

    await normalizer.load();
    expect(normalizer.status()).toBe("ready");
    expect(normalizer.normalize("Severe   Burn, a  now!")).toBe("severe burn now");
  });

  it("uses the regex path for a call whose annotation throws", async () => {
    const logger = createLogger();
    const normalizer = createTextNormalizer({
      loader: async () => ({
        annotate: () => {
          throw new Error("tagger crashed");
        },
      }),
      logger,
    });
    await normalizer.load();

    expect(normalizer.normalize("Fever 39°C")).toBe("fever 39c");
    expect(normalizer.normalize("Mild rash.")).toBe("mild rash");
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(normalizer.status()).toBe("ready");
  });

  it("stems content words through natural", async () => {
    const annotator = await loadNaturalAnnotator();
    expect(annotator.annotate("i have a headache!!")).toContain("headach");
  });

  it("keeps letters outside ascii inside one token", async () => {
    const annotator = await loadNaturalAnnotator();
    const tokens = annotator.annotate("forte fièvre");
    expect(tokens).toHaveLength(2);
    expect(tokens[0]).toBe("fort");
    expect(tokens).not.toContain("vre");
  });

  it("passes very long tokens through without stemming", async () => {
    const annotator = await loadNaturalAnnotator();
    const longWord = "x".repeat(100_000);

    const startedAt = performance.now();
    const tokens = annotator.annotate(`severe ${longWord}`);
    const elapsedMs = performance.now() - startedAt;

    expect(tokens).toEqual(["sever", longWord]);
    expect(elapsedMs).toBeLessThan(1_000);
    expect(longWord.length).toBeGreaterThan(MAX_STEMMED_TOKEN_LENGTH);
  });
});
