import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseBoolean, parseRetentionHours } from "../../src/config/env.js";

describe("parseBoolean", () => {
  it("accepts true in any case and with surrounding whitespace", () => {
    expect(parseBoolean("true")).toBe(true);
    expect(parseBoolean("TRUE")).toBe(true);
    expect(parseBoolean(" True ")).toBe(true);
  });

  it("treats everything else as false", () => {
    expect(parseBoolean(undefined)).toBe(false);
    expect(parseBoolean("")).toBe(false);
    expect(parseBoolean("1")).toBe(false);
    expect(parseBoolean("yes")).toBe(false);
    expect(parseBoolean("false")).toBe(false);
  });
});

describe("parseRetentionHours", () => {
  it("defaults to 72 when unset or blank", () => {
    expect(parseRetentionHours(undefined)).toBe(72);
    expect(parseRetentionHours("  ")).toBe(72);
  });

  it("parses numbers including the disabling -1", () => {
    expect(parseRetentionHours("24")).toBe(24);
    expect(parseRetentionHours("0.5")).toBe(0.5);
    expect(parseRetentionHours("-1")).toBe(-1);
  });

  it("rejects values that are not numbers", () => {
    expect(() => parseRetentionHours("abc")).toThrow("Invalid WORKSPACE_RETENTION_HOURS: abc");
    expect(() => parseRetentionHours("12h")).toThrow("Invalid WORKSPACE_RETENTION_HOURS: 12h");
  });
});

describe("tool configuration from the environment", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  async function loadMediaConfig() {
    return import("../../src/config/media.js");
  }

  it("maps the fetch tool settings", async () => {
    vi.stubEnv("YTDLP_PATH", "/opt/bin/yt-dlp");
    vi.stubEnv("FFMPEG_PATH", "/opt/ffmpeg/bin");
    vi.stubEnv("ENABLE_SPONSORBLOCK", " TRUE ");

    const { fetchToolConfigFromEnv } = await loadMediaConfig();

    expect(fetchToolConfigFromEnv()).toEqual({
      binary: "/opt/bin/yt-dlp",
      ffmpegLocation: "/opt/ffmpeg/bin",
      sponsorBlock: true,
      sponsorBlockCategories: ["sponsor", "intro", "outro"],
    });
  });

  it("falls back to defaults when the settings are empty", async () => {
    vi.stubEnv("YTDLP_PATH", "");
    vi.stubEnv("FFMPEG_PATH", "");
    vi.stubEnv("ENABLE_SPONSORBLOCK", "1");

    const { fetchToolConfigFromEnv } = await loadMediaConfig();
    const config = fetchToolConfigFromEnv();

    expect(config.binary).toBe("yt-dlp");
    expect(config.ffmpegLocation).toBeUndefined();
    expect(config.sponsorBlock).toBe(false);
  });

  it("maps the transcode tool binaries", async () => {
    vi.stubEnv("FFMPEG_BINARY", "/usr/local/bin/ffmpeg");
    vi.stubEnv("FFPROBE_BINARY", "");

    const { transcodeToolConfigFromEnv } = await loadMediaConfig();

    expect(transcodeToolConfigFromEnv()).toEqual({
      ffmpegBinary: "/usr/local/bin/ffmpeg",
      ffprobeBinary: "ffprobe",
    });
  });

  it("fails at load time on a non-numeric retention window", async () => {
    vi.stubEnv("WORKSPACE_RETENTION_HOURS", "abc");

    await expect(import("../../src/config/env.js")).rejects.toThrow(
      "Invalid WORKSPACE_RETENTION_HOURS: abc"
    );
  });
});
