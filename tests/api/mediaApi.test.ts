import path from "path";
import { once } from "events";
import type { Server } from "http";
import { writeFile } from "fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../../src/app.js";
import { createMediaService } from "../../src/services/business/mediaService.js";
import { createSessionManager } from "../../src/services/business/sessionService.js";
import type { OutcomeRecorder } from "../../src/repositories/outcomeRepository.js";
import { ExternalToolError } from "../../src/utils/errors.js";
import {
  createFailingRecorder,
  createFakeRunner,
  createMemoryRecorder,
  makeTempDir,
  removeDir,
  testFetchTool,
  testTranscodeTool,
  type FakeRunner,
} from "../helpers/fakes.js";

interface ErrorBody {
  error: string;
  details: Array<{ path: string; message: string }>;
}

function readJson<T>(res: Response): Promise<T> {
  return res.json() as Promise<T>;
}

async function writesClip(args: string[]): Promise<string> {
  const template = args[args.indexOf("-o") + 1] ?? "";
  await writeFile(path.join(path.dirname(template), "Clip-abc123.mp4"), "media");
  return "[download] 100%\n";
}

describe("media API", () => {
  let root: string;
  let server: Server;
  let baseUrl: string;
  let runner: FakeRunner;

  async function start(recorder: OutcomeRecorder = createMemoryRecorder()) {
    const sessions = createSessionManager(root);
    const media = createMediaService({
      runner,
      sessions,
      recorder,
      fetchTool: testFetchTool,
      transcodeTool: testTranscodeTool,
    });
    server = createApp({ media, sessions, recorder }).listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  function post(route: string, body: unknown) {
    return fetch(`${baseUrl}${route}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  beforeEach(async () => {
    root = await makeTempDir("media-api-");
    runner = createFakeRunner(writesClip);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    vi.restoreAllMocks();
    await removeDir(root);
  });

  it("reports readiness with the recorder in use", async () => {
    await start();

    const res = await fetch(`${baseUrl}/ready`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ready: true, recorder: "memory" });
  });

  it("fetches media and returns the artifact path", async () => {
    await start();

    const res = await post("/api/download", { url: "http://x/video", format: "mp4", quality: "best" });
    const body = await readJson<{ path: string }>(res);

    expect(res.status).toBe(200);
    expect(path.basename(body.path)).toBe("Clip-abc123.mp4");
    expect(path.dirname(path.dirname(body.path))).toBe(root);
    expect(runner.calls[0]).toContain("bestvideo+bestaudio/best");
    expect(runner.calls[0]?.slice(4, 6)).toEqual(["--merge-output-format", "mp4"]);
  });

  it("succeeds even when the outcome store is down", async () => {
    await start(createFailingRecorder());

    const res = await post("/api/download", { url: "http://x/video" });

    expect(res.status).toBe(200);
    expect(path.basename((await readJson<{ path: string }>(res)).path)).toBe("Clip-abc123.mp4");
  });

  it("rejects invalid requests before running anything", async () => {
    await start();

    const res = await post("/api/download", { url: "http://x/video", format: "avi" });
    const body = await readJson<ErrorBody>(res);

    expect(res.status).toBe(400);
    expect(body.error).toBe("Validation failed");
    expect(body.details[0]?.path).toBe("format");
    expect(runner.calls).toEqual([]);
  });

  it("rejects malformed JSON", async () => {
    await start();

    const res = await fetch(`${baseUrl}/api/download`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });

    expect(res.status).toBe(400);
  });

  it("surfaces tool failures with the bounded output", async () => {
    runner = createFakeRunner(() => {
      throw new ExternalToolError("yt-dlp", 1, "ERROR: Unsupported URL: http://x/video");
    });
    await start();

    const res = await post("/api/download", { url: "http://x/video" });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "yt-dlp exited with code 1",
      details: "ERROR: Unsupported URL: http://x/video",
      exitCode: 1,
    });
  });

  it("runs batch fetches and reports per-url outcomes", async () => {
    await start();

    const res = await post("/api/download/batch", {
      urls: ["http://x/1", "http://x/2"],
      common: { audio_only: true, format: "mp3" },
    });
    const body = await readJson<{ results: unknown[] }>(res);

    expect(res.status).toBe(200);
    expect(body.results).toHaveLength(2);
    expect(runner.calls.every((args) => args.includes("-x"))).toBe(true);
  });

  it("converts an existing file", async () => {
    await start();
    const input = path.join(root, "talk.mp4");
    await writeFile(input, "video");

    const res = await post("/api/convert", {
      input_path: input,
      output_format: "wav",
      start: "00:00:05",
      end: "00:00:15",
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ output: path.join(root, "talk_conv.wav") });
    expect(runner.calls).toEqual([
      ["ffmpeg", "-y", "-i", input, "-ss", "00:00:05", "-to", "00:00:15", path.join(root, "talk_conv.wav")],
    ]);
  });

  it("returns 404 when the convert input is missing", async () => {
    await start();
    const input = path.join(root, "missing.mp4");

    const res = await post("/api/convert", { inputPath: input, outputFormat: "mp3" });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: `Input file '${input}' not found` });
    expect(runner.calls).toEqual([]);
  });

  it("probes a file", async () => {
    runner = createFakeRunner(() => "Duration: 00:00:10.00");
    await start();
    const input = path.join(root, "talk.mp4");
    await writeFile(input, "video");

    const res = await fetch(`${baseUrl}/api/probe?path=${encodeURIComponent(input)}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ raw: "Duration: 00:00:10.00" });
  });

  it("streams a file back as an attachment", async () => {
    await start();
    const file = path.join(root, "song.mp3");
    await writeFile(file, "audio-bytes");

    const res = await fetch(`${baseUrl}/api/file?path=${encodeURIComponent(file)}`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-disposition")).toBe('attachment; filename="song.mp3"');
    expect(await res.text()).toBe("audio-bytes");
  });

  it("streams a file whose name starts with a dot", async () => {
    await start();
    const file = path.join(root, ".hidden_conv.opus");
    await writeFile(file, "opus-bytes");

    const res = await fetch(`${baseUrl}/api/file?path=${encodeURIComponent(file)}`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-disposition")).toBe(
      'attachment; filename=".hidden_conv.opus"'
    );
    expect(await res.text()).toBe("opus-bytes");
  });

  it("returns 404 for a missing file and 400 without a path", async () => {
    await start();

    const missing = await fetch(`${baseUrl}/api/file?path=${encodeURIComponent(path.join(root, "x.mp3"))}`);
    const noPath = await fetch(`${baseUrl}/api/file`);

    expect(missing.status).toBe(404);
    expect(noPath.status).toBe(400);
  });

  it("lists fetch history", async () => {
    await start();
    await post("/api/download", { url: "http://x/video" });

    const res = await fetch(`${baseUrl}/api/history?limit=5`);
    const body = await readJson<{ items: Array<{ url: string }> }>(res);

    expect(res.status).toBe(200);
    expect(body.items).toHaveLength(1);
    expect(body.items[0]?.url).toBe("http://x/video");
  });

  it("returns an empty history when the store is down", async () => {
    await start(createFailingRecorder());

    const res = await fetch(`${baseUrl}/api/history`);

    expect(await res.json()).toEqual({ items: [] });
  });

  it("lists and deletes session workspaces", async () => {
    await start();
    await post("/api/download", { url: "http://x/video" });

    const listed = await readJson<{ sessions: Array<{ id: string }> }>(
      await fetch(`${baseUrl}/api/sessions`)
    );
    expect(listed.sessions).toHaveLength(1);
    const id = listed.sessions[0]?.id ?? "";

    const deleted = await fetch(`${baseUrl}/api/sessions/${id}`, { method: "DELETE" });
    const again = await fetch(`${baseUrl}/api/sessions/${id}`, { method: "DELETE" });

    expect(deleted.status).toBe(204);
    expect(again.status).toBe(404);
  });
});
