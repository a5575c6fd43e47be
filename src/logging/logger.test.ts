import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtempSync, readdirSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import { createLoggingContext, LOG_FILE_MAX_SEGMENTS, LOG_FILE_MAX_SIZE } from "./logger.js";

function capture(stream: PassThrough): () => string {
  let text = "";
  stream.on("data", (chunk: Buffer) => {
    text += chunk.toString("utf8");
  });
  return () => text;
}

describe("createLoggingContext", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ytd-logging-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function setup() {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const context = createLoggingContext({ directory: dir, stdout, stderr });
    return { context, stdoutText: capture(stdout), stderrText: capture(stderr) };
  }

  function readLogLines(file = "ytd.log"): Record<string, unknown>[] {
    return readFileSync(join(dir, file), "utf8")
      .split("\n")
      .filter((line) => line.length > 0)
      .map((line) => JSON.parse(line) as Record<string, unknown>);
  }

  it("writes info and above to the log file as JSON lines", async () => {
    const { context } = setup();
    context.logger.debug({ detail: "hidden" }, "yt_dlp_debug");
    context.logger.info({ url: "https://youtu.be/abc" }, "downloading_single_video");
    context.logger.error({ error: "boom" }, "download_error");
    await context.close();

    const lines = readLogLines();
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({
      level: "info",
      logger: "ytd",
      event: "downloading_single_video",
      url: "https://youtu.be/abc",
    });
    expect(lines[1]).toMatchObject({ level: "error", event: "download_error", error: "boom" });
    expect(typeof lines[0]?.["time"]).toBe("string");
  });

  it("keeps non-ASCII text intact", async () => {
    const { context } = setup();
    context.logger.info({ detail: "Канал – видео" }, "yt_dlp_info");
    await context.close();

    expect(readLogLines()[0]?.["detail"]).toBe("Канал – видео");
  });

  it("renders info on stdout and errors on both streams", async () => {
    const { context, stdoutText, stderrText } = setup();
    context.logger.info("application_started");
    context.logger.error("validation_error");

    await vi.waitFor(() => {
      expect(stdoutText()).toContain("application_started");
      expect(stdoutText()).toContain("validation_error");
      expect(stderrText()).toContain("validation_error");
    });
    expect(stderrText()).not.toContain("application_started");
    await context.close();
  });

  it("close can be called twice", async () => {
    const { context } = setup();
    await context.close();
    await expect(context.close()).resolves.toBeUndefined();
  });

  it("drops file records logged while closing but still prints them", async () => {
    const { context, stderrText } = setup();
    context.logger.info("application_started");

    const closing = context.close();
    context.logger.error({ error: "killed" }, "download_error");
    await closing;
    context.logger.error({ error: "late" }, "download_error");

    expect(readLogLines().map((line) => line["event"])).toEqual(["application_started"]);
    await vi.waitFor(() => {
      expect(stderrText()).toContain("killed");
      expect(stderrText()).toContain("late");
    });
  });

  it("rotates by size into numbered segments, newest first", async () => {
    const context = createLoggingContext({
      directory: dir,
      stdout: new PassThrough(),
      stderr: new PassThrough(),
      rotation: { size: "1K", segments: 3 },
    });

    let seq = 0;
    for (let batch = 0; batch < 10; batch++) {
      for (let i = 0; i < 20; i++) {
        context.logger.info({ seq: seq++, detail: "x".repeat(40) }, "yt_dlp_info");
      }
      await new Promise((resolve) => setTimeout(resolve, 20));
    }
    await context.close();

    expect(readdirSync(dir).sort()).toEqual(["ytd.log", "ytd.log.1", "ytd.log.2", "ytd.log.3"]);

    const lastSeq = (file: string) => Number(readLogLines(file).at(-1)?.["seq"]);
    expect(lastSeq("ytd.log.1")).toBeGreaterThan(lastSeq("ytd.log.2"));
    expect(lastSeq("ytd.log.2")).toBeGreaterThan(lastSeq("ytd.log.3"));
  });

  it("defaults to 10 MiB segments with seven kept", () => {
    expect(LOG_FILE_MAX_SIZE).toBe("10M");
    expect(LOG_FILE_MAX_SEGMENTS).toBe(7);
  });
});
