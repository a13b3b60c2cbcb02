import { writeFile } from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  YtDlpDownloader,
  buildYtDlpArgs,
  describeRunnerError,
  extractOutputPath,
  locateOutput,
  parseYtDlpOutput,
  type YtDlpOptions,
  type YtDlpRunner,
} from "../../src/services/external/ytdlp.js";
import {
  AuthRequiredError,
  ExtractionFailedError,
  OutputMissingError,
} from "../../src/utils/errors.js";
import { makeTempDir, removeDir } from "../helpers/fakes.js";

const URL_UNDER_TEST = "https://media.example.test/watch?v=abc123";

const baseOptions: YtDlpOptions = { binaryPath: "yt-dlp", cookies: { kind: "none" } };

function commandError(stderr: string): Error {
  return Object.assign(new Error("Command failed with exit code 1: yt-dlp"), { stderr });
}

describe("buildYtDlpArgs", () => {
  it("builds the default argument list", () => {
    expect(buildYtDlpArgs(baseOptions, "/data/downloads", URL_UNDER_TEST)).toEqual([
      "--dump-single-json",
      "--no-simulate",
      "--no-playlist",
      "--no-warnings",
      "--no-progress",
      "--restrict-filenames",
      "--output", "/data/downloads/%(title).60s-%(id)s.%(ext)s",
      "--format", "bv*+ba/b",
      "--merge-output-format", "mp4",
      "--remux-video", "mp4",
      "--",
      URL_UNDER_TEST,
    ]);
  });

  it("passes a browser cookie source with its profile", () => {
    const args = buildYtDlpArgs(
      { ...baseOptions, cookies: { kind: "browser", browser: "chrome", profile: "Default" } },
      "/data",
      URL_UNDER_TEST
    );

    expect(args.slice(-4)).toEqual(["--cookies-from-browser", "chrome:Default", "--", URL_UNDER_TEST]);
    expect(args).not.toContain("--cookies");
  });

  it("passes a browser cookie source without a profile", () => {
    const args = buildYtDlpArgs(
      { ...baseOptions, cookies: { kind: "browser", browser: "firefox" } },
      "/data",
      URL_UNDER_TEST
    );

    expect(args.slice(-4)).toEqual(["--cookies-from-browser", "firefox", "--", URL_UNDER_TEST]);
  });

  it("passes a cookie file and the socket timeout", () => {
    const args = buildYtDlpArgs(
      { ...baseOptions, socketTimeoutSeconds: 30, cookies: { kind: "file", path: "/etc/media/cookies.txt" } },
      "/data",
      URL_UNDER_TEST
    );

    expect(args.slice(-6)).toEqual([
      "--socket-timeout", "30",
      "--cookies", "/etc/media/cookies.txt",
      "--",
      URL_UNDER_TEST,
    ]);
  });

  it("is deterministic", () => {
    expect(buildYtDlpArgs(baseOptions, "/data", URL_UNDER_TEST)).toEqual(
      buildYtDlpArgs(baseOptions, "/data", URL_UNDER_TEST)
    );
  });
});

describe("locateOutput", () => {
  it("prefers requested_downloads over the top-level path", () => {
    const info = { requested_downloads: [{ filepath: "/d/merged.mp4" }], filepath: "/d/other.mp4" };

    expect(locateOutput(info)).toEqual({ kind: "requested-downloads", filePath: "/d/merged.mp4" });
  });

  it("falls back to the top-level path", () => {
    expect(locateOutput({ requested_downloads: [], filepath: "/d/clip.mp4" })).toEqual({
      kind: "top-level",
      filePath: "/d/clip.mp4",
    });
    expect(locateOutput({ requested_downloads: [{ filepath: null }], filepath: "/d/clip.mp4" })).toEqual({
      kind: "top-level",
      filePath: "/d/clip.mp4",
    });
  });

  it("reports a missing path", () => {
    expect(locateOutput({ title: "No file" })).toEqual({ kind: "missing" });
    expect(extractOutputPath({ title: "No file" })).toBeNull();
  });
});

describe("parseYtDlpOutput", () => {
  it("reads the last JSON line", () => {
    const stdout = `[info] noise\n${JSON.stringify({ id: "abc123", title: "Clip", duration: 12.5 })}\n`;

    expect(parseYtDlpOutput(stdout)).toMatchObject({ id: "abc123", title: "Clip", duration: 12.5 });
  });

  it("rejects empty output", () => {
    expect(() => parseYtDlpOutput("\n  \n")).toThrowError(ExtractionFailedError);
  });

  it("rejects output that is not JSON", () => {
    expect(() => parseYtDlpOutput("[download] 100%")).toThrowError(/unreadable metadata/);
  });

  it("rejects metadata of the wrong shape", () => {
    expect(() => parseYtDlpOutput(JSON.stringify({ title: 42 }))).toThrowError(/unexpected metadata/);
  });
});

describe("describeRunnerError", () => {
  it("prefers stderr over the error message", () => {
    expect(describeRunnerError(commandError("ERROR: Unsupported URL\n"))).toBe("ERROR: Unsupported URL");
  });

  it("falls back to the message", () => {
    expect(describeRunnerError(new Error("spawn yt-dlp ENOENT"))).toBe("spawn yt-dlp ENOENT");
    expect(describeRunnerError("plain string")).toBe("plain string");
  });
});

describe("YtDlpDownloader", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await makeTempDir("ytdlp");
  });

  afterEach(async () => {
    await removeDir(outputDir);
  });

  it("returns the downloaded file and its metadata", async () => {
    const calls: Array<{ binaryPath: string; args: string[] }> = [];
    const run: YtDlpRunner = async (binaryPath, args) => {
      calls.push({ binaryPath, args });
      const filePath = path.join(outputDir, "Clip-abc123.mp4");
      await writeFile(filePath, "video-bytes");
      return JSON.stringify({
        id: "abc123",
        title: "Clip",
        duration: 42,
        requested_downloads: [{ filepath: filePath }],
      });
    };
    const downloader = new YtDlpDownloader({ ...baseOptions, binaryPath: "/opt/yt-dlp" }, run);

    const result = await downloader.download(URL_UNDER_TEST, outputDir);

    expect(result).toEqual({
      filePath: path.join(outputDir, "Clip-abc123.mp4"),
      title: "Clip",
      durationSeconds: 42,
      id: "abc123",
    });
    expect(calls).toHaveLength(1);
    expect(calls[0].binaryPath).toBe("/opt/yt-dlp");
    expect(calls[0].args).toEqual(buildYtDlpArgs(baseOptions, outputDir, URL_UNDER_TEST));
  });

  it("uses the top-level filepath and leaves absent metadata undefined", async () => {
    const filePath = path.join(outputDir, "Only_Path-xyz.mp4");
    await writeFile(filePath, "bytes");
    const downloader = new YtDlpDownloader(baseOptions, async () =>
      JSON.stringify({ id: 987, title: null, filepath: filePath })
    );

    expect(await downloader.download(URL_UNDER_TEST, outputDir)).toEqual({
      filePath,
      title: undefined,
      durationSeconds: undefined,
      id: "987",
    });
  });

  it("flags a bot check as AuthRequiredError", async () => {
    const downloader = new YtDlpDownloader(baseOptions, async () => {
      throw commandError("ERROR: [youtube] abc123: Sign in to confirm you’re not a bot. Use --cookies");
    });

    const failure = downloader.download(URL_UNDER_TEST, outputDir);

    await expect(failure).rejects.toBeInstanceOf(AuthRequiredError);
    await expect(failure).rejects.toBeInstanceOf(ExtractionFailedError);
    await expect(failure).rejects.toMatchObject({
      statusCode: 401,
      originalMessage: "ERROR: [youtube] abc123: Sign in to confirm you’re not a bot. Use --cookies",
    });
  });

  it("wraps other failures as ExtractionFailedError with the original message", async () => {
    const downloader = new YtDlpDownloader(baseOptions, async () => {
      throw commandError("ERROR: Unsupported URL: https://media.example.test/watch?v=abc123");
    });

    const error = await downloader.download(URL_UNDER_TEST, outputDir).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionFailedError);
    expect(error).not.toBeInstanceOf(AuthRequiredError);
    expect(error).toMatchObject({
      statusCode: 500,
      message: "yt-dlp error: ERROR: Unsupported URL: https://media.example.test/watch?v=abc123",
    });
  });

  it("reports OutputMissingError when no path is reported", async () => {
    const downloader = new YtDlpDownloader(baseOptions, async () => JSON.stringify({ id: "abc123", title: "Clip" }));

    await expect(downloader.download(URL_UNDER_TEST, outputDir)).rejects.toThrowError(
      new OutputMissingError()
    );
  });

  it("reports OutputMissingError when the reported file is not on disk", async () => {
    const downloader = new YtDlpDownloader(baseOptions, async () =>
      JSON.stringify({ filepath: path.join(outputDir, "ghost.mp4") })
    );

    const error = await downloader.download(URL_UNDER_TEST, outputDir).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OutputMissingError);
    expect(error).toMatchObject({ message: "Download succeeded but file was not found: ghost.mp4" });
  });
});
