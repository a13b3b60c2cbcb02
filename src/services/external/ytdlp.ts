/**
 * yt-dlp Download Service
 * Downloads media with the yt-dlp binary and reports where the file landed.
 */

import { execa } from "execa";
import { stat } from "fs/promises";
import path from "path";
import { z } from "zod";
import type { CookieSource } from "../../config/env.js";
import {
  AuthRequiredError,
  ExtractionFailedError,
  OutputMissingError,
} from "../../utils/errors.js";
import { isBotCheckMessage } from "../../utils/errorMessages.js";

/** Title capped at 60 chars, id appended so re-downloads of different videos never collide. */
export const OUTPUT_TEMPLATE = "%(title).60s-%(id)s.%(ext)s";

/** Best video+audio merged, or the best single stream when that is all there is. */
export const FORMAT_SELECTOR = "bv*+ba/b";

export interface ExtractionResult {
  filePath: string;
  title?: string;
  durationSeconds?: number;
  id?: string;
}

export interface MediaDownloader {
  download(url: string, outputDir: string): Promise<ExtractionResult>;
}

export interface YtDlpOptions {
  binaryPath: string;
  cookies: CookieSource;
  socketTimeoutSeconds?: number;
}

/** Runs the binary and resolves with its stdout. Rejects on non-zero exit. */
export type YtDlpRunner = (binaryPath: string, args: string[]) => Promise<string>;

const requestedDownloadSchema = z.object({ filepath: z.string().nullish() }).passthrough();

const infoSchema = z
  .object({
    id: z.union([z.string(), z.number()]).nullish(),
    title: z.string().nullish(),
    duration: z.number().nullish(),
    filepath: z.string().nullish(),
    requested_downloads: z.array(requestedDownloadSchema).nullish(),
  })
  .passthrough();

export type YtDlpInfo = z.infer<typeof infoSchema>;

/**
 * yt-dlp reports the produced file in one of two places.
 */
export type OutputLocation =
  | { kind: "requested-downloads"; filePath: string }
  | { kind: "top-level"; filePath: string }
  | { kind: "missing" };

/**
 * Builds the yt-dlp argument list. Same options in, same args out.
 */
export function buildYtDlpArgs(options: YtDlpOptions, outputDir: string, url: string): string[] {
  const args = [
    "--dump-single-json",
    "--no-simulate",
    "--no-playlist",
    "--no-warnings",
    "--no-progress",
    "--restrict-filenames",
    "--output", path.join(outputDir, OUTPUT_TEMPLATE),
    "--format", FORMAT_SELECTOR,
    "--merge-output-format", "mp4",
    "--remux-video", "mp4",
  ];

  if (options.socketTimeoutSeconds !== undefined) {
    args.push("--socket-timeout", String(options.socketTimeoutSeconds));
  }

  switch (options.cookies.kind) {
    case "browser": {
      const { browser, profile } = options.cookies;
      args.push("--cookies-from-browser", profile ? `${browser}:${profile}` : browser);
      break;
    }
    case "file":
      args.push("--cookies", options.cookies.path);
      break;
    case "none":
      break;
  }

  args.push("--", url);
  return args;
}

/**
 * Checks requested_downloads first, then the top-level filepath.
 */
export function locateOutput(info: YtDlpInfo): OutputLocation {
  const requested = info.requested_downloads?.[0]?.filepath;
  if (requested) {
    return { kind: "requested-downloads", filePath: requested };
  }
  if (info.filepath) {
    return { kind: "top-level", filePath: info.filepath };
  }
  return { kind: "missing" };
}

export function extractOutputPath(info: YtDlpInfo): string | null {
  const location = locateOutput(info);
  return location.kind === "missing" ? null : location.filePath;
}

/**
 * Parses the JSON document yt-dlp prints last on stdout.
 */
export function parseYtDlpOutput(stdout: string): YtDlpInfo {
  const lastLine = stdout
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .pop();

  if (!lastLine) {
    throw new ExtractionFailedError("yt-dlp printed no metadata");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(lastLine);
  } catch {
    throw new ExtractionFailedError(`yt-dlp printed unreadable metadata: ${lastLine.slice(0, 200)}`);
  }

  const parsed = infoSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ExtractionFailedError(`yt-dlp printed unexpected metadata: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** stderr carries yt-dlp's own "ERROR: ..." line; prefer it over the exit summary. */
export function describeRunnerError(error: unknown): string {
  if (error instanceof Error) {
    const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr.trim() : "";
    return stderr || error.message;
  }
  return String(error);
}

const runYtDlp: YtDlpRunner = async (binaryPath, args) => {
  const { stdout } = await execa(binaryPath, args);
  return stdout;
};

export class YtDlpDownloader implements MediaDownloader {
  constructor(
    private readonly options: YtDlpOptions,
    private readonly run: YtDlpRunner = runYtDlp
  ) {}

  /**
   * Downloads `url` into `outputDir`.
   * Throws AuthRequiredError, ExtractionFailedError or OutputMissingError.
   */
  async download(url: string, outputDir: string): Promise<ExtractionResult> {
    console.log(`[ytdlp] Downloading: ${url}`);
    const startedAt = Date.now();

    let stdout: string;
    try {
      stdout = await this.run(this.options.binaryPath, buildYtDlpArgs(this.options, outputDir, url));
    } catch (error) {
      const message = describeRunnerError(error);
      console.error(`[ytdlp] Error: ${message}`);
      if (isBotCheckMessage(message)) {
        throw new AuthRequiredError(message);
      }
      throw new ExtractionFailedError(message);
    }

    const info = parseYtDlpOutput(stdout);
    const filePath = extractOutputPath(info);
    if (!filePath) {
      throw new OutputMissingError();
    }
    if (!(await isFile(filePath))) {
      throw new OutputMissingError(path.basename(filePath));
    }

    console.log(`[ytdlp] ✓ ${path.basename(filePath)} in ${((Date.now() - startedAt) / 1000).toFixed(1)}s`);

    return {
      filePath,
      title: info.title ?? undefined,
      durationSeconds: info.duration ?? undefined,
      id: info.id == null ? undefined : String(info.id),
    };
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}
