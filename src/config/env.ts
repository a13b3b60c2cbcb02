/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if required variables are missing.
 */

import path from "path";
import { ConfigurationError } from "../utils/errors.js";

/** Server configuration */
export const NODE_ENV = process.env.NODE_ENV || "development";

export const DEFAULT_B2_ENDPOINT = "https://s3.us-west-002.backblazeb2.com";
/** 7 days, the longest lifetime SigV4 presigning allows. */
export const MAX_PRESIGNED_TTL_SECONDS = 7 * 24 * 60 * 60;

/** Where yt-dlp reads cookies from, if anywhere. */
export type CookieSource =
  | { kind: "none" }
  | { kind: "browser"; browser: string; profile?: string }
  | { kind: "file"; path: string };

export type DisabledStorageConfig = { enabled: false };

export type EnabledStorageConfig = {
  enabled: true;
  keyId: string;
  applicationKey: string;
  bucket: string;
  endpoint: string;
  region: string;
  publicRead: boolean;
  /** Overrides `<endpoint>/<bucket>` when building public URLs. */
  publicBaseUrl?: string;
  presignedTtlSeconds: number;
  /** Namespace object keys by UTC date (uploads/YYYY/MM/DD/...). */
  datePrefixedKeys: boolean;
};

export type StorageConfig = DisabledStorageConfig | EnabledStorageConfig;

export interface AppConfig {
  port: number;
  downloadDir: string;
  staticDir: string;
  /** Download into a per-request temp dir removed after the response. */
  useTempWorkDir: boolean;
  maxConcurrentDownloads: number;
  ytdlpPath: string;
  socketTimeoutSeconds?: number;
  cookies: CookieSource;
  storage: StorageConfig;
}

type Env = Record<string, string | undefined>;

/**
 * Reads the process environment into a frozen AppConfig.
 * Throws ConfigurationError naming every missing storage credential.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    port: readInt(env, "PORT", 8000, { min: 0, max: 65535 }),
    downloadDir: path.resolve(readString(env, "DOWNLOAD_DIR") ?? "downloads"),
    staticDir: path.resolve(readString(env, "STATIC_DIR") ?? "public"),
    useTempWorkDir: readBool(env, "DOWNLOAD_TEMP_WORKDIR", false),
    maxConcurrentDownloads: readInt(env, "DOWNLOAD_MAX_CONCURRENT", 2, { min: 1 }),
    ytdlpPath: readString(env, "YTDLP_PATH") ?? "yt-dlp",
    socketTimeoutSeconds: readOptionalInt(env, "YTDLP_SOCKET_TIMEOUT", { min: 1 }),
    cookies: readCookieSource(env),
    storage: readStorageConfig(env),
  };

  return Object.freeze(config);
}

function readStorageConfig(env: Env): StorageConfig {
  if (!readBool(env, "B2_ENABLED", false)) {
    return { enabled: false };
  }

  const keyId = readString(env, "B2_KEY_ID");
  const applicationKey = readString(env, "B2_APPLICATION_KEY");
  const bucket = readString(env, "B2_BUCKET_NAME");

  const missing: string[] = [];
  if (!keyId) missing.push("B2_KEY_ID");
  if (!applicationKey) missing.push("B2_APPLICATION_KEY");
  if (!bucket) missing.push("B2_BUCKET_NAME");
  if (!keyId || !applicationKey || !bucket) {
    throw new ConfigurationError(`Missing storage env vars: ${missing.join(", ")}`);
  }

  const endpoint = (readString(env, "B2_S3_ENDPOINT") ?? DEFAULT_B2_ENDPOINT).replace(/\/+$/, "");

  return {
    enabled: true,
    keyId,
    applicationKey,
    bucket,
    endpoint,
    region: readString(env, "B2_REGION") ?? regionFromEndpoint(endpoint),
    publicRead: readBool(env, "B2_PUBLIC_READ", true),
    publicBaseUrl: readString(env, "B2_PUBLIC_BASE_URL"),
    presignedTtlSeconds: readInt(env, "B2_PRESIGNED_TTL", MAX_PRESIGNED_TTL_SECONDS, {
      min: 1,
      max: MAX_PRESIGNED_TTL_SECONDS,
    }),
    datePrefixedKeys: readBool(env, "B2_DATE_PREFIX", false),
  };
}

/**
 * COOKIES_FROM_BROWSER wins over COOKIES_FILE.
 * Browser format: "chrome", "chrome:Default", "firefox:default-release".
 */
function readCookieSource(env: Env): CookieSource {
  const fromBrowser = readString(env, "COOKIES_FROM_BROWSER");
  if (fromBrowser) {
    const separator = fromBrowser.indexOf(":");
    if (separator === -1) {
      return { kind: "browser", browser: fromBrowser };
    }
    const browser = fromBrowser.slice(0, separator);
    const profile = fromBrowser.slice(separator + 1);
    if (!browser) {
      throw new ConfigurationError("COOKIES_FROM_BROWSER must start with a browser name");
    }
    return profile ? { kind: "browser", browser, profile } : { kind: "browser", browser };
  }

  const file = readString(env, "COOKIES_FILE");
  if (file) {
    return { kind: "file", path: path.resolve(file) };
  }

  return { kind: "none" };
}

/**
 * Backblaze endpoints look like https://s3.<region>.backblazeb2.com.
 */
export function regionFromEndpoint(endpoint: string): string {
  try {
    const match = /^s3\.([a-z0-9-]+)\./.exec(new URL(endpoint).hostname);
    return match ? match[1] : "us-east-1";
  } catch {
    throw new ConfigurationError(`B2_S3_ENDPOINT is not a valid URL: ${endpoint}`);
  }
}

/** Empty and whitespace-only values count as unset. */
function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const value = readString(env, key);
  if (value === undefined) return fallback;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

function readOptionalInt(
  env: Env,
  key: string,
  bounds: { min?: number; max?: number } = {}
): number | undefined {
  const value = readString(env, key);
  if (value === undefined) return undefined;

  const parsed = Number(value);
  const { min = Number.MIN_SAFE_INTEGER, max = Number.MAX_SAFE_INTEGER } = bounds;
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigurationError(`${key} must be an integer between ${min} and ${max}, got "${value}"`);
  }
  return parsed;
}

function readInt(
  env: Env,
  key: string,
  fallback: number,
  bounds: { min?: number; max?: number } = {}
): number {
  return readOptionalInt(env, key, bounds) ?? fallback;
}
