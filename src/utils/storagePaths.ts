/**
 * Storage path utilities for consistent object key organization.
 * Structure: uploads/[YYYY/MM/DD/]{token}-{fileName} | healthcheck/{token}.txt
 */

import { randomUUID } from "crypto";
import path from "path";

/** 32 hex chars; unguessable and collision-safe across concurrent uploads. */
export function randomToken(): string {
  return randomUUID().replace(/-/g, "");
}

function datePrefix(date: Date): string {
  const yyyy = date.getUTCFullYear();
  const mm = String(date.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(date.getUTCDate()).padStart(2, "0");
  return `${yyyy}/${mm}/${dd}`;
}

export const StoragePaths = {
  /** Uploaded media: uploads/{token}-{name}, or uploads/YYYY/MM/DD/{token}-{name} when dated.
   *  Only the base name is used, so local directories never leak into keys. */
  upload: (filePath: string, options: { date?: Date; token?: string } = {}) => {
    const name = `${options.token ?? randomToken()}-${path.basename(filePath)}`;
    return options.date ? `uploads/${datePrefix(options.date)}/${name}` : `uploads/${name}`;
  },

  /** Storage probe object: healthcheck/{token}.txt */
  healthcheck: (token: string = randomToken()) => `healthcheck/${token}.txt`,
} as const;
