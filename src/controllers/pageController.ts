/**
 * Page Controller
 * Serves the landing page, or a one-line fallback when none is installed.
 */

import { Request, Response, NextFunction } from "express";
import { access } from "fs/promises";
import path from "path";

export const FALLBACK_PAGE =
  "<h1>media-relay</h1>" +
  "<p>POST <code>/api/download-and-upload</code> with JSON <code>{\"url\": \"...\"}</code>.</p>";

export function createPageController(staticDir: string) {
  const indexPath = path.join(staticDir, "index.html");

  /**
   * GET /
   */
  async function index(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await access(indexPath);
    } catch {
      res.type("html").send(FALLBACK_PAGE);
      return;
    }
    res.sendFile(indexPath, (error) => {
      if (error) next(error);
    });
  }

  return { index };
}
