/**
 * Validation Middleware
 * Validates request bodies against Zod schemas.
 */

import { Request, Response, NextFunction } from "express";
import { ZodSchema, ZodError, type ZodIssue } from "zod";

/**
 * 422 when every issue is marked unprocessable (see UNPROCESSABLE), else 400.
 */
export function statusForIssues(issues: ZodIssue[]): number {
  const unprocessable = issues.every(
    (issue) => issue.code === "custom" && issue.params?.status === 422
  );
  return issues.length > 0 && unprocessable ? 422 : 400;
}

/**
 * Validates request body against a Zod schema.
 * Responds with the first issue as `detail` and all issues under `errors`.
 */
export function validateBody(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(statusForIssues(error.issues)).json({
          detail: error.issues[0]?.message ?? "Validation failed",
          errors: error.issues.map((e) => ({
            path: e.path.join("."),
            message: e.message,
          })),
        });
      } else {
        next(error);
      }
    }
  };
}
