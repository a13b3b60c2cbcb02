/**
 * Download Validation Schema
 * Zod schema for the download-and-upload request body.
 */

import { z } from "zod";

export const MISSING_URL_MESSAGE = "Missing 'url'.";

/** Marks an issue as "well-formed body, unusable value" (422). */
export const UNPROCESSABLE = { status: 422 } as const;

function isHttpUrl(value: string): boolean {
  return URL.canParse(value) && ["http:", "https:"].includes(new URL(value).protocol);
}

export const downloadRequestSchema = z.object(
  {
    url: z
      .string({ required_error: MISSING_URL_MESSAGE, invalid_type_error: "'url' must be a string." })
      .trim()
      .min(1, MISSING_URL_MESSAGE)
      .superRefine((value, ctx) => {
        if (value && !isHttpUrl(value)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: "'url' must be an absolute http(s) URL.",
            params: UNPROCESSABLE,
          });
        }
      }),
  },
  {
    required_error: "Request body must be a JSON object.",
    invalid_type_error: "Request body must be a JSON object.",
  }
);

export type DownloadRequest = z.infer<typeof downloadRequestSchema>;
