import { z } from "zod";

import type { ProviderSpec } from "@/types/search";

export const QUERY_MARKER = "{query}";

const pathSchema = z
  .string()
  .trim()
  .max(512)
  .refine((value) => value.length === 0 || value.split(".").every((segment) => segment.length > 0), {
    message: "Path segments must not be empty"
  });

export const providerSpecSchema = z.object({
  name: z.string().trim().min(1, "Provider name is required").max(64),
  urlTemplate: z
    .string()
    .trim()
    .min(1)
    .superRefine((value, ctx) => {
      for (const problem of checkUrlTemplate(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
      }
    }),
  headers: z.record(z.string()).default({}),
  resultsPath: pathSchema.default(""),
  titlePath: pathSchema,
  urlPath: pathSchema,
  contentPath: pathSchema.default(""),
  enabled: z.boolean().default(true),
  timeframeParam: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_.-]+$/, "timeframeParam must be a plain query parameter name")
    .optional()
});

export type ProviderSpecInput = z.input<typeof providerSpecSchema>;

export function countMarkers(template: string): number {
  return template.split(QUERY_MARKER).length - 1;
}

function checkUrlTemplate(template: string): string[] {
  const markers = countMarkers(template);
  if (markers !== 1) {
    return [`urlTemplate must contain ${QUERY_MARKER} exactly once (found ${markers})`];
  }

  let parsed: URL;
  try {
    parsed = new URL(template.replace(QUERY_MARKER, "placeholder"));
  } catch {
    return [`urlTemplate is not a valid absolute URL: ${template}`];
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return [`urlTemplate must use http or https (got ${parsed.protocol})`];
  }

  return [];
}

/**
 * Lists what is wrong with a single spec. An empty list means the spec can be dispatched.
 */
export function validateProviderSpec(spec: ProviderSpec): string[] {
  const problems: string[] = [];

  if (spec.name.trim().length === 0) {
    problems.push("Provider name is required");
  }

  problems.push(...checkUrlTemplate(spec.urlTemplate));

  for (const [header, value] of Object.entries(spec.headers)) {
    if (typeof value !== "string" || header.trim().length === 0) {
      problems.push(`Header "${header}" must have a non-empty name and a string value`);
    }
  }

  return problems;
}

export function buildRequestUrl(
  spec: ProviderSpec,
  query: string,
  timeframe?: string
): string {
  const url = spec.urlTemplate.replace(QUERY_MARKER, () => encodeURIComponent(query));
  if (!timeframe || !spec.timeframeParam) {
    return url;
  }

  const separator = url.includes("?") ? "&" : "?";
  return `${url}${separator}${encodeURIComponent(spec.timeframeParam)}=${encodeURIComponent(timeframe)}`;
}

export function parseProviderSpec(input: unknown): ProviderSpec {
  return providerSpecSchema.parse(input);
}
