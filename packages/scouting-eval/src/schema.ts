import { z } from "zod";
import { RatingValidationError } from "./errors";
import type { Rating } from "./types";

export const RATING_VERSION = "1.0";
export const AGGREGATE_SCHEMA_VERSION = "1.0";

const ratingField = z.number().int().min(1).max(9);
const confidenceField = z.number().int().min(0).max(100);

/**
 * What backends are asked to return. Every property is required so the
 * schema stays valid for strict structured-output modes.
 */
export const ratingResponseSchema = z.object({
  current_rating: ratingField.describe("Integer 1-9 for current performance"),
  future_rating: ratingField.describe("Integer 1-9 for future potential"),
  current_confidence: confidenceField.describe(
    "0-100 confidence for current rating"
  ),
  future_confidence: confidenceField.describe(
    "0-100 confidence for future rating"
  ),
  reasoning: z
    .array(z.string())
    .length(3)
    .describe("Exactly three concise bullet points explaining the ratings"),
});

/**
 * Accepts the model's own `model_name`/`timestamp` claims so they do not fail
 * validation; both are replaced before a rating is stored.
 */
export const ratingCandidateSchema = ratingResponseSchema.extend({
  version: z.string().optional(),
  model_name: z.unknown().optional(),
  timestamp: z.unknown().optional(),
});

export type RatingResponse = z.infer<typeof ratingResponseSchema>;
export type RatingCandidate = z.infer<typeof ratingCandidateSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${location}: ${issue.message}`;
  });
}

export function validateRating(value: unknown): RatingCandidate {
  const parsed = ratingCandidateSchema.safeParse(value);
  if (!parsed.success) {
    throw new RatingValidationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

export function buildRating(
  candidate: RatingCandidate,
  modelName: string,
  timestamp: string
): Rating {
  return {
    model_name: modelName,
    current_rating: candidate.current_rating,
    future_rating: candidate.future_rating,
    current_confidence: candidate.current_confidence,
    future_confidence: candidate.future_confidence,
    reasoning: [...candidate.reasoning],
    timestamp,
    version: candidate.version ?? RATING_VERSION,
  };
}
