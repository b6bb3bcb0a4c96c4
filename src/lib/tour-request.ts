import { z } from "zod";

import {
  DEFAULT_VOICE_STYLE,
  DURATION_MAX,
  DURATION_MIN,
  DURATION_STEP,
  INTEREST_OPTIONS,
  MAX_LOCATION_LENGTH,
  VOICE_STYLE_OPTIONS,
} from "./tour-options";

export const MISSING_API_KEY_MESSAGE =
  "Please enter your OpenAI API key in the sidebar.";
export const MISSING_LOCATION_MESSAGE = "Please enter a location.";
export const MISSING_INTERESTS_MESSAGE = "Please select at least one interest.";

const TOUR_REQUEST_SCHEMA = z.object({
  location: z
    .string({
      required_error: MISSING_LOCATION_MESSAGE,
      invalid_type_error: MISSING_LOCATION_MESSAGE,
    })
    .trim()
    .min(1, MISSING_LOCATION_MESSAGE)
    .max(
      MAX_LOCATION_LENGTH,
      `Location must be ${MAX_LOCATION_LENGTH} characters or fewer.`
    ),
  interests: z
    .array(z.enum(INTEREST_OPTIONS), {
      required_error: MISSING_INTERESTS_MESSAGE,
      invalid_type_error: MISSING_INTERESTS_MESSAGE,
    })
    .min(1, MISSING_INTERESTS_MESSAGE)
    .transform((interests) => Array.from(new Set(interests))),
  duration: z
    .number({
      required_error: "Duration must be a number of minutes.",
      invalid_type_error: "Duration must be a number of minutes.",
    })
    .int()
    .min(DURATION_MIN, `Duration must be at least ${DURATION_MIN} minutes.`)
    .max(DURATION_MAX, `Duration must be at most ${DURATION_MAX} minutes.`)
    .multipleOf(
      DURATION_STEP,
      `Duration must be in steps of ${DURATION_STEP} minutes.`
    ),
  voiceStyle: z.enum(VOICE_STYLE_OPTIONS).default(DEFAULT_VOICE_STYLE),
});

export type TourRequest = z.output<typeof TOUR_REQUEST_SCHEMA>;

export type TourRequestValidation =
  | { ok: true; request: TourRequest }
  | { ok: false; error: string };

/**
 * Checks a tour form submission. Reports the first problem only, in the
 * order the form presents them: API key, location, interests.
 */
export function validateTourRequest(
  input: unknown,
  opts: { hasApiKey: boolean }
): TourRequestValidation {
  if (!opts.hasApiKey) {
    return { ok: false, error: MISSING_API_KEY_MESSAGE };
  }

  const parsed = TOUR_REQUEST_SCHEMA.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, error: issue?.message ?? "Invalid tour request." };
  }

  return { ok: true, request: parsed.data };
}

export function buildTourAudioFileName(location: string): string {
  return `${location.toLowerCase().replace(/ /g, "_")}_tour.mp3`;
}
