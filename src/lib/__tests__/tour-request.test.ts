import { describe, expect, it } from "vitest";

import {
  MISSING_API_KEY_MESSAGE,
  MISSING_INTERESTS_MESSAGE,
  MISSING_LOCATION_MESSAGE,
  buildTourAudioFileName,
  validateTourRequest,
} from "../tour-request";

const validInput = {
  location: "Kyoto",
  interests: ["History", "Architecture"],
  duration: 10,
};

describe("validateTourRequest", () => {
  it("asks for an API key before anything else", () => {
    const result = validateTourRequest(
      { location: "", interests: [], duration: 10 },
      { hasApiKey: false }
    );
    expect(result).toEqual({ ok: false, error: MISSING_API_KEY_MESSAGE });
  });

  it("asks for a location before interests", () => {
    const result = validateTourRequest(
      { location: "   ", interests: [], duration: 10 },
      { hasApiKey: true }
    );
    expect(result).toEqual({ ok: false, error: MISSING_LOCATION_MESSAGE });
  });

  it("treats a missing location like an empty one", () => {
    const result = validateTourRequest(
      { interests: ["History"], duration: 10 },
      { hasApiKey: true }
    );
    expect(result).toEqual({ ok: false, error: MISSING_LOCATION_MESSAGE });
  });

  it("requires at least one interest", () => {
    const result = validateTourRequest(
      { ...validInput, interests: [] },
      { hasApiKey: true }
    );
    expect(result).toEqual({ ok: false, error: MISSING_INTERESTS_MESSAGE });
  });

  it("rejects unknown interests", () => {
    const result = validateTourRequest(
      { ...validInput, interests: ["Nightlife"] },
      { hasApiKey: true }
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatch(/^Invalid enum value/);
    }
  });

  it("only accepts durations on the slider steps", () => {
    expect(
      validateTourRequest({ ...validInput, duration: 7 }, { hasApiKey: true })
    ).toEqual({ ok: false, error: "Duration must be in steps of 5 minutes." });
    expect(
      validateTourRequest({ ...validInput, duration: 70 }, { hasApiKey: true })
    ).toEqual({ ok: false, error: "Duration must be at most 60 minutes." });
    expect(
      validateTourRequest({ ...validInput, duration: 0 }, { hasApiKey: true })
    ).toEqual({ ok: false, error: "Duration must be at least 5 minutes." });
  });

  it("rejects very long locations", () => {
    const result = validateTourRequest(
      { ...validInput, location: "x".repeat(201) },
      { hasApiKey: true }
    );
    expect(result).toEqual({
      ok: false,
      error: "Location must be 200 characters or fewer.",
    });
  });

  it("normalises a valid request", () => {
    const result = validateTourRequest(
      {
        location: "  Kyoto ",
        interests: ["Culinary", "History", "Culinary"],
        duration: 25,
      },
      { hasApiKey: true }
    );
    expect(result).toEqual({
      ok: true,
      request: {
        location: "Kyoto",
        interests: ["Culinary", "History"],
        duration: 25,
        voiceStyle: "Friendly & Casual",
      },
    });
  });

  it("keeps a chosen narrator style", () => {
    const result = validateTourRequest(
      { ...validInput, voiceStyle: "Professional & Detailed" },
      { hasApiKey: true }
    );
    expect(result.ok && result.request.voiceStyle).toBe(
      "Professional & Detailed"
    );
  });
});

describe("buildTourAudioFileName", () => {
  it("lower-cases the location and replaces every space", () => {
    expect(buildTourAudioFileName("New York City")).toBe(
      "new_york_city_tour.mp3"
    );
  });

  it("leaves single-word locations intact", () => {
    expect(buildTourAudioFileName("Kyoto")).toBe("kyoto_tour.mp3");
  });
});
