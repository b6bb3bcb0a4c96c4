import type { Interest } from "./tour-options";

export const WORDS_PER_MINUTE = 150;

export type TourSectionPlan = {
  interest: Interest;
  minutes: number;
  targetWords: number;
};

export type TourPlan = {
  totalMinutes: number;
  totalWords: number;
  sections: TourSectionPlan[];
};

/**
 * Splits the tour evenly across the selected interests, in selection order.
 * Words left over by the integer split go to the first section.
 */
export function planTour(interests: Interest[], duration: number): TourPlan {
  if (!interests.length) {
    throw new Error("A tour needs at least one interest.");
  }

  const totalWords = Math.round(duration * WORDS_PER_MINUTE);
  const wordsPerSection = Math.floor(totalWords / interests.length);
  const remainder = totalWords - wordsPerSection * interests.length;
  const minutesPerSection =
    Math.round((duration / interests.length) * 10) / 10;

  return {
    totalMinutes: duration,
    totalWords,
    sections: interests.map((interest, index) => ({
      interest,
      minutes: minutesPerSection,
      targetWords: index === 0 ? wordsPerSection + remainder : wordsPerSection,
    })),
  };
}
