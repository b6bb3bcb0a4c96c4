"use server";

import {
  type TourAudioInput,
  type TourAudioResult,
  narrateTour,
} from "@/services/tour/tour";

export type NarrateTourInput = TourAudioInput;

export async function narrateTourAction(
  input: NarrateTourInput
): Promise<TourAudioResult> {
  return narrateTour(input);
}
