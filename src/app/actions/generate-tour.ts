"use server";

import {
  type TourScriptInput,
  type TourScriptResult,
  generateTourScript,
} from "@/services/tour/tour";

export type GenerateTourInput = TourScriptInput;

export async function generateTourAction(
  input: GenerateTourInput
): Promise<TourScriptResult> {
  return generateTourScript(input);
}
