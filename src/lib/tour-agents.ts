/**
 * Agent definitions for the audio tour pipeline: one research guide per
 * interest (each allowed to search the web) and a final narrator that
 * stitches their sections into one script meant to be read aloud.
 */
import { Agent, webSearchTool } from "@openai/agents";
import { z } from "zod";

import { INTEREST_GUIDES } from "@/data/interest-guides";
import { VOICE_STYLE_CONFIG } from "@/services/speech/data";

import type { VoiceStyle } from "./tour-options";
import type { TourPlan, TourSectionPlan } from "./tour-plan";

export const TOUR_SECTION_OUTPUT = z.object({
  title: z.string(),
  script: z.string(),
});

export type TourSection = z.infer<typeof TOUR_SECTION_OUTPUT> & {
  interest: TourSectionPlan["interest"];
};

export const TOUR_SCRIPT_OUTPUT = z.object({
  title: z.string(),
  script: z.string(),
});

const SPOKEN_FORMAT_RULES = [
  "Write for the ear: the text will be read aloud by a text-to-speech voice.",
  "Use plain flowing paragraphs. No markdown, headings, bullet points, emojis or URLs.",
  "Spell out symbols and abbreviations the way a guide would say them.",
  "Do not invent exact prices, opening hours or ticket rules; say when something may have changed.",
].join(" ");

export function createResearchAgent(
  interest: TourSectionPlan["interest"],
  model: string
) {
  const guide = INTEREST_GUIDES[interest];

  return new Agent({
    name: guide.agentName,
    model,
    instructions: [
      `You are ${guide.expertise}, writing one section of a personalised audio walking tour.`,
      `Cover: ${guide.focus.join("; ")}.`,
      "Use the web search tool to check facts about the location before writing.",
      "Stay on your own topic; other guides cover the rest of the tour.",
      SPOKEN_FORMAT_RULES,
      "Return a short section title and the section script.",
    ].join(" "),
    tools: [webSearchTool({ searchContextSize: "medium" })],
    outputType: TOUR_SECTION_OUTPUT,
  });
}

export function createNarratorAgent(model: string) {
  return new Agent({
    name: "Tour Narrator",
    model,
    instructions: [
      "You are the lead narrator of a personalised audio walking tour.",
      "You receive sections written by specialist guides and turn them into one continuous script.",
      "Open with a welcome that sets the scene, connect the sections with natural transitions, and close with a warm farewell.",
      "Keep every fact from the sections; trim repetition rather than facts.",
      SPOKEN_FORMAT_RULES,
      "Return the tour title and the full script.",
    ].join(" "),
    outputType: TOUR_SCRIPT_OUTPUT,
  });
}

export function buildSectionPrompt(
  location: string,
  section: TourSectionPlan,
  voiceStyle: VoiceStyle
): string {
  return [
    `Location: ${location}`,
    `Topic: ${section.interest}`,
    `Time for this section: about ${section.minutes} minutes of narration`,
    `Target length: about ${section.targetWords} words`,
    `Narrator style: ${voiceStyle} (${VOICE_STYLE_CONFIG[voiceStyle].tone})`,
  ].join("\n");
}

export function buildNarratorPrompt(
  location: string,
  plan: TourPlan,
  sections: TourSection[],
  voiceStyle: VoiceStyle
): string {
  const sectionBlocks = sections.map((section, index) =>
    [
      `Section ${index + 1} (${section.interest}): ${section.title}`,
      section.script,
    ].join("\n")
  );

  return [
    `Location: ${location}`,
    `Tour length: ${plan.totalMinutes} minutes, about ${plan.totalWords} words in total`,
    `Narrator style: ${voiceStyle} (${VOICE_STYLE_CONFIG[voiceStyle].tone})`,
    "Sections in the order they should be told:",
    ...sectionBlocks,
  ].join("\n\n");
}
