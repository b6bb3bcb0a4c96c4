/**
 * TourManager writes a narrated tour script for a location. Each selected
 * interest is researched by its own guide agent, then a narrator agent merges
 * the sections into one script sized to the requested duration.
 *
 * Example:
 *   const manager = new TourManager({ apiKey });
 *   const script = await manager.run("Lisbon", ["History", "Culinary"], 15);
 */
import { MaxTurnsExceededError, OpenAIProvider, Runner } from "@openai/agents";

import { getTourConfig } from "./config";
import {
  type TourSection,
  buildNarratorPrompt,
  buildSectionPrompt,
  createNarratorAgent,
  createResearchAgent,
} from "./tour-agents";
import {
  DEFAULT_VOICE_STYLE,
  type Interest,
  type VoiceStyle,
} from "./tour-options";
import { type TourSectionPlan, planTour } from "./tour-plan";

export type TourManagerOptions = {
  apiKey: string;
  model?: string;
  maxTurns?: number;
};

export type TourRunOptions = {
  voiceStyle?: VoiceStyle;
};

export class TourManager {
  private runner: Runner;
  private model: string;
  private maxTurns: number;

  constructor(opts: TourManagerOptions) {
    if (!opts.apiKey.trim()) {
      throw new Error("An OpenAI API key is required to write a tour.");
    }

    const config = getTourConfig();
    this.model = opts.model ?? config.agentModel;
    this.maxTurns = opts.maxTurns ?? config.agentMaxTurns;
    this.runner = new Runner({
      modelProvider: new OpenAIProvider({ apiKey: opts.apiKey }),
      tracingDisabled: !config.tracingEnabled,
      workflowName: "Audio tour",
    });
  }

  async run(
    location: string,
    interests: Interest[],
    duration: number,
    options?: TourRunOptions
  ): Promise<string> {
    const voiceStyle = options?.voiceStyle ?? DEFAULT_VOICE_STYLE;
    const plan = planTour(interests, duration);

    console.info("[TourManager] starting", {
      location,
      interests,
      duration,
      voiceStyle,
      totalWords: plan.totalWords,
      model: this.model,
    });

    const researched = await Promise.all(
      plan.sections.map((section) =>
        this.writeSection(location, section, voiceStyle)
      )
    );
    const sections = researched.filter(
      (section): section is TourSection => section !== null
    );

    if (!sections.length) {
      throw new Error(`No tour sections could be written for ${location}.`);
    }

    const narrator = createNarratorAgent(this.model);
    const result = await this.runAgent("narrator", () =>
      this.runner.run(
        narrator,
        buildNarratorPrompt(location, plan, sections, voiceStyle),
        { maxTurns: this.maxTurns }
      )
    );

    const script = result.finalOutput?.script.trim();
    if (!script) {
      throw new Error("The tour guide returned an empty tour script.");
    }

    console.info("[TourManager] completed", {
      location,
      title: result.finalOutput?.title,
      sections: sections.length,
      words: script.split(/\s+/).length,
    });

    return script;
  }

  private async writeSection(
    location: string,
    section: TourSectionPlan,
    voiceStyle: VoiceStyle
  ): Promise<TourSection | null> {
    const agent = createResearchAgent(section.interest, this.model);
    const result = await this.runAgent(section.interest, () =>
      this.runner.run(agent, buildSectionPrompt(location, section, voiceStyle), {
        maxTurns: this.maxTurns,
      })
    );

    const output = result.finalOutput;
    const script = output?.script.trim();
    if (!output || !script) {
      console.warn("[TourManager] section came back empty", {
        location,
        interest: section.interest,
      });
      return null;
    }

    return {
      interest: section.interest,
      title: output.title.trim(),
      script,
    };
  }

  private async runAgent<T>(step: string, execute: () => Promise<T>) {
    try {
      return await execute();
    } catch (error) {
      if (error instanceof MaxTurnsExceededError) {
        console.warn("[TourManager] max turns exceeded", {
          step,
          maxTurns: this.maxTurns,
        });
        throw new Error(
          `The ${step} guide ran out of turns before finishing. Try a shorter tour or fewer interests.`
        );
      }

      console.error("[TourManager] agent run failed", { step, error });
      throw error;
    }
  }
}
