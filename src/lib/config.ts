import { tmpdir } from "os";
import { resolve } from "path";
import { z } from "zod";

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => {
    const lookup = value?.trim().toLowerCase();
    return lookup === "1" || lookup === "true" || lookup === "yes";
  });

function positiveInt(fallback: number) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number.parseInt(value, 10);
      return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
    });
}

function textWithDefault(fallback: string) {
  return z
    .string()
    .optional()
    .transform((value) => value?.trim() || fallback);
}

const ENV_SCHEMA = z.object({
  OPENAI_API_KEY: z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined),
  TOUR_AGENT_MODEL: textWithDefault("gpt-4o-mini"),
  TOUR_AGENT_MAX_TURNS: positiveInt(10),
  TOUR_TTS_MODEL: textWithDefault("tts-1"),
  TOUR_TTS_VOICE: textWithDefault("nova"),
  TOUR_AUDIO_DIR: textWithDefault(resolve(tmpdir(), "audio-tours")),
  TOUR_TRACING_ENABLED: booleanFlag,
});

export type TourConfig = {
  openaiApiKey?: string;
  agentModel: string;
  agentMaxTurns: number;
  ttsModel: string;
  ttsVoice: string;
  audioOutputDir: string;
  tracingEnabled: boolean;
};

export function getTourConfig(
  env: Record<string, string | undefined> = process.env
): TourConfig {
  const parsed = ENV_SCHEMA.parse(env);

  return {
    openaiApiKey: parsed.OPENAI_API_KEY,
    agentModel: parsed.TOUR_AGENT_MODEL,
    agentMaxTurns: parsed.TOUR_AGENT_MAX_TURNS,
    ttsModel: parsed.TOUR_TTS_MODEL,
    ttsVoice: parsed.TOUR_TTS_VOICE,
    audioOutputDir: resolve(parsed.TOUR_AUDIO_DIR),
    tracingEnabled: parsed.TOUR_TRACING_ENABLED,
  };
}

/**
 * The visitor's own key wins over the server's; blank strings count as absent.
 */
export function resolveOpenAIKey(
  provided: unknown,
  config: TourConfig = getTourConfig()
): string | undefined {
  if (typeof provided === "string" && provided.trim()) {
    return provided.trim();
  }

  return config.openaiApiKey;
}
