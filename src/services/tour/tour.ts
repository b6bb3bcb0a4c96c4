import { resolveOpenAIKey } from "@/lib/config";
import { describeError } from "@/lib/errors";
import { TourManager } from "@/lib/tour-manager";
import {
  DEFAULT_VOICE_STYLE,
  VOICE_STYLE_OPTIONS,
  type VoiceStyle,
} from "@/lib/tour-options";
import {
  MISSING_API_KEY_MESSAGE,
  type TourRequest,
  buildTourAudioFileName,
  validateTourRequest,
} from "@/lib/tour-request";
import { synthesizeTourAudio } from "@/services/speech/speech";

export type TourScriptInput = {
  location?: unknown;
  interests?: unknown;
  duration?: unknown;
  voiceStyle?: unknown;
  apiKey?: unknown;
};

export type TourScriptResult =
  | { ok: true; tour: string; request: TourRequest }
  | { ok: false; error: string; reason: "invalid" | "failed" };

export type TourAudioInput = {
  text: unknown;
  location: string;
  voiceStyle?: unknown;
  apiKey?: unknown;
};

export type TourAudioPayload = {
  dataUrl: string;
  fileName: string;
  mimeType: string;
};

export type TourAudioResult =
  | { ok: true; audio: TourAudioPayload }
  | { ok: false; error: string };

function normaliseVoiceStyle(value: unknown): VoiceStyle {
  return VOICE_STYLE_OPTIONS.find((style) => style === value) ??
    DEFAULT_VOICE_STYLE;
}

export async function generateTourScript(
  input: TourScriptInput
): Promise<TourScriptResult> {
  const apiKey = resolveOpenAIKey(input.apiKey);
  const validation = validateTourRequest(
    {
      location: input.location,
      interests: input.interests,
      duration: input.duration,
      voiceStyle: input.voiceStyle ?? undefined,
    },
    { hasApiKey: Boolean(apiKey) }
  );

  if (!validation.ok) {
    return { ok: false, reason: "invalid", error: validation.error };
  }
  if (!apiKey) {
    return { ok: false, reason: "invalid", error: MISSING_API_KEY_MESSAGE };
  }

  const { request } = validation;

  try {
    const manager = new TourManager({ apiKey });
    const tour = await manager.run(
      request.location,
      request.interests,
      request.duration,
      { voiceStyle: request.voiceStyle }
    );
    return { ok: true, tour, request };
  } catch (error) {
    console.error("[Tour] tour generation failed", {
      location: request.location,
      error,
    });
    return {
      ok: false,
      reason: "failed",
      error: `Tour generation failed: ${describeError(error)}`,
    };
  }
}

export async function narrateTour({
  text,
  location,
  voiceStyle,
  apiKey,
}: TourAudioInput): Promise<TourAudioResult> {
  if (typeof text !== "string" || !text.trim()) {
    return {
      ok: false,
      error: "Audio generation failed: Cannot generate audio without tour text.",
    };
  }

  const resolvedKey = resolveOpenAIKey(apiKey);
  if (!resolvedKey) {
    return {
      ok: false,
      error: "Audio generation failed: API key not found.",
    };
  }

  try {
    const { audio, mimeType } = await synthesizeTourAudio({
      text,
      apiKey: resolvedKey,
      voiceStyle: normaliseVoiceStyle(voiceStyle),
    });

    return {
      ok: true,
      audio: {
        dataUrl: `data:${mimeType};base64,${audio.toString("base64")}`,
        fileName: buildTourAudioFileName(location),
        mimeType,
      },
    };
  } catch (error) {
    console.error("[Tour] audio generation failed", { location, error });
    return {
      ok: false,
      error: `Audio generation failed: ${describeError(error)}`,
    };
  }
}
