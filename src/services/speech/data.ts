import type { VoiceStyle } from "@/lib/tour-options";

export type VoiceStyleConfig = {
  tone: string;
  speed: number;
};

export const VOICE_STYLE_CONFIG: Record<VoiceStyle, VoiceStyleConfig> = {
  "Friendly & Casual": {
    tone: "warm, relaxed and conversational, like a friend showing someone around",
    speed: 1.0,
  },
  "Professional & Detailed": {
    tone: "polished and informative, with precise names, dates and context",
    speed: 0.95,
  },
  "Enthusiastic & Energetic": {
    tone: "upbeat and lively, full of wonder and vivid exclamations",
    speed: 1.1,
  },
};
