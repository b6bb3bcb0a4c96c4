export const INTEREST_OPTIONS = [
  "History",
  "Architecture",
  "Culinary",
  "Culture",
] as const;

export type Interest = (typeof INTEREST_OPTIONS)[number];

export const DEFAULT_INTERESTS: Interest[] = ["History", "Architecture"];

export const VOICE_STYLE_OPTIONS = [
  "Friendly & Casual",
  "Professional & Detailed",
  "Enthusiastic & Energetic",
] as const;

export type VoiceStyle = (typeof VOICE_STYLE_OPTIONS)[number];

export const DEFAULT_VOICE_STYLE: VoiceStyle = "Friendly & Casual";

export const DURATION_MIN = 5;
export const DURATION_MAX = 60;
export const DURATION_STEP = 5;
export const DEFAULT_DURATION = 10;

export const MAX_LOCATION_LENGTH = 200;
