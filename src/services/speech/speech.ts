import { randomUUID } from "crypto";
import { promises as fs } from "fs";
import { resolve } from "path";
import OpenAI from "openai";

import { getTourConfig } from "@/lib/config";
import { DEFAULT_VOICE_STYLE, type VoiceStyle } from "@/lib/tour-options";

import { VOICE_STYLE_CONFIG } from "./data";

// Input limit of the OpenAI speech endpoint, in characters.
export const SPEECH_INPUT_LIMIT = 4096;

export type TourAudioRequest = {
  text: string;
  apiKey: string;
  voiceStyle?: VoiceStyle;
  model?: string;
  voice?: string;
  outputDir?: string;
};

export type TourAudio = {
  audio: Buffer;
  mimeType: "audio/mpeg";
  filePath: string | null;
};

function hardSplit(text: string, limit: number): string[] {
  const pieces: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (word.length > limit) {
      if (current) {
        pieces.push(current);
        current = "";
      }
      for (let start = 0; start < word.length; start += limit) {
        pieces.push(word.slice(start, start + limit));
      }
      continue;
    }

    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > limit) {
      pieces.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current) {
    pieces.push(current);
  }

  return pieces;
}

/**
 * Breaks text into pieces the speech endpoint accepts, preferring paragraph
 * then sentence boundaries, and only splitting between words as a last resort.
 */
export function splitSpeechText(
  text: string,
  limit = SPEECH_INPUT_LIMIT
): string[] {
  const trimmed = text.trim();
  if (!trimmed) {
    return [];
  }
  if (trimmed.length <= limit) {
    return [trimmed];
  }

  const units = trimmed
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean)
    .flatMap((paragraph) => {
      if (paragraph.length <= limit) {
        return [paragraph];
      }
      const sentences = paragraph.match(
        /[^.!?]+[.!?]+["')\]]*\s*|[^.!?]+$|[.!?]+["')\]]*\s*/g
      ) ?? [paragraph];
      return sentences
        .map((sentence) => sentence.trim())
        .filter(Boolean)
        .flatMap((sentence) =>
          sentence.length <= limit ? [sentence] : hardSplit(sentence, limit)
        );
    });

  const chunks: string[] = [];
  let current = "";

  for (const unit of units) {
    const candidate = current ? `${current}\n\n${unit}` : unit;
    if (candidate.length > limit) {
      chunks.push(current);
      current = unit;
    } else {
      current = candidate;
    }
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
}

function buildAudioFilePath(outputDir: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  return resolve(outputDir, `tour-${timestamp}-${randomUUID()}.mp3`);
}

async function saveAudioToFile(
  audio: Buffer,
  outputDir: string
): Promise<string | null> {
  if (!audio.length) {
    return null;
  }

  try {
    await fs.mkdir(outputDir, { recursive: true });
    const filePath = buildAudioFilePath(outputDir);
    await fs.writeFile(filePath, audio);
    console.info("[OpenAI][Speech] saved tour audio to", filePath);
    return filePath;
  } catch (error) {
    console.warn("[OpenAI][Speech] failed to persist tour audio", error);
    return null;
  }
}

/**
 * Narrates a tour script with OpenAI text-to-speech and keeps a copy of the
 * MP3 in the audio output directory.
 */
export async function synthesizeTourAudio({
  text,
  apiKey,
  voiceStyle = DEFAULT_VOICE_STYLE,
  model,
  voice,
  outputDir,
}: TourAudioRequest): Promise<TourAudio> {
  const chunks = splitSpeechText(text);
  if (!chunks.length) {
    throw new Error("Cannot generate audio without tour text.");
  }

  const config = getTourConfig();
  const client = new OpenAI({ apiKey });
  const speechModel = model ?? config.ttsModel;
  const speechVoice = voice ?? config.ttsVoice;
  const { speed } = VOICE_STYLE_CONFIG[voiceStyle];

  console.info("[OpenAI][Speech] starting", {
    model: speechModel,
    voice: speechVoice,
    voiceStyle,
    characters: text.length,
    chunks: chunks.length,
  });

  const buffers: Buffer[] = [];
  for (const chunk of chunks) {
    const response = await client.audio.speech.create({
      model: speechModel,
      voice: speechVoice,
      input: chunk,
      response_format: "mp3",
      speed,
    });
    buffers.push(Buffer.from(await response.arrayBuffer()));
  }

  const audio = Buffer.concat(buffers);
  if (!audio.length) {
    throw new Error("OpenAI returned empty audio.");
  }

  const filePath = await saveAudioToFile(
    audio,
    outputDir ?? config.audioOutputDir
  );

  console.info("[OpenAI][Speech] completed", {
    bytes: audio.length,
    filePath,
  });

  return { audio, mimeType: "audio/mpeg", filePath };
}
