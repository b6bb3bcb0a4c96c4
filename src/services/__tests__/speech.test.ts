import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { createMock, clientOptions } = vi.hoisted(() => {
  const clientOptions: unknown[] = [];
  return { createMock: vi.fn(), clientOptions };
});

vi.mock("openai", () => ({
  default: class {
    audio = { speech: { create: createMock } };
    constructor(options: unknown) {
      clientOptions.push(options);
    }
  },
}));

import { splitSpeechText, synthesizeTourAudio } from "../speech/speech";

function speechResponse(bytes: number[]) {
  return { arrayBuffer: async () => Uint8Array.from(bytes).buffer };
}

describe("splitSpeechText", () => {
  it("returns short text as a single chunk", () => {
    expect(splitSpeechText("  Welcome to Lisbon.  ")).toEqual([
      "Welcome to Lisbon.",
    ]);
  });

  it("returns nothing for blank text", () => {
    expect(splitSpeechText(" \n ")).toEqual([]);
  });

  it("breaks between paragraphs first", () => {
    expect(
      splitSpeechText("First paragraph.\n\nSecond one here.", 20)
    ).toEqual(["First paragraph.", "Second one here."]);
  });

  it("keeps punctuation that opens a sentence", () => {
    expect(splitSpeechText("... and so on. Next.", 10)).toEqual([
      "...",
      "and so on.",
      "Next.",
    ]);
  });

  it("breaks long paragraphs between sentences", () => {
    expect(
      splitSpeechText("One two three. Four five six. Seven eight nine.", 30)
    ).toEqual(["One two three.\n\nFour five six.", "Seven eight nine."]);
  });

  it("never exceeds the limit, even inside long words", () => {
    const chunks = splitSpeechText("abcdefghijklmnop qr", 10);
    expect(chunks.every((chunk) => chunk.length <= 10)).toBe(true);
    expect(chunks.join("").replace(/\s/g, "")).toBe("abcdefghijklmnopqr");
  });
});

describe("synthesizeTourAudio", () => {
  let outputDir: string;

  beforeEach(async () => {
    createMock.mockReset();
    clientOptions.length = 0;
    vi.stubEnv("TOUR_TTS_MODEL", "");
    vi.stubEnv("TOUR_TTS_VOICE", "");
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    outputDir = await fs.mkdtemp(join(tmpdir(), "tour-audio-test-"));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it("narrates with tts-1 and nova and saves an mp3", async () => {
    createMock.mockResolvedValue(speechResponse([1, 2, 3]));

    const result = await synthesizeTourAudio({
      text: "Welcome to Lisbon.",
      apiKey: "test-key",
      voiceStyle: "Enthusiastic & Energetic",
      outputDir,
    });

    expect(clientOptions).toEqual([{ apiKey: "test-key" }]);
    expect(createMock).toHaveBeenCalledWith({
      model: "tts-1",
      voice: "nova",
      input: "Welcome to Lisbon.",
      response_format: "mp3",
      speed: 1.1,
    });
    expect(result.mimeType).toBe("audio/mpeg");
    expect(result.audio).toEqual(Buffer.from([1, 2, 3]));
    expect(result.filePath?.startsWith(outputDir)).toBe(true);
    expect(result.filePath?.endsWith(".mp3")).toBe(true);

    const saved = await fs.readFile(result.filePath ?? "");
    expect(saved).toEqual(Buffer.from([1, 2, 3]));
  });

  it("joins the audio of long scripts in order", async () => {
    createMock
      .mockResolvedValueOnce(speechResponse([1, 2]))
      .mockResolvedValueOnce(speechResponse([3]));
    const paragraph = "word ".repeat(600).trim();

    const result = await synthesizeTourAudio({
      text: `${paragraph}\n\n${paragraph}`,
      apiKey: "test-key",
      outputDir,
    });

    expect(createMock).toHaveBeenCalledTimes(2);
    expect(createMock.mock.calls[0][0].input).toBe(paragraph);
    expect(createMock.mock.calls[0][0].speed).toBe(1.0);
    expect(result.audio).toEqual(Buffer.from([1, 2, 3]));
  });

  it("refuses empty text without calling the API", async () => {
    await expect(
      synthesizeTourAudio({ text: "   ", apiKey: "test-key", outputDir })
    ).rejects.toThrow("Cannot generate audio without tour text.");
    expect(createMock).not.toHaveBeenCalled();
  });

  it("still returns audio when the file cannot be written", async () => {
    createMock.mockResolvedValue(speechResponse([9]));
    const blocker = join(outputDir, "not-a-directory");
    await fs.writeFile(blocker, "x");

    const result = await synthesizeTourAudio({
      text: "Welcome.",
      apiKey: "test-key",
      outputDir: blocker,
    });

    expect(result.audio).toEqual(Buffer.from([9]));
    expect(result.filePath).toBeNull();
  });

  it("surfaces API failures", async () => {
    createMock.mockRejectedValue(new Error("Incorrect API key provided"));

    await expect(
      synthesizeTourAudio({ text: "Welcome.", apiKey: "test-key", outputDir })
    ).rejects.toThrow("Incorrect API key provided");
  });
});
