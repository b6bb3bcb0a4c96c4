"use client";

import { useEffect, useState } from "react";

import { generateTourAction } from "@/app/actions/generate-tour";
import { narrateTourAction } from "@/app/actions/narrate-tour";
import {
  DEFAULT_DURATION,
  DEFAULT_INTERESTS,
  DEFAULT_VOICE_STYLE,
  DURATION_MAX,
  DURATION_MIN,
  DURATION_STEP,
  INTEREST_OPTIONS,
  type Interest,
  VOICE_STYLE_OPTIONS,
  type VoiceStyle,
} from "@/lib/tour-options";
import type { TourAudioPayload } from "@/services/tour/tour";

const API_KEY_STORAGE_KEY = "audio-tour:openai-api-key";

type GenerationStatus = "idle" | "writing" | "narrating";

function toggleInterest(selected: Interest[], interest: Interest): Interest[] {
  return selected.includes(interest)
    ? selected.filter((item) => item !== interest)
    : [...selected, interest];
}

function isVoiceStyle(value: string): value is VoiceStyle {
  return VOICE_STYLE_OPTIONS.some((style) => style === value);
}

export default function AudioTourPage() {
  const [apiKey, setApiKey] = useState<string>("");
  const [location, setLocation] = useState<string>("");
  const [interests, setInterests] = useState<Interest[]>(DEFAULT_INTERESTS);
  const [duration, setDuration] = useState<number>(DEFAULT_DURATION);
  const [voiceStyle, setVoiceStyle] = useState<VoiceStyle>(DEFAULT_VOICE_STYLE);
  const [status, setStatus] = useState<GenerationStatus>("idle");
  const [progress, setProgress] = useState<number>(0);
  const [tour, setTour] = useState<string>("");
  const [audio, setAudio] = useState<TourAudioPayload | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [requestedLocation, setRequestedLocation] = useState<string>("");

  useEffect(() => {
    const stored = window.sessionStorage.getItem(API_KEY_STORAGE_KEY);
    if (stored) {
      setApiKey(stored);
    }
  }, []);

  const handleApiKeyChange = (value: string) => {
    setApiKey(value);
    if (value.trim()) {
      window.sessionStorage.setItem(API_KEY_STORAGE_KEY, value.trim());
    } else {
      window.sessionStorage.removeItem(API_KEY_STORAGE_KEY);
    }
  };

  const generateTour = async () => {
    const submittedLocation = location.trim();
    setRequestedLocation(submittedLocation);
    setError(null);
    setTour("");
    setAudio(null);
    setProgress(0);
    setStatus("writing");

    try {
      const script = await generateTourAction({
        location,
        interests,
        duration,
        voiceStyle,
        apiKey,
      });

      if (!script.ok) {
        setError(script.error);
        return;
      }

      setTour(script.tour);
      setStatus("narrating");

      const narration = await narrateTourAction({
        text: script.tour,
        location: script.request.location,
        voiceStyle: script.request.voiceStyle,
        apiKey,
      });
      setProgress(100);

      if (!narration.ok) {
        setError(narration.error);
        return;
      }

      setAudio(narration.audio);
    } catch (err) {
      console.error("Tour generation failed", { location: submittedLocation, err });
      setError(
        `Tour generation failed: ${
          err instanceof Error ? err.message : "Unexpected error"
        }`
      );
    } finally {
      setStatus("idle");
    }
  };

  const isBusy = status !== "idle";

  return (
    <div className="min-h-screen bg-slate-950 text-slate-100">
      <div className="mx-auto flex max-w-7xl flex-col gap-8 p-8 lg:flex-row">
        <aside className="w-full space-y-4 rounded-2xl bg-slate-900/70 p-6 lg:w-72">
          <h2 className="text-xl font-semibold">🔑 Settings</h2>
          <label className="block space-y-2 text-sm">
            <span className="text-slate-300">OpenAI API Key:</span>
            <input
              type="password"
              value={apiKey}
              autoComplete="off"
              onChange={(event) => handleApiKeyChange(event.target.value)}
              className="w-full rounded-lg border border-slate-700 bg-slate-800 px-3 py-2 text-slate-100 focus:border-emerald-500 focus:outline-none"
            />
          </label>
          {apiKey.trim() && (
            <p className="rounded-lg bg-emerald-500/20 px-3 py-2 text-sm text-emerald-200">
              API key saved!
            </p>
          )}
        </aside>

        <main className="flex-1 space-y-8">
          <header className="space-y-4">
            <h1 className="text-4xl font-bold">🎧 AI Audio Tour Agent</h1>
            <div className="rounded-2xl border border-emerald-500/30 bg-emerald-500/10 p-6">
              <h3 className="text-lg font-semibold">
                Welcome to your personalized audio tour guide!
              </h3>
              <p className="mt-2 text-slate-300">
                I&apos;ll help you explore any location with an engaging,
                natural-sounding tour tailored to your interests.
              </p>
            </div>
          </header>

          <div className="grid gap-8 md:grid-cols-3">
            <section className="space-y-6 md:col-span-2">
              <div className="space-y-2">
                <h3 className="text-lg font-semibold">
                  📍 Where would you like to explore?
                </h3>
                <input
                  type="text"
                  value={location}
                  placeholder="Enter a city, landmark, or location..."
                  onChange={(event) => setLocation(event.target.value)}
                  className="w-full rounded-lg border border-slate-700 bg-slate-800 px-4 py-3 text-slate-100 focus:border-emerald-500 focus:outline-none"
                />
              </div>

              <div className="space-y-2">
                <h3 className="text-lg font-semibold">🎯 What interests you?</h3>
                <p className="text-sm text-slate-400">
                  Select the topics you&apos;d like to learn about
                </p>
                <div className="flex flex-wrap gap-2">
                  {INTEREST_OPTIONS.map((interest) => {
                    const active = interests.includes(interest);
                    return (
                      <button
                        key={interest}
                        type="button"
                        aria-pressed={active}
                        onClick={() =>
                          setInterests((prev) => toggleInterest(prev, interest))
                        }
                        className={`rounded-full border px-4 py-2 text-sm transition-colors ${
                          active
                            ? "border-emerald-500 bg-emerald-600 text-white"
                            : "border-slate-700 bg-slate-800 text-slate-300 hover:bg-slate-700"
                        }`}
                      >
                        {interest}
                      </button>
                    );
                  })}
                </div>
              </div>
            </section>

            <section className="space-y-6">
              <div className="space-y-2">
                <h3 className="text-lg font-semibold">⏱️ Tour Settings</h3>
                <label className="block space-y-2 text-sm">
                  <span className="text-slate-300">
                    Duration: {duration} minutes
                  </span>
                  <input
                    type="range"
                    min={DURATION_MIN}
                    max={DURATION_MAX}
                    step={DURATION_STEP}
                    value={duration}
                    onChange={(event) =>
                      setDuration(Number.parseInt(event.target.value, 10))
                    }
                    className="w-full accent-emerald-500"
                  />
                </label>
              </div>

              <div className="space-y-2">
                <h3 className="text-lg font-semibold">🎙️ Voice Settings</h3>
                <select
                  value={voiceStyle}
                  onChange={(event) => {
                    const next = event.target.value;
                    if (isVoiceStyle(next)) {
                      setVoiceStyle(next);
                    }
                  }}
                  className="w-full rounded-lg border border-slate-700 bg-slate-800 px-3 py-2 text-slate-100"
                >
                  {VOICE_STYLE_OPTIONS.map((style) => (
                    <option key={style} value={style}>
                      {style}
                    </option>
                  ))}
                </select>
              </div>
            </section>
          </div>

          <button
            type="button"
            onClick={() => void generateTour()}
            disabled={isBusy}
            className="rounded-lg bg-emerald-600 px-6 py-3 font-medium transition-colors hover:bg-emerald-700 disabled:cursor-not-allowed disabled:opacity-60"
          >
            🎧 Generate Tour
          </button>

          {status === "writing" && (
            <p className="animate-pulse text-slate-300">
              Creating your personalized tour of {requestedLocation}...
            </p>
          )}

          {error && (
            <div className="rounded-lg border border-red-500/50 bg-red-500/20 p-4">
              <p className="text-red-200">{error}</p>
            </div>
          )}

          {tour && (
            <details open className="rounded-2xl bg-slate-900/70 p-6">
              <summary className="cursor-pointer text-lg font-semibold">
                📝 Tour Content
              </summary>
              <div className="mt-4 whitespace-pre-wrap leading-relaxed text-slate-200">
                {tour}
              </div>
            </details>
          )}

          {status === "narrating" && (
            <div className="space-y-2">
              <p className="animate-pulse text-slate-300">
                🎙️ Generating audio tour...
              </p>
              <div className="h-2 w-full overflow-hidden rounded-full bg-slate-800">
                <div
                  className="h-full bg-emerald-500 transition-all"
                  style={{ width: `${progress}%` }}
                />
              </div>
            </div>
          )}

          {audio && (
            <section className="space-y-4">
              <h3 className="text-lg font-semibold">🎧 Listen to Your Tour</h3>
              <audio controls src={audio.dataUrl} className="w-full" />
              <a
                href={audio.dataUrl}
                download={audio.fileName}
                className="inline-block rounded-lg bg-slate-800 px-4 py-2 text-sm font-medium transition-colors hover:bg-slate-700"
              >
                📥 Download Audio Tour
              </a>
            </section>
          )}
        </main>
      </div>
    </div>
  );
}
