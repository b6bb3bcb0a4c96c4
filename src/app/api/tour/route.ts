import { describeError } from "@/lib/errors";
import { generateTourScript, narrateTour } from "@/services/tour/tour";

export const runtime = "nodejs";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function POST(req: Request): Promise<Response> {
  try {
    const body: unknown = await req.json().catch(() => ({}));
    const payload: Record<string, unknown> = isRecord(body) ? body : {};
    const bodyKey =
      typeof payload.apiKey === "string" && payload.apiKey.trim()
        ? payload.apiKey
        : null;
    const apiKey = bodyKey ?? req.headers.get("x-openai-api-key");

    const script = await generateTourScript({
      location: payload.location,
      interests: payload.interests,
      duration: payload.duration,
      voiceStyle: payload.voiceStyle,
      apiKey,
    });

    if (!script.ok) {
      return Response.json(
        { error: script.error },
        { status: script.reason === "invalid" ? 400 : 502 }
      );
    }

    const narration = await narrateTour({
      text: script.tour,
      location: script.request.location,
      voiceStyle: script.request.voiceStyle,
      apiKey,
    });

    return Response.json({
      tour: script.tour,
      audio: narration.ok ? narration.audio : null,
      audioError: narration.ok ? null : narration.error,
    });
  } catch (err: unknown) {
    console.error("[Tour] tour API error:", err);
    return Response.json({ error: describeError(err) }, { status: 500 });
  }
}
