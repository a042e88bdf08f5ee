import { NextResponse } from "next/server";
import { PredictMatchInputSchema, predictMatch, presentPrediction } from "@match-predictor/core";

export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json({ error: "Request body must be JSON" }, { status: 400 });
  }

  const parsed = PredictMatchInputSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json({ error: parsed.error.flatten() }, { status: 400 });
  }

  try {
    return NextResponse.json(presentPrediction(predictMatch(parsed.data)));
  } catch (e) {
    console.error("[predict]", e);
    return NextResponse.json({ error: e instanceof Error ? e.message : String(e) }, { status: 500 });
  }
}
