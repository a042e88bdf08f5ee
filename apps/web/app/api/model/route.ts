import { NextResponse } from "next/server";
import { DEFAULT_MODEL_CONFIG, presentModelConfig } from "@match-predictor/core";

export async function GET() {
  return NextResponse.json(presentModelConfig(DEFAULT_MODEL_CONFIG));
}
