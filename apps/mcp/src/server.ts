import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  PredictMatchInputSchema,
  createPredictor,
  predictMatch,
  presentModelConfig,
  presentPrediction,
  type ModelConfig,
} from "@match-predictor/core";
import type { ServerConfig } from "./config";

export type CreateServerOptions = ServerConfig & {
  /** model configuration; validated before any tool is registered */
  model?: ModelConfig;
  log?: (...args: unknown[]) => void;
};

const asJson = (data: unknown) => ({
  content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }],
});

export function createServer(options: CreateServerOptions) {
  // throws InvalidWeightConfigurationError before the server exists
  const predictor = createPredictor(options.model);
  const log = options.log ?? ((...args: unknown[]) => console.error(...args));

  const server = new McpServer({
    name: options.serverName,
    version: "0.1.0",
  });

  server.tool(
    "match.predict",
    "Predict win/draw/loss probabilities, a scoreline and a confidence label from both teams' form, table position, goals, team news and head-to-head record.",
    { input: PredictMatchInputSchema },
    async ({ input }) => {
      const out = presentPrediction(predictMatch(input, predictor));

      if (options.debug) {
        log("[predict]", `${out.homeTeam} v ${out.awayTeam}`, {
          probabilities: out.probabilities,
          score: out.predictedScore,
          confidence: out.confidence,
        });
      }

      return asJson(out);
    }
  );

  server.tool(
    "model.config",
    "Show the model's factor weights and calibration constants.",
    async () => asJson(presentModelConfig(predictor.config))
  );

  return server;
}
