import { z } from "zod";

const flag = z
  .enum(["1", "0", "true", "false"])
  .optional()
  .transform((v) => v === "1" || v === "true");

const EnvSchema = z.object({
  MCP_SERVER_NAME: z.string().min(1).default("match-predictor"),
  PREDICTOR_DEBUG: flag,
});

export type ServerConfig = {
  serverName: string;
  /** log every prediction to stderr */
  debug: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${JSON.stringify(parsed.error.flatten().fieldErrors)}`);
  }
  return {
    serverName: parsed.data.MCP_SERVER_NAME,
    debug: parsed.data.PREDICTOR_DEBUG,
  };
}
