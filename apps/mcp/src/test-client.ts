import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport, getDefaultEnvironment } from "@modelcontextprotocol/sdk/client/stdio.js";

async function main() {
  const transport = new StdioClientTransport({
    command: process.execPath,
    args: ["--import", "tsx", "src/index.ts"],
    env: { ...getDefaultEnvironment(), PREDICTOR_DEBUG: "1" },
  });

  const client = new Client(
    { name: "mcp-test-client", version: "0.0.1" },
    { capabilities: {} }
  );

  await client.connect(transport);

  const tools = await client.listTools();
  console.log("tools:", tools.tools.map((t) => t.name));

  const config = await client.callTool({ name: "model.config", arguments: {} });
  console.log("model.config:", config);

  const res = await client.callTool({
    name: "match.predict",
    arguments: {
      input: {
        home: {
          name: "Riverside",
          recentForm: { wins: 3, draws: 1, losses: 1 },
          leaguePosition: 2,
          goalsScored: 35,
          goalsConceded: 15,
          matchesPlayed: 19,
          keyInjuries: 1,
          suspensions: 0,
        },
        away: {
          name: "Hillcrest",
          recentForm: { wins: 3, draws: 2, losses: 0 },
          leaguePosition: 1,
          goalsScored: 40,
          goalsConceded: 12,
          matchesPlayed: 19,
          keyInjuries: 2,
          suspensions: 1,
        },
        headToHead: { homeWins: 2, draws: 2, awayWins: 1 },
      },
    },
  });
  console.log("match.predict:", res);

  await client.close();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
