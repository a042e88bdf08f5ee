import { describe, expect, it } from "vitest";
import { GET } from "./route";

describe("GET /api/model", () => {
  it("returns the weights as percentages", async () => {
    const res = await GET();

    expect(res.status).toBe(200);
    expect((await res.json()).weights).toEqual({
      form: "25%",
      homeAdvantage: "15%",
      injuries: "15%",
      leaguePosition: "15%",
      headToHead: "10%",
      attack: "10%",
      defense: "10%",
    });
  });
});
