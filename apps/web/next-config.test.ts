import { describe, expect, it } from "vitest";
import nextConfig from "./next.config.mjs";

describe("next.config", () => {
  it("compiles the core package from source", () => {
    expect(nextConfig.transpilePackages).toEqual(["@match-predictor/core"]);
  });
});
