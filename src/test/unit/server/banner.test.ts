import { expect } from "chai";
import { describe, it } from "mocha";
import stringWidth from "string-width";

import { createAlignedLine, renderBanner, stripAnsi } from "../../../server/banner.js";
import { createTestConfig } from "../../utils/testConfig.js";

describe("banner", () => {
  it("draws every line at the box width", () => {
    const lines = renderBanner(createTestConfig(), 7187, "localhost").map(stripAnsi);

    for (const line of lines) {
      expect(stringWidth(line), line).to.equal(60);
    }
  });

  it("shows provider, model and listening address", () => {
    const text = renderBanner(createTestConfig(), 9000, "127.0.0.1").map(stripAnsi).join("\n");

    expect(text).to.include("Provider:   groq");
    expect(text).to.include("Model:      test-model");
    expect(text).to.include("Listening:  http://127.0.0.1:9000");
    expect(text).to.include("POST /v1/messages");
  });

  it("centres text inside the borders", () => {
    expect(stripAnsi(createAlignedLine("ab", 8))).to.equal("│  ab  │");
  });
});
