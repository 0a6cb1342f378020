import { expect } from "chai";
import { describe, it } from "mocha";

import {
  ConfigurationError,
  DEFAULT_CONFIG,
  inferProviderName,
  resolveConfig,
  validateConfig,
} from "../../../config.js";
import { createTestConfig } from "../../utils/testConfig.js";

describe("config", () => {
  describe("resolveConfig", () => {
    it("falls back to defaults when nothing is set", () => {
      const config = resolveConfig({}, {});

      expect(config).to.deep.equal({
        backend: {
          apiKey: "",
          baseUrl: "https://api.groq.com/openai/v1",
          modelName: "moonshotai/kimi-k2-instruct",
          maxOutputTokens: 16384,
          providerName: "groq",
        },
        server: { host: "localhost", port: 7187, debug: false },
        performance: { connectionTimeout: 120000 },
      });
    });

    it("reads every setting from the environment", () => {
      const config = resolveConfig({
        API_KEY: "test-secret",
        BASE_URL: "https://api.openai.com/v1",
        MODEL_NAME: "gpt-test",
        MAX_OUTPUT_TOKENS: "4096",
        PROXY_HOST: "0.0.0.0",
        PROXY_PORT: "9000",
        DEBUG: "yes",
      }, {});

      expect(config.backend).to.deep.equal({
        apiKey: "test-secret",
        baseUrl: "https://api.openai.com/v1",
        modelName: "gpt-test",
        maxOutputTokens: 4096,
        providerName: "openai",
      });
      expect(config.server).to.deep.equal({ host: "0.0.0.0", port: 9000, debug: true });
    });

    it("prefers the environment over config.json", () => {
      const file = {
        backend: { modelName: "file-model", maxOutputTokens: 2048 },
        server: { port: 8000 },
        performance: { connectionTimeout: 30000 },
      };

      const config = resolveConfig({ MODEL_NAME: "env-model" }, file);

      expect(config.backend.modelName).to.equal("env-model");
      expect(config.backend.maxOutputTokens).to.equal(2048);
      expect(config.server.port).to.equal(8000);
      expect(config.performance.connectionTimeout).to.equal(30000);
    });

    it("reads the key from API_KEY only and lowercases PROVIDER_NAME", () => {
      const config = resolveConfig({ BACKEND_LLM_API_KEY: "test-secret", PROVIDER_NAME: "MyCloud" }, {});

      expect(config.backend.apiKey).to.equal("");
      expect(config.backend.providerName).to.equal("mycloud");
    });

    it("ignores empty environment values", () => {
      const config = resolveConfig({ MODEL_NAME: "", PROXY_PORT: "" }, {});

      expect(config.backend.modelName).to.equal(DEFAULT_CONFIG.backend.modelName);
      expect(config.server.port).to.equal(7187);
    });

    it("returns a frozen value", () => {
      const config = resolveConfig({}, {});

      expect(Object.isFrozen(config)).to.equal(true);
      expect(Object.isFrozen(config.backend)).to.equal(true);
    });
  });

  describe("inferProviderName", () => {
    it("recognises known providers from the base URL", () => {
      expect(inferProviderName("https://api.groq.com/openai/v1")).to.equal("groq");
      expect(inferProviderName("https://API.OPENAI.COM/v1")).to.equal("openai");
      expect(inferProviderName("https://openrouter.ai/api/v1")).to.equal("openrouter");
      expect(inferProviderName("http://ollama.internal:11434/v1")).to.equal("ollama");
      expect(inferProviderName("https://api.novita.ai/v3/openai")).to.equal("novita");
      expect(inferProviderName("https://inference.baseten.co/v1")).to.equal("baseten");
      expect(inferProviderName("http://localhost:8080/v1")).to.equal("custom");
    });
  });

  describe("validateConfig", () => {
    it("accepts a complete configuration", () => {
      expect(() => validateConfig(createTestConfig())).to.not.throw();
    });

    it("collects every problem into one error", () => {
      const config = createTestConfig({
        backend: { apiKey: "", maxOutputTokens: Number.NaN },
        server: { port: 0 },
      });

      try {
        validateConfig(config);
        expect.fail("expected ConfigurationError");
      } catch (error: unknown) {
        expect(error).to.be.instanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.problems).to.deep.equal([
            "API key is required. Set API_KEY environment variable.",
            "MAX_OUTPUT_TOKENS must be a positive integer",
            "PROXY_PORT must be a valid port number between 1 and 65535",
          ]);
        }
      }
    });

    it("rejects the placeholder key and a non-http base URL", () => {
      const config = createTestConfig({
        backend: { apiKey: "YOUR_API_KEY_HERE", baseUrl: "ftp://example.test" },
      });

      expect(() => validateConfig(config))
        .to.throw(ConfigurationError)
        .with.property("problems")
        .that.deep.equals([
          "API key is required. Set API_KEY environment variable.",
          "BASE_URL must be an http(s) URL. Got: ftp://example.test",
        ]);
    });
  });
});
