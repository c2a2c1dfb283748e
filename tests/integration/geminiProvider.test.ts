import express from "express";
import bodyParser from "body-parser";
import { ConfigurationError } from "../../src/errors";
import { GeminiProvider } from "../../src/llm/providers/GeminiProvider";
import { INTENT_RESPONSE_SCHEMA } from "../../src/schemas/inventoryIntent";
import { failure } from "../helpers/errors";
import { closedUrl, listen, RunningServer } from "../helpers/server";

type Captured = { url: string; body: unknown };

function candidate(text: string) {
  return { candidates: [{ content: { parts: [{ text }] } }] };
}

describe("GeminiProvider", () => {
  let server: RunningServer;
  let reply: { status: number; body: unknown; delayMs?: number };
  let captured: Captured[];

  beforeAll(async () => {
    const app = express();
    app.use(bodyParser.json());
    app.use((req, res) => {
      captured.push({ url: req.originalUrl, body: req.body });
      const send = () => res.status(reply.status).send(reply.body);
      if (reply.delayMs) {
        setTimeout(send, reply.delayMs);
      } else {
        send();
      }
    });
    server = await listen(app);
  });

  beforeEach(() => {
    captured = [];
  });

  afterAll(async () => {
    await server.close();
  });

  function provider(overrides: { apiKey?: string; baseUrl?: string; timeoutMs?: number } = {}) {
    return new GeminiProvider({
      apiKey: "test-key",
      model: "test-model",
      baseUrl: server.url,
      timeoutMs: 2000,
      ...overrides
    });
  }

  it("sends the prompt with the response schema and parses the intent", async () => {
    const intent = { operation: "POST", item: "tshirts", change: -3, reasoning: "sold" };
    reply = { status: 200, body: candidate(JSON.stringify(intent)) };

    await expect(provider().interpret("I sold 3 t shirts")).resolves.toEqual(intent);

    expect(captured).toHaveLength(1);
    expect(captured[0].url).toBe("/v1beta/models/test-model:generateContent?key=test-key");
    expect(captured[0].body).toMatchObject({
      generationConfig: { responseMimeType: "application/json", responseSchema: INTENT_RESPONSE_SCHEMA }
    });
    expect(JSON.stringify(captured[0].body)).toContain('User Query: \\"I sold 3 t shirts\\"');
  });

  it("fails with a configuration error and no call when the key is missing", async () => {
    const error = await failure(provider({ apiKey: undefined }).interpret("Check inventory"));
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.status).toBe(500);
    expect(captured).toHaveLength(0);
  });

  it("passes on the upstream status when the API returns an error", async () => {
    reply = { status: 429, body: { error: { message: "quota" } } };
    const error = await failure(provider().interpret("Check inventory"));
    expect(error.kind).toBe("UpstreamError");
    expect(error.status).toBe(429);
    expect(error.message).toBe('Gemini API returned an error: {"error":{"message":"quota"}}');
  });

  it("rejects text that is not a JSON object", async () => {
    reply = { status: 200, body: candidate("not json") };
    const error = await failure(provider().interpret("Check inventory"));
    expect(error.kind).toBe("MalformedResponse");
    expect(error.message).toBe("Failed to parse JSON response from model. Raw text: not json");

    reply = { status: 200, body: candidate("[1, 2]") };
    expect((await failure(provider().interpret("Check inventory"))).kind).toBe("MalformedResponse");
  });

  it("rejects a result without candidates", async () => {
    reply = { status: 200, body: { promptFeedback: { blockReason: "OTHER" } } };
    const error = await failure(provider().interpret("Check inventory"));
    expect(error.kind).toBe("MalformedResponse");
    expect(error.status).toBe(500);
    expect(error.message).toBe(
      'Model response did not contain expected content structure. Raw result: {"promptFeedback":{"blockReason":"OTHER"}}'
    );
  });

  it("reports the API as unavailable when it cannot be reached", async () => {
    const error = await failure(provider({ baseUrl: await closedUrl(express()) }).interpret("Check inventory"));
    expect(error.kind).toBe("UpstreamUnavailable");
    expect(error.status).toBe(503);
    expect(error.message.startsWith("Failed to connect to Gemini API: ")).toBe(true);
  });

  it("gives up after the timeout", async () => {
    reply = { status: 200, body: candidate("{}"), delayMs: 300 };
    const error = await failure(provider({ timeoutMs: 50 }).interpret("Check inventory"));
    expect(error.kind).toBe("UpstreamUnavailable");
    expect(error.message).toBe("Failed to connect to Gemini API: timeout of 50ms exceeded");
  });
});
