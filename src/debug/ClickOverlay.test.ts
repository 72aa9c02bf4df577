import fs from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import sharp from "sharp";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { PageRenderer } from "../browser/types.js";
import { LLMHttpError, OpenRouterClient } from "../llm/OpenRouterClient.js";
import { viewportPoint } from "../vision/geometry.js";
import { ClickOverlay } from "./ClickOverlay.js";
import { ClickValidator, parseVerdict } from "./ClickValidator.js";

function whiteViewport(): Promise<Buffer> {
  return sharp({ create: { width: 200, height: 100, channels: 3, background: "#ffffff" } }).png().toBuffer();
}

function rendererWith(capture: () => Promise<Buffer>): PageRenderer {
  return {
    navigate: async () => undefined,
    currentUrl: async () => "about:blank",
    scrollTo: async () => undefined,
    readScrollY: async () => 0,
    captureFullPage: capture,
    captureViewport: capture,
    viewportSize: async () => ({ width: 200, height: 100 }),
    pressKey: async () => undefined,
    dismissOverlays: async () => undefined,
  };
}

type Sent = { url: string; body: unknown };

function chatFetch(sent: Sent[], reply: { status: number; body: unknown }): typeof fetch {
  return async (input, init) => {
    sent.push({ url: String(input), body: JSON.parse(String(init?.body)) });
    return new Response(JSON.stringify(reply.body), { status: reply.status });
  };
}

describe("ClickOverlay", () => {
  let dir: string;
  const now = () => new Date(2026, 2, 1, 8, 30, 5);

  beforeEach(() => {
    dir = fs.mkdtempSync(join(tmpdir(), "overlay-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("draws a red marker at the click point", async () => {
    const overlay = new ClickOverlay({ renderer: rendererWith(whiteViewport), outDir: dir, now });

    const path = await overlay.draw(viewportPoint(50, 40), "approve", 2);

    const expected = join(dir, "debug_click_083005_card2_approve.png");
    expect(path).toBe(expected);
    const { data, info } = await sharp(expected).raw().toBuffer({ resolveWithObject: true });
    const at = (x: number, y: number) => {
      const i = (y * info.width + x) * info.channels;
      return [data[i], data[i + 1], data[i + 2]];
    };
    const [r, g, b] = at(50, 40);
    expect(r).toBeGreaterThan(200);
    expect(g).toBeLessThan(80);
    expect(b).toBeLessThan(80);
    expect(at(150, 90)).toEqual([255, 255, 255]);
  });

  it("still resolves when the capture or the validator fails", async () => {
    const sent: Sent[] = [];
    const validator = new ClickValidator(
      new OpenRouterClient({ apiKey: "test-key", model: "test/vision", fetch: chatFetch(sent, { status: 500, body: {} }) }),
    );

    const broken = new ClickOverlay({
      renderer: rendererWith(() => Promise.reject(new Error("page closed"))),
      outDir: dir,
      validator,
      now,
    });
    await expect(broken.beforeClick(viewportPoint(10, 10), "anteprima", 0)).resolves.toBeUndefined();
    expect(sent).toEqual([]);

    const working = new ClickOverlay({ renderer: rendererWith(whiteViewport), outDir: dir, validator, now });
    await expect(working.beforeClick(viewportPoint(10, 10), "decline", 1)).resolves.toBeUndefined();
    expect(sent).toHaveLength(1);
  });
});

describe("ClickValidator", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(join(tmpdir(), "validator-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("sends the overlay as an image and reads the verdict", async () => {
    const path = join(dir, "overlay.png");
    fs.writeFileSync(path, Buffer.from("png-bytes"));
    const sent: Sent[] = [];
    const client = new OpenRouterClient({
      apiKey: "test-key",
      model: "test/vision",
      baseUrl: "http://llm.local/v1",
      fetch: chatFetch(sent, {
        status: 200,
        body: {
          choices: [{ message: { content: "YES. The marker sits on the Approva button." } }],
          usage: { prompt_tokens: 900, completion_tokens: 12 },
        },
      }),
    });

    const result = await new ClickValidator(client).validate(path, "approve");

    expect(result).toEqual({ verdict: "yes", explanation: "YES. The marker sits on the Approva button." });
    expect(sent[0].url).toBe("http://llm.local/v1/chat/completions");
    expect(sent[0].body).toMatchObject({
      model: "test/vision",
      max_tokens: 120,
      messages: [
        { role: "system" },
        {
          role: "user",
          content: [
            { type: "text" },
            { type: "image_url", image_url: { url: `data:image/png;base64,${Buffer.from("png-bytes").toString("base64")}` } },
          ],
        },
      ],
    });
  });

  it("classifies answers", () => {
    expect(parseVerdict(" no, it is on the name").verdict).toBe("no");
    expect(parseVerdict("Yes").verdict).toBe("yes");
    expect(parseVerdict("Nothing visible").verdict).toBe("unclear");
    expect(parseVerdict("").verdict).toBe("unclear");
  });
});

describe("OpenRouterClient", () => {
  it("carries the HTTP status on errors", async () => {
    const client = new OpenRouterClient({
      apiKey: "test-key",
      model: "test/vision",
      fetch: async () => new Response("rate limited", { status: 429 }),
    });

    const failure = client.complete({ messages: [{ role: "user", content: "hi" }] });

    await expect(failure).rejects.toBeInstanceOf(LLMHttpError);
    await expect(failure).rejects.toMatchObject({ status: 429, message: "OpenRouter error 429: rate limited" });
  });

  it("returns usage when the provider reports it", async () => {
    const sent: Sent[] = [];
    const client = new OpenRouterClient({
      apiKey: "test-key",
      model: "test/vision",
      fetch: chatFetch(sent, {
        status: 200,
        body: { choices: [{ message: { content: "ok" } }], usage: { prompt_tokens: 3, completion_tokens: 1 } },
      }),
    });

    await expect(client.complete({ messages: [{ role: "user", content: "ping" }] })).resolves.toEqual({
      text: "ok",
      model: "test/vision",
      usage: { inputTokens: 3, outputTokens: 1 },
    });
    expect(sent[0].url).toBe("https://openrouter.ai/api/v1/chat/completions");
  });
});
