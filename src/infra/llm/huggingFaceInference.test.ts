import { afterEach, describe, expect, it } from "vitest";
import { HuggingFaceInference } from "./huggingFaceInference";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler as typeof fetch;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const models = { summarization: "test/summarizer", sentiment: "test/sentiment" };

describe("HuggingFaceInference", () => {
  it("posts summarization parameters to the model endpoint", async () => {
    let requestedUrl = "";
    let authorization: string | null = null;
    let body = "";
    setFetch(async (input, init) => {
      requestedUrl = String(input);
      authorization = new Headers(init?.headers).get("authorization");
      body = String(init?.body);
      return new Response(JSON.stringify([{ summary_text: " Deliveries rose. " }]), {
        status: 200,
      });
    });

    const inference = new HuggingFaceInference("https://hf.test", "test-token", models);
    const result = await inference.summarize("Long text.", { maxLength: 80, minLength: 30 });

    expect(result._unsafeUnwrap()).toBe("Deliveries rose.");
    expect(requestedUrl).toBe("https://hf.test/models/test/summarizer");
    expect(authorization).toBe("Bearer test-token");
    expect(JSON.parse(body)).toEqual({
      inputs: "Long text.",
      parameters: { max_length: 80, min_length: 30, do_sample: false },
      options: { wait_for_model: true },
    });
  });

  it("unwraps nested classification candidates", async () => {
    setFetch(
      async () =>
        new Response(
          JSON.stringify([
            [
              { label: "5 stars", score: 0.6 },
              { label: "1 star", score: 0.4 },
            ],
          ]),
          { status: 200 },
        ),
    );

    const inference = new HuggingFaceInference("https://hf.test", "test-token", models);
    const result = await inference.classify("Great quarter.");

    expect(result._unsafeUnwrap()).toEqual([
      { label: "5 stars", score: 0.6 },
      { label: "1 star", score: 0.4 },
    ]);
  });

  it("accepts flat classification candidates", async () => {
    setFetch(
      async () =>
        new Response(JSON.stringify([{ label: "NEGATIVE", score: 0.9 }]), { status: 200 }),
    );

    const inference = new HuggingFaceInference("https://hf.test", "test-token", models);

    expect((await inference.classify("Bad quarter."))._unsafeUnwrap()).toEqual([
      { label: "NEGATIVE", score: 0.9 },
    ]);
  });

  it("maps an unexpected payload and http failures to boundary errors", async () => {
    setFetch(async () => new Response(JSON.stringify({ error: "loading" }), { status: 200 }));
    const inference = new HuggingFaceInference("https://hf.test", "test-token", models);

    expect((await inference.classify("Text."))._unsafeUnwrapErr()).toMatchObject({
      source: "sentiment",
      code: "malformed_response",
      provider: "huggingface:sentiment",
    });

    setFetch(async () => new Response("forbidden", { status: 403 }));
    expect(
      (await inference.summarize("Text.", { maxLength: 80, minLength: 30 }))._unsafeUnwrapErr(),
    ).toMatchObject({ source: "summarizer", code: "auth_invalid", httpStatus: 403 });
  });

  it("requires a token", () => {
    expect(() => new HuggingFaceInference("https://hf.test", "", models)).toThrow(
      "HF_API_TOKEN is required for the Hugging Face backend.",
    );
  });
});
