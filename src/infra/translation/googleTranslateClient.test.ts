import { afterEach, describe, expect, it } from "vitest";
import { GoogleTranslateClient } from "./googleTranslateClient";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler as typeof fetch;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("GoogleTranslateClient", () => {
  it("joins translated segments", async () => {
    let requestedUrl = "";
    setFetch(async (input) => {
      requestedUrl = String(input);
      return new Response(
        JSON.stringify([
          [
            ["टेस्ला के शेयर बढ़े। ", "Tesla shares rose. ", null, null, 10],
            ["मांग मजबूत है।", "Demand is strong.", null, null, 10],
          ],
          null,
          "en",
        ]),
        { status: 200 },
      );
    });

    const client = new GoogleTranslateClient("https://translate.test");
    const result = await client.translate("Tesla shares rose. Demand is strong.", "hi");

    const params = new URL(requestedUrl).searchParams;
    expect(params.get("tl")).toBe("hi");
    expect(params.get("q")).toBe("Tesla shares rose. Demand is strong.");
    expect(result._unsafeUnwrap()).toBe("टेस्ला के शेयर बढ़े। मांग मजबूत है।");
  });

  it("rejects an unexpected payload", async () => {
    setFetch(async () => new Response(JSON.stringify({ text: "hi" }), { status: 200 }));

    const client = new GoogleTranslateClient("https://translate.test");
    const result = await client.translate("Hello.", "hi");

    expect(result._unsafeUnwrapErr()).toMatchObject({
      source: "translation",
      code: "malformed_response",
    });
  });

  it("maps rate limiting", async () => {
    setFetch(async () => new Response("slow down", { status: 429 }));

    const client = new GoogleTranslateClient("https://translate.test");
    const result = await client.translate("Hello.", "hi");

    expect(result._unsafeUnwrapErr().code).toBe("rate_limited");
  });
});
