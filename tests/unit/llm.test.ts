import { describe, it, expect, afterEach, vi } from "vitest";
import { AnthropicChatClient, createChatClient, OpenAIChatClient } from "../../src/llm";

const CONFIG = { provider: "anthropic" as const, apiKey: "test-key", model: "test-model" };

afterEach(() => {
    vi.unstubAllGlobals();
});

describe("AnthropicChatClient", () => {
    it("posts a Messages request and returns the text block", async () => {
        const fetchMock = vi.fn(async () =>
            new Response(JSON.stringify({ content: [{ type: "text", text: " 0.25 " }] }), { status: 200 })
        );
        vi.stubGlobal("fetch", fetchMock);

        const reply = await new AnthropicChatClient({ ...CONFIG, baseUrl: "http://localhost:9999/" })
            .complete("system prompt", "user prompt");

        expect(reply).toBe("0.25");
        expect(fetchMock).toHaveBeenCalledWith("http://localhost:9999/v1/messages", expect.objectContaining({ method: "POST" }));
    });

    it("throws on an error status", async () => {
        vi.stubGlobal("fetch", vi.fn(async () => new Response("overloaded", { status: 529 })));

        await expect(new AnthropicChatClient(CONFIG).complete("s", "u"))
            .rejects.toThrow("Anthropic API error 529: overloaded");
    });

    it("returns an empty string when no text block comes back", async () => {
        vi.stubGlobal("fetch", vi.fn(async () => new Response(JSON.stringify({ content: [] }), { status: 200 })));
        expect(await new AnthropicChatClient(CONFIG).complete("s", "u")).toBe("");
    });
});

describe("createChatClient", () => {
    it("picks the client by provider", () => {
        expect(createChatClient(CONFIG)).toBeInstanceOf(AnthropicChatClient);
        expect(createChatClient({ ...CONFIG, provider: "openai" })).toBeInstanceOf(OpenAIChatClient);
    });
});
