import OpenAI from "openai";

export interface ChatClientConfig {
    provider: "openai" | "anthropic";
    apiKey: string;
    model: string;
    baseUrl?: string;
}

/** One system + user turn in, plain text out. */
export interface ChatClient {
    complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

/** OpenAI-compatible chat completions */
export class OpenAIChatClient implements ChatClient {
    private client: OpenAI;

    constructor(private config: ChatClientConfig) {
        this.client = new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseUrl || "https://api.openai.com/v1",
        });
    }

    async complete(systemPrompt: string, userPrompt: string): Promise<string> {
        const resp = await this.client.chat.completions.create({
            model: this.config.model,
            messages: [
                { role: "system", content: systemPrompt },
                { role: "user", content: userPrompt },
            ],
            temperature: 0,
        });
        return resp.choices[0]?.message?.content?.trim() ?? "";
    }
}

function isTextBlock(block: unknown): block is { type: "text"; text: string } {
    return (
        typeof block === "object" &&
        block !== null &&
        "type" in block &&
        block.type === "text" &&
        "text" in block &&
        typeof block.text === "string"
    );
}

/** Anthropic Messages API */
export class AnthropicChatClient implements ChatClient {
    constructor(private config: ChatClientConfig) {}

    async complete(systemPrompt: string, userPrompt: string): Promise<string> {
        const baseUrl = (this.config.baseUrl || "https://api.anthropic.com").replace(/\/+$/, "");
        const url = `${baseUrl}/v1/messages`;

        const body = {
            model: this.config.model,
            max_tokens: 64,
            system: systemPrompt,
            messages: [
                { role: "user", content: userPrompt },
            ],
        };

        const resp = await fetch(url, {
            method: "POST",
            headers: {
                "Content-Type": "application/json",
                "x-api-key": this.config.apiKey,
                "anthropic-version": "2023-06-01",
            },
            body: JSON.stringify(body),
        });

        if (!resp.ok) {
            const text = await resp.text();
            throw new Error(`Anthropic API error ${resp.status}: ${text}`);
        }

        // Response: { content: [{ type: "text", text: "..." }] }
        const data: unknown = await resp.json();
        const content = typeof data === "object" && data !== null && "content" in data ? data.content : [];
        const textBlock = Array.isArray(content) ? content.find(isTextBlock) : undefined;
        return textBlock?.text.trim() ?? "";
    }
}

export function createChatClient(config: ChatClientConfig): ChatClient {
    return config.provider === "anthropic"
        ? new AnthropicChatClient(config)
        : new OpenAIChatClient(config);
}
