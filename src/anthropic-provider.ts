import Anthropic from "@anthropic-ai/sdk";
import type { AiProvider, CompletionRequest } from "./ai-provider.js";

export class AnthropicProvider implements AiProvider {
  readonly name = "anthropic";
  private readonly client: Anthropic;

  constructor(
    apiKey: string,
    private readonly model: string,
  ) {
    this.client = new Anthropic({ apiKey });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      messages: [
        {
          role: "user",
          content: request.image
            ? [
                {
                  type: "image",
                  source: {
                    type: "base64",
                    media_type: request.image.mediaType,
                    data: request.image.data,
                  },
                },
                { type: "text", text: request.prompt },
              ]
            : request.prompt,
        },
      ],
    });

    for (const block of response.content) {
      if (block.type === "text") {
        return block.text.trim();
      }
    }
    throw new Error("Anthropic response contained no text");
  }
}
