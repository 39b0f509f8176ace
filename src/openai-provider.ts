import OpenAI from "openai";
import type { AiProvider, CompletionRequest } from "./ai-provider.js";

export class OpenAIProvider implements AiProvider {
  readonly name = "openai";
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string,
  ) {
    this.client = new OpenAI({ apiKey });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      messages: [
        {
          role: "user",
          content: request.image
            ? [
                { type: "text", text: request.prompt },
                {
                  type: "image_url",
                  image_url: { url: `data:${request.image.mediaType};base64,${request.image.data}` },
                },
              ]
            : request.prompt,
        },
      ],
    });

    const text = completion.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new Error("OpenAI response contained no text");
    }
    return text;
  }
}
