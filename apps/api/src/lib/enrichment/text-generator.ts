import OpenAI from "openai";
import type { AppConfig } from "@chomp/config";

export type GenerationRequest = {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
};

export interface TextGenerator {
  readonly model: string;
  generate(request: GenerationRequest): Promise<string>;
}

export class OpenAITextGenerator implements TextGenerator {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: { apiKey: string; model: string; timeoutMs: number }) {
    this.model = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 1
    });
  }

  async generate(request: GenerationRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.user }
      ],
      temperature: request.temperature,
      max_completion_tokens: request.maxTokens
    });

    return response.choices[0]?.message?.content?.trim() ?? "";
  }
}

/** Null when no API key is configured; enrichment is then skipped. */
export function createTextGenerator(
  config: AppConfig["openai"]
): TextGenerator | null {
  if (!config.apiKey) {
    return null;
  }

  return new OpenAITextGenerator({
    apiKey: config.apiKey,
    model: config.model,
    timeoutMs: config.timeoutMs
  });
}
