import OpenAI from "openai";
import type { ModelSettings } from "../config";
import { toProviderError } from "./errors";
import type { CompletionClient, CompletionRequest, InlineImage } from "./types";

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

export function createOpenAIClient(settings: ModelSettings & { apiKey: string }): CompletionClient {
  const openai = new OpenAI({
    apiKey: settings.apiKey,
    timeout: settings.timeoutMs,
    maxRetries: 0,
  });

  async function generate(
    modelId: string,
    request: CompletionRequest,
    messages: ChatMessage[]
  ): Promise<string> {
    const t0 = Date.now();
    let text: string;
    try {
      const response = await openai.chat.completions.create({
        model: modelId,
        messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        ...(request.json ? { response_format: { type: "json_object" as const } } : {}),
      });
      text = response.choices[0]?.message?.content ?? "";
    } catch (error) {
      throw toProviderError("OpenAI", error, settings.timeoutMs);
    }
    console.log(`[openai] ${modelId} responded in ${Date.now() - t0}ms (${text.length} chars)`);

    if (!text) {
      throw toProviderError("OpenAI", new Error("Empty response from OpenAI"), settings.timeoutMs);
    }
    return text;
  }

  return {
    provider: "openai",

    complete(request) {
      return generate(settings.model, request, [
        { role: "system", content: request.systemPrompt },
        { role: "user", content: request.userPrompt },
      ]);
    },

    completeWithImage(request, image: InlineImage) {
      const dataUrl = `data:${image.mimeType};base64,${image.data.toString("base64")}`;
      return generate(settings.visionModel, request, [
        { role: "system", content: request.systemPrompt },
        {
          role: "user",
          content: [
            { type: "text", text: request.userPrompt },
            { type: "image_url", image_url: { url: dataUrl } },
          ],
        },
      ]);
    },
  };
}
