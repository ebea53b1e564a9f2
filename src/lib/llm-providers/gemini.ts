import { GoogleGenerativeAI, type GenerationConfig, type Part } from "@google/generative-ai";
import type { ModelSettings } from "../config";
import { toProviderError } from "./errors";
import type { CompletionClient, CompletionRequest, InlineImage } from "./types";

function generationConfig(request: CompletionRequest): GenerationConfig {
  return {
    temperature: request.temperature,
    maxOutputTokens: request.maxTokens,
    ...(request.json ? { responseMimeType: "application/json" } : {}),
  };
}

export function createGeminiClient(settings: ModelSettings & { apiKey: string }): CompletionClient {
  const genAI = new GoogleGenerativeAI(settings.apiKey);

  async function generate(
    modelId: string,
    request: CompletionRequest,
    parts: Array<string | Part>
  ): Promise<string> {
    const model = genAI.getGenerativeModel(
      {
        model: modelId,
        systemInstruction: request.systemPrompt,
        generationConfig: generationConfig(request),
      },
      { timeout: settings.timeoutMs }
    );

    const t0 = Date.now();
    let text: string;
    try {
      const result = await model.generateContent(parts);
      text = result.response.text();
    } catch (error) {
      throw toProviderError("Gemini", error, settings.timeoutMs);
    }
    console.log(`[gemini] ${modelId} responded in ${Date.now() - t0}ms (${text.length} chars)`);

    if (!text) {
      throw toProviderError("Gemini", new Error("Empty response from Gemini"), settings.timeoutMs);
    }
    return text;
  }

  return {
    provider: "gemini",

    complete(request) {
      return generate(settings.model, request, [request.userPrompt]);
    },

    completeWithImage(request, image: InlineImage) {
      return generate(settings.visionModel, request, [
        request.userPrompt,
        { inlineData: { mimeType: image.mimeType, data: image.data.toString("base64") } },
      ]);
    },
  };
}
