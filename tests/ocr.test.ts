import { describe, expect, it, vi } from "vitest";
import type { InlineImage } from "../src/lib/llm-providers/types";
import type { OcrEngine } from "../src/lib/ocr/engine";
import { VisionOcrEngine } from "../src/lib/ocr/engine";
import { OcrService, basicTextCleanup } from "../src/lib/ocr/ocr-service";
import { adaptiveThreshold, type ImageInfo, type ImagePreprocessor } from "../src/lib/ocr/preprocess";
import { fakeClient, thrown } from "./helpers/fake-client";

const IMAGE = Buffer.from("original-image");

function preprocessor(info: Partial<ImageInfo> = {}): ImagePreprocessor {
  return {
    inspect: vi.fn(async () => ({ width: 800, height: 600, mimeType: "image/png", ...info })),
    variants: vi.fn(async () => [
      { name: "grayscale" as const, data: Buffer.from("grayscale"), mimeType: "image/png" },
      { name: "threshold" as const, data: Buffer.from("threshold"), mimeType: "image/png" },
      { name: "adaptive" as const, data: Buffer.from("adaptive"), mimeType: "image/png" },
    ]),
  };
}

/** Engine that answers per variant, keyed by the variant's bytes. */
function engine(texts: Record<string, string | Error>): OcrEngine {
  return {
    recognize: vi.fn(async (image: InlineImage) => {
      const result = texts[image.data.toString()] ?? "";
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}

describe("adaptiveThreshold", () => {
  it("compares each pixel with its clipped neighbourhood mean", () => {
    expect(Array.from(adaptiveThreshold(new Uint8Array([0, 100, 200]), 3, 1, 3, 2))).toEqual([0, 255, 255]);
  });

  it("turns a flat image white", () => {
    expect(Array.from(adaptiveThreshold(new Uint8Array([10, 10, 10, 10]), 2, 2))).toEqual([255, 255, 255, 255]);
  });

  it("checks the buffer size", () => {
    expect(thrown(() => adaptiveThreshold(new Uint8Array(3), 2, 2))).toMatchObject({
      message: "Expected 4 pixels, got 3",
    });
  });
});

describe("OcrService.validate", () => {
  it("rejects files over 10MB before decoding", async () => {
    const prep = preprocessor();
    const service = new OcrService({ engine: engine({}), client: null, preprocessor: prep });

    await expect(service.validate(Buffer.alloc(10 * 1024 * 1024 + 1))).rejects.toMatchObject({
      code: "VALIDATION_ERROR",
      safeMessage: "Image file is too large. Maximum file size is 10MB.",
    });
    expect(prep.inspect).not.toHaveBeenCalled();
  });

  it("rejects undecodable bytes", async () => {
    const prep: ImagePreprocessor = {
      inspect: vi.fn(async () => Promise.reject(new Error("unsupported image format"))),
      variants: vi.fn(async () => []),
    };
    const service = new OcrService({ engine: engine({}), client: null, preprocessor: prep });

    await expect(service.validate(IMAGE)).rejects.toMatchObject({
      code: "VALIDATION_ERROR",
      safeMessage: "Invalid image file: unsupported image format",
    });
  });

  it("enforces the 200-4000 pixel range", async () => {
    const small = new OcrService({ engine: engine({}), client: null, preprocessor: preprocessor({ width: 150 }) });
    const large = new OcrService({ engine: engine({}), client: null, preprocessor: preprocessor({ height: 4001 }) });

    await expect(small.validate(IMAGE)).rejects.toMatchObject({
      safeMessage: "Image is too small. Minimum size is 200x200 pixels.",
    });
    await expect(large.validate(IMAGE)).rejects.toMatchObject({
      safeMessage: "Image is too large. Maximum size is 4000x4000 pixels.",
    });
  });
});

describe("OcrService.extractText", () => {
  it("keeps the variant with the most text and enhances it", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const client = fakeClient({ completeWithImage: async () => "  Pancakes\n\nIngredients:\n- 2 eggs  " });
    const service = new OcrService({
      engine: engine({ grayscale: "Pancakes", threshold: "Pancakes 2 eggs", adaptive: "Pancakes 2 egg" }),
      client,
      preprocessor: preprocessor(),
    });

    const result = await service.extractText(IMAGE);

    expect(result).toEqual({ text: "Pancakes\n\nIngredients:\n- 2 eggs", variant: "threshold", enhanced: true });
    const [request, image] = client.completeWithImage.mock.calls[0];
    expect(image).toEqual({ data: IMAGE, mimeType: "image/png" });
    expect(request.userPrompt).toBe(
      "Please extract and format the recipe from this image. Here's what OCR detected (may have errors): Pancakes 2 eggs"
    );
    expect(request.systemPrompt).toContain("formatting it properly");
  });

  it("uses the preserve prompt when asked", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const client = fakeClient({ completeWithImage: async () => "Pancakes" });
    const service = new OcrService({ engine: engine({ grayscale: "Pancakes" }), client, preprocessor: preprocessor() });

    await service.extractText(IMAGE, { preserveOriginal: true });

    expect(client.completeWithImage.mock.calls[0][0].systemPrompt).toContain("EXACTLY as written");
  });

  it("lets the first variant win a tie", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const service = new OcrService({
      engine: engine({ grayscale: "abc", threshold: "xyz", adaptive: "ab" }),
      client: null,
      preprocessor: preprocessor(),
    });

    expect((await service.extractText(IMAGE)).variant).toBe("grayscale");
  });

  it("fails when no variant yields text", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const service = new OcrService({
      engine: engine({ grayscale: "   ", threshold: "\n", adaptive: "" }),
      client: fakeClient(),
      preprocessor: preprocessor(),
    });

    await expect(service.extractText(IMAGE)).rejects.toMatchObject({
      code: "EXTRACTION_EMPTY",
      safeMessage: "Could not extract any text from the image",
    });
  });

  it("rethrows when every variant fails", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const service = new OcrService({
      engine: engine({ grayscale: new Error("first"), threshold: new Error("second"), adaptive: new Error("third") }),
      client: null,
      preprocessor: preprocessor(),
    });

    await expect(service.extractText(IMAGE)).rejects.toThrow("third");
  });

  it("cleans up locally when enhancement fails", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const client = fakeClient({ completeWithImage: () => Promise.reject(new Error("rate limited")) });
    const service = new OcrService({
      engine: engine({ grayscale: "Toast\nIngredients\n2 slices bread" }),
      client,
      preprocessor: preprocessor(),
    });

    expect(await service.extractText(IMAGE)).toEqual({
      text: "Toast\n\nIngredients:\n- 2 slices bread",
      variant: "grayscale",
      enhanced: false,
    });
  });
});

describe("basicTextCleanup", () => {
  it("labels sections and bullets their lines", () => {
    expect(basicTextCleanup("Pancakes\nIngredients\n2 eggs\n1 cup milk\nMethod\nWhisk well\n1. Fry")).toBe(
      "Pancakes\n\nIngredients:\n- 2 eggs\n- 1 cup milk\n\nInstructions:\n- Whisk well\n1. Fry"
    );
  });
});

describe("VisionOcrEngine", () => {
  it("needs a model backend", async () => {
    await expect(
      new VisionOcrEngine(null).recognize({ data: IMAGE, mimeType: "image/png" })
    ).rejects.toMatchObject({ code: "CONFIG_ERROR" });
  });

  it("transcribes at temperature zero", async () => {
    const client = fakeClient({ completeWithImage: async () => "2 eggs" });
    expect(await new VisionOcrEngine(client).recognize({ data: IMAGE, mimeType: "image/png" })).toBe("2 eggs");
    expect(client.completeWithImage.mock.calls[0][0].temperature).toBe(0);
  });
});
