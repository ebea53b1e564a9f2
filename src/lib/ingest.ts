import { HealthAnalyzer } from "./health/health-analyzer";
import { FoodImageSearch } from "./image-search";
import { getCompletionClient } from "./llm-providers";
import { getNutritionSource, type NutritionSource } from "./nutrition";
import { VisionOcrEngine } from "./ocr/engine";
import { OcrService } from "./ocr/ocr-service";
import { RecipeParser } from "./recipe-parser";
import { SourceNormalizer } from "./source";
import type { HealthRecord, IngestOptions, IngestResult, NormalizedSource, NutritionRecord, ParsedRecipe } from "./types";

// Narrow views of the collaborators so tests can hand in fakes.
export interface RecipeParserLike {
  parse(text: string, options: { isOcrText?: boolean; preserveOriginal?: boolean }): Promise<ParsedRecipe>;
}

export interface HealthAnalyzerLike {
  analyze(recipe: ParsedRecipe, nutrition: NutritionRecord | null): Promise<HealthRecord>;
}

export interface SourceNormalizerLike {
  normalize(rawInput: string): Promise<NormalizedSource>;
}

export interface OcrServiceLike {
  extractText(image: Buffer, options: { preserveOriginal?: boolean }): Promise<{ text: string }>;
}

export interface ImageSearchLike {
  search(recipeName: string): Promise<string | null>;
}

export interface IngestPipelineDeps {
  normalizer: SourceNormalizerLike;
  parser: RecipeParserLike;
  nutrition: NutritionSource;
  health: HealthAnalyzerLike;
  ocr: OcrServiceLike;
  imageSearch?: ImageSearchLike | null;
}

function pickTitle(source: NormalizedSource, parsed: ParsedRecipe, userTitle: string | undefined): string {
  const user = userTitle?.trim() || null;
  switch (source.kind) {
    case "url":
      return source.titleHint || user || parsed.title;
    case "video":
      return parsed.title || user || source.titleHint || "Video Recipe";
    case "text":
    case "image":
      return user || parsed.title;
  }
}

/**
 * Runs one ingestion request front to back: normalize → parse → nutrition →
 * health. Stages run in sequence; any failure ends the request.
 */
export class IngestPipeline {
  constructor(private readonly deps: IngestPipelineDeps) {}

  async ingest(rawInput: string, options: IngestOptions = {}): Promise<IngestResult> {
    const source = await this.deps.normalizer.normalize(rawInput);
    console.log(`[ingest] Normalized ${source.kind} input (${source.text.length} chars)`);
    return this.run(source, rawInput, options);
  }

  async ingestImage(image: Buffer, options: IngestOptions = {}): Promise<IngestResult> {
    const { text } = await this.deps.ocr.extractText(image, {
      preserveOriginal: options.preserveOriginal ?? false,
    });
    console.log(`[ingest] OCR produced ${text.length} chars`);
    const source: NormalizedSource = { kind: "image", text, titleHint: null, imageUrl: null };
    return this.run(source, text, { ...options, isOcrText: true });
  }

  private async run(source: NormalizedSource, rawInput: string, options: IngestOptions): Promise<IngestResult> {
    const parsed = await this.deps.parser.parse(source.text, {
      isOcrText: options.isOcrText ?? false,
      preserveOriginal: options.preserveOriginal ?? false,
    });

    const recipe: ParsedRecipe = {
      ...parsed,
      title: pickTitle(source, parsed, options.title),
      cuisineType: options.cuisineType?.trim() || parsed.cuisineType,
      dietaryTags: options.dietaryTags && options.dietaryTags.length > 0 ? options.dietaryTags : parsed.dietaryTags,
    };

    console.log(`[ingest] Parsed "${recipe.title}" with ${recipe.ingredients.length} ingredients`);
    const nutrition = await this.deps.nutrition.calculate(recipe.ingredients, recipe.servings);
    const health = await this.deps.health.analyze(recipe, nutrition);

    let imageUrl = source.imageUrl;
    if (!imageUrl && this.deps.imageSearch) {
      imageUrl = await this.deps.imageSearch.search(recipe.title);
    }

    return {
      source: source.kind,
      rawInput,
      recipe,
      nutrition,
      health,
      imageUrl,
    };
  }
}

/** Pipeline wired to the configured model provider and nutrition source. */
export function createIngestPipeline(): IngestPipeline {
  const client = getCompletionClient();
  return new IngestPipeline({
    normalizer: new SourceNormalizer(),
    parser: new RecipeParser(client),
    nutrition: getNutritionSource(client),
    health: new HealthAnalyzer(client),
    ocr: new OcrService({ engine: new VisionOcrEngine(client), client }),
    imageSearch: new FoodImageSearch(),
  });
}
