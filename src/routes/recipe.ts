import { Router } from "express";
import { IngestError } from "../lib/errors";
import { createIngestPipeline, type IngestPipeline } from "../lib/ingest";
import { buildIndexEntry, buildRecipeRecord } from "../lib/recipe-record";
import type { IngestOptions, IngestResult } from "../lib/types";
import { sendError } from "../middleware/errors";

interface IngestRequestBody {
  input?: unknown;
  title?: unknown;
  cuisineType?: unknown;
  dietaryTags?: unknown;
  preserveOriginal?: unknown;
  isOcrText?: unknown;
}

interface IngestImageRequestBody {
  image?: unknown;
  title?: unknown;
  preserveOriginal?: unknown;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function readOptions(body: IngestRequestBody): IngestOptions {
  return {
    title: optionalString(body.title),
    cuisineType: optionalString(body.cuisineType),
    dietaryTags: Array.isArray(body.dietaryTags)
      ? body.dietaryTags.filter((t): t is string => typeof t === "string" && t.trim() !== "")
      : undefined,
    preserveOriginal: body.preserveOriginal === true,
    isOcrText: body.isOcrText === true,
  };
}

function decodeImage(value: unknown): Buffer {
  if (typeof value !== "string" || !value.trim()) {
    throw new IngestError("VALIDATION_ERROR", "Field 'image' must be a base64-encoded image");
  }
  // Accept data URLs as well as bare base64.
  const base64 = value.replace(/^data:[^;]+;base64,/, "");
  const bytes = Buffer.from(base64, "base64");
  if (bytes.length === 0) {
    throw new IngestError("VALIDATION_ERROR", "Field 'image' must be a base64-encoded image");
  }
  return bytes;
}

function toResponse(result: IngestResult) {
  const recipe = buildRecipeRecord(result);
  return { recipe, index: buildIndexEntry(recipe) };
}

export function createRecipeRouter(getPipeline: () => IngestPipeline = createIngestPipeline) {
  const router = Router();

  // POST /api/recipe/ingest
  router.post("/ingest", async (req, res) => {
    const body: IngestRequestBody = req.body ?? {};

    if (typeof body.input !== "string" || !body.input.trim()) {
      res.status(400).json({ code: "VALIDATION_ERROR", error: "Field 'input' is required" });
      return;
    }

    try {
      const result = await getPipeline().ingest(body.input, readOptions(body));
      res.json(toResponse(result));
    } catch (error) {
      sendError(res, error, "Failed to ingest recipe");
    }
  });

  // POST /api/recipe/ingest-image
  router.post("/ingest-image", async (req, res) => {
    const body: IngestImageRequestBody = req.body ?? {};

    try {
      const image = decodeImage(body.image);
      const result = await getPipeline().ingestImage(image, {
        title: optionalString(body.title),
        preserveOriginal: body.preserveOriginal === true,
      });
      res.json(toResponse(result));
    } catch (error) {
      sendError(res, error, "Failed to ingest recipe image");
    }
  });

  return router;
}

export default createRecipeRouter();
