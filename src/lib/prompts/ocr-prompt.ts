export const OCR_TRANSCRIBE_SYSTEM_PROMPT = `You are an OCR engine. Transcribe every piece of text visible in the image exactly as printed.
Output plain text only, one printed line per output line. Do not correct, summarize, translate or format anything.
If the image contains no readable text, output nothing.`;

export const OCR_TRANSCRIBE_USER_PROMPT = "Transcribe the text in this image.";

const PRESERVE_ENHANCE_PROMPT = `You are an expert at reading and transcribing recipes from images EXACTLY as written.
Your task is to extract the recipe text from the provided image, correcting ONLY obvious OCR errors.
DO NOT:
- Reformat or reorganize the text
- Change wording or phrasing
- Add formatting like "###" or bullet points that aren't in the original
- Improve grammar or style

DO:
- Fix obvious OCR errors (like 0 instead of O, 1 instead of l)
- Keep the exact original wording and structure
- Preserve the original formatting as much as possible

Extract the text EXACTLY as it appears in the image.`;

const STANDARD_ENHANCE_PROMPT = `You are an expert at reading and transcribing recipes from images.
Your task is to extract the recipe text from the provided image, correcting any OCR errors
and formatting it properly. Focus on:
1. Recipe title
2. Ingredients list (with quantities and units)
3. Instructions/directions
4. Any notes about servings, cooking time, or temperature

Format the output as clean, readable recipe text.`;

// Only a prefix of the OCR output is sent; the image itself carries the rest.
const OCR_HINT_LENGTH = 500;

export function enhanceSystemPrompt(preserveOriginal: boolean): string {
  return preserveOriginal ? PRESERVE_ENHANCE_PROMPT : STANDARD_ENHANCE_PROMPT;
}

export function buildEnhanceUserPrompt(ocrText: string): string {
  return `Please extract and format the recipe from this image. Here's what OCR detected (may have errors): ${ocrText.slice(0, OCR_HINT_LENGTH)}`;
}
