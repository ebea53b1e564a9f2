import sharp from "sharp";

export type VariantName = "grayscale" | "threshold" | "adaptive";

export interface ImageVariant {
  name: VariantName;
  data: Buffer;
  mimeType: string;
}

export interface ImageInfo {
  width: number;
  height: number;
  mimeType: string;
}

export interface ImagePreprocessor {
  /** Throws when the bytes are not a decodable image. */
  inspect(image: Buffer): Promise<ImageInfo>;
  /** Variants in the order OCR should try them. */
  variants(image: Buffer): Promise<ImageVariant[]>;
}

export const GLOBAL_THRESHOLD = 150;
export const ADAPTIVE_BLOCK_SIZE = 11;
export const ADAPTIVE_C = 2;

/**
 * Mean adaptive threshold over a single-channel image: a pixel becomes
 * white when it is brighter than the mean of its blockSize×blockSize
 * neighbourhood minus c. Windows are clipped at the image edges.
 */
export function adaptiveThreshold(
  pixels: Uint8Array,
  width: number,
  height: number,
  blockSize = ADAPTIVE_BLOCK_SIZE,
  c = ADAPTIVE_C
): Uint8Array {
  if (pixels.length !== width * height) {
    throw new Error(`Expected ${width * height} pixels, got ${pixels.length}`);
  }

  const stride = width + 1;
  const integral = new Float64Array(stride * (height + 1));
  for (let y = 0; y < height; y++) {
    let rowSum = 0;
    for (let x = 0; x < width; x++) {
      rowSum += pixels[y * width + x];
      integral[(y + 1) * stride + (x + 1)] = integral[y * stride + (x + 1)] + rowSum;
    }
  }

  const radius = Math.floor(blockSize / 2);
  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    const y0 = Math.max(0, y - radius);
    const y1 = Math.min(height - 1, y + radius);
    for (let x = 0; x < width; x++) {
      const x0 = Math.max(0, x - radius);
      const x1 = Math.min(width - 1, x + radius);
      const sum =
        integral[(y1 + 1) * stride + (x1 + 1)] -
        integral[y0 * stride + (x1 + 1)] -
        integral[(y1 + 1) * stride + x0] +
        integral[y0 * stride + x0];
      const mean = sum / ((y1 - y0 + 1) * (x1 - x0 + 1));
      out[y * width + x] = pixels[y * width + x] > mean - c ? 255 : 0;
    }
  }
  return out;
}

export class SharpPreprocessor implements ImagePreprocessor {
  async inspect(image: Buffer): Promise<ImageInfo> {
    const metadata = await sharp(image).metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error("Unable to read image dimensions");
    }
    return {
      width: metadata.width,
      height: metadata.height,
      mimeType: metadata.format ? `image/${metadata.format}` : "image/jpeg",
    };
  }

  async variants(image: Buffer): Promise<ImageVariant[]> {
    const grayscale = await sharp(image).grayscale().png().toBuffer();
    const threshold = await sharp(image).grayscale().threshold(GLOBAL_THRESHOLD).png().toBuffer();

    const { data, info } = await sharp(image)
      .removeAlpha()
      .toColourspace("b-w")
      .raw()
      .toBuffer({ resolveWithObject: true });
    const binarized = adaptiveThreshold(new Uint8Array(data), info.width, info.height);
    const adaptive = await sharp(Buffer.from(binarized), {
      raw: { width: info.width, height: info.height, channels: 1 },
    })
      .png()
      .toBuffer();

    return [
      { name: "grayscale", data: grayscale, mimeType: "image/png" },
      { name: "threshold", data: threshold, mimeType: "image/png" },
      { name: "adaptive", data: adaptive, mimeType: "image/png" },
    ];
  }
}
