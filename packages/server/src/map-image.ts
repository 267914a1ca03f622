import path from "node:path";
import { writeFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { GlobalFonts, createCanvas, loadImage, type FontKey, type Image } from "@napi-rs/canvas";
import { NetworkError, RenderError, errorMessage } from "./errors.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_FONT_PATH = path.resolve(
  __dirname,
  "..",
  "assets",
  "fonts",
  "DejaVuSans-Bold.ttf",
);
const FONT_FAMILY_PREFIX = "MapModeOverlay";

/** Darkened map art, kept on disk for inspection. */
export const INTERMEDIATE_FILE = "info_image.jpg";
/** Final composite uploaded as the avatar. */
export const OUTPUT_FILE = "map_mode.jpg";

export const DARKEN_LEVELS = 25;

export interface RenderOptions {
  /** Directory both images are written to. Defaults to the working directory. */
  outputDir?: string;
  fontPath?: string;
}

/**
 * Where and how large the mode abbreviation is drawn.
 *
 * `scaleX`/`scaleY` are glyph scale factors (em width and height in pixels),
 * not a bounding box. The horizontal factor uses integer division.
 */
export interface OverlayLayout {
  scaleX: number;
  scaleY: number;
  x: number;
  y: number;
}

export function overlayLayout(width: number, height: number): OverlayLayout {
  return {
    scaleX: Math.trunc(width / 3),
    scaleY: height / 1.7,
    x: Math.trunc(width / 3.5),
    y: Math.trunc(height / 4.8),
  };
}

/** Lower every RGB channel of an RGBA buffer by `amount`, clamped at 0. */
export function darken(pixels: Uint8ClampedArray, amount: number): void {
  for (let i = 0; i < pixels.length; i += 4) {
    pixels[i] = Math.max(0, pixels[i] - amount);
    pixels[i + 1] = Math.max(0, pixels[i + 1] - amount);
    pixels[i + 2] = Math.max(0, pixels[i + 2] - amount);
  }
}

// Font path -> family alias it was registered under.
const registeredFonts = new Map<string, string>();

function ensureFont(fontPath: string): string {
  const known = registeredFonts.get(fontPath);
  if (known) return known;

  const family = `${FONT_FAMILY_PREFIX}${registeredFonts.size}`;
  let loaded: FontKey | null;
  try {
    loaded = GlobalFonts.registerFromPath(fontPath, family);
  } catch (err) {
    throw new RenderError(`Could not load font asset ${fontPath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (!loaded) {
    throw new RenderError(`Could not load font asset ${fontPath}`);
  }
  registeredFonts.set(fontPath, family);
  return family;
}

async function download(imageUrl: string): Promise<Buffer> {
  try {
    const res = await fetch(imageUrl);
    if (!res.ok) {
      throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
    }
    return Buffer.from(await res.arrayBuffer());
  } catch (err) {
    throw new NetworkError(`Map image download from ${imageUrl} failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

async function decode(bytes: Buffer): Promise<Image> {
  let image: Image;
  try {
    image = await loadImage(bytes);
  } catch (err) {
    throw new RenderError(`Map image could not be decoded: ${errorMessage(err)}`, { cause: err });
  }
  if (image.width === 0 || image.height === 0) {
    throw new RenderError("Map image decoded to an empty bitmap");
  }
  return image;
}

async function save(file: string, encode: () => Promise<Buffer>): Promise<void> {
  try {
    await writeFile(file, await encode());
  } catch (err) {
    throw new RenderError(`Could not write ${file}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Composite the mode abbreviation onto darkened map art.
 *
 * Both files are overwritten on every call, so rendering the same inputs
 * twice yields the same path and an equivalent image.
 */
export async function renderMapImage(
  modeAbbreviation: string,
  imageUrl: string,
  options: RenderOptions = {},
): Promise<string> {
  const outputDir = options.outputDir ?? ".";
  const fontFamily = ensureFont(options.fontPath ?? DEFAULT_FONT_PATH);

  const image = await decode(await download(imageUrl));
  const { width, height } = image;

  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext("2d");
  ctx.drawImage(image, 0, 0);

  const frame = ctx.getImageData(0, 0, width, height);
  darken(frame.data, DARKEN_LEVELS);
  ctx.putImageData(frame, 0, 0);

  await save(path.join(outputDir, INTERMEDIATE_FILE), () => canvas.encode("jpeg"));

  if (modeAbbreviation) {
    const layout = overlayLayout(width, height);
    ctx.save();
    ctx.translate(layout.x, layout.y);
    ctx.scale(layout.scaleX / layout.scaleY, 1);
    ctx.font = `${layout.scaleY}px ${fontFamily}`;
    ctx.textBaseline = "top";
    ctx.fillStyle = "rgba(255, 255, 255, 1)";
    ctx.fillText(modeAbbreviation, 0, 0);
    ctx.restore();
  }

  const output = path.join(outputDir, OUTPUT_FILE);
  await save(output, () => canvas.encode("jpeg"));
  return output;
}
