import fs from "fs/promises";
import path from "path";

import { silentLogger, type Logger } from "../logger.js";
import type { ImageAsset } from "./reportDocument.js";

const IMAGE_MIME: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg"
};

/**
 * Reads the branding image into a data URI. A missing or unsupported file is not an error: the
 * report is produced without a logo and watermark.
 */
export async function loadLogoAsset(params: { logoPath: string; logger?: Logger }): Promise<ImageAsset | null> {
  const logger = params.logger ?? silentLogger;
  const mime = IMAGE_MIME[path.extname(params.logoPath).toLowerCase()];
  if (!mime) {
    logger.warn({ logoPath: params.logoPath }, "logo must be a .png or .jpg file, skipping");
    return null;
  }

  let bytes: Buffer;
  try {
    bytes = await fs.readFile(params.logoPath);
  } catch (err: unknown) {
    const code = err instanceof Error && "code" in err ? String(err.code) : "unknown";
    logger.warn({ logoPath: params.logoPath, code }, "logo not found, report will have no logo or watermark");
    return null;
  }

  return { dataUri: `data:${mime};base64,${bytes.toString("base64")}`, alt: "Logo" };
}
