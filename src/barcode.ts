import type { AiProvider, ImageInput, ImageMediaType } from "./ai-provider.js";
import { HttpError, errorMessage } from "./errors.js";
import type { FoodCatalog } from "./food-catalog.js";
import { type Logger, createLogger } from "./logger.js";
import { BARCODE_OCR_PROMPT } from "./prompts.js";
import type { Food } from "./types.js";

const EXTENSION_TYPES: Record<string, ImageMediaType> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  webp: "image/webp",
};

const MEDIA_TYPES: readonly ImageMediaType[] = ["image/png", "image/jpeg", "image/gif", "image/webp"];

function asMediaType(value: string): ImageMediaType | null {
  const normalized = value.trim().toLowerCase() === "image/jpg" ? "image/jpeg" : value.trim().toLowerCase();
  return MEDIA_TYPES.find((t) => t === normalized) ?? null;
}

// Leading base64 of each format's magic bytes.
const SIGNATURES: Array<[prefix: string, type: ImageMediaType]> = [
  ["iVBORw0KGgo", "image/png"],
  ["/9j/", "image/jpeg"],
  ["R0lGOD", "image/gif"],
  ["UklGR", "image/webp"],
];

export function sniffMediaType(base64: string): ImageMediaType | null {
  return SIGNATURES.find(([prefix]) => base64.startsWith(prefix))?.[1] ?? null;
}

export type ScanPayload = {
  image: string;
  media_type?: string;
  filename?: string;
};

/**
 * Accepts raw base64 or a `data:` URL. The type comes from the URL or
 * `media_type`, then the filename extension, then the leading bytes.
 */
export function parseImagePayload(payload: ScanPayload): ImageInput {
  let data = payload.image.trim();
  let declared = payload.media_type;

  const dataUrl = data.match(/^data:([^;,]+);base64,(.*)$/s);
  if (dataUrl) {
    declared = dataUrl[1];
    data = dataUrl[2] ?? "";
  }
  data = data.replace(/\s+/g, "");
  if (!data) {
    throw new HttpError(400, "No file provided");
  }
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(data)) {
    throw new HttpError(400, "Image must be base64 encoded");
  }

  let mediaType = declared ? asMediaType(declared) : null;
  if (!declared && payload.filename) {
    const ext = payload.filename.includes(".") ? payload.filename.split(".").pop() : undefined;
    mediaType = ext ? (EXTENSION_TYPES[ext.toLowerCase()] ?? null) : null;
  } else if (!declared) {
    mediaType = sniffMediaType(data);
  }
  if (!mediaType) {
    throw new HttpError(400, "Invalid file type");
  }
  return { mediaType, data };
}

// ── Barcode text ────────────────────────────────────────────────────────────

/** GTIN-8/12/13/14 check digit. */
export function isValidGtin(code: string): boolean {
  if (!/^\d{8,14}$/.test(code)) {
    return false;
  }
  const digits = [...code].map(Number);
  const check = digits.pop();
  let sum = 0;
  digits.reverse().forEach((d, i) => {
    sum += i % 2 === 0 ? d * 3 : d;
  });
  return (10 - (sum % 10)) % 10 === check;
}

function isCodeLength(digits: string): boolean {
  return digits.length >= 8 && digits.length <= 14;
}

/**
 * 8-14 digit codes. Digit groups split by single spaces or dashes are read as
 * one printed code when joined, and each group that is a code by itself is
 * also offered.
 */
export function extractBarcodeCandidates(text: string): string[] {
  const candidates: string[] = [];
  for (const run of text.match(/\d(?:[ -]?\d)*/g) ?? []) {
    const pieces = run.split(/[ -]/);
    const joined = pieces.join("");
    if (isCodeLength(joined)) {
      candidates.push(joined);
    }
    if (pieces.length > 1) {
      candidates.push(...pieces.filter(isCodeLength));
    }
  }
  return candidates;
}

export function pickBarcode(text: string): string | null {
  if (text.trim().toUpperCase() === "NONE") {
    return null;
  }
  const candidates = extractBarcodeCandidates(text);
  return candidates.find(isValidGtin) ?? candidates[0] ?? null;
}

// ── Scanner ─────────────────────────────────────────────────────────────────

export type ScanResult = {
  barcode: string;
  food: Food;
};

export class BarcodeScanner {
  private readonly log: Logger;

  constructor(
    private readonly provider: AiProvider | null,
    private readonly catalog: FoodCatalog,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger("barcode");
  }

  async readBarcode(image: ImageInput): Promise<string | null> {
    if (!this.provider) {
      throw new HttpError(503, "Barcode scanning requires an AI provider");
    }
    let reply: string;
    try {
      reply = await this.provider.complete({
        prompt: BARCODE_OCR_PROMPT,
        maxTokens: 50,
        temperature: 0,
        image,
      });
    } catch (err) {
      this.log.error("Barcode OCR failed", { provider: this.provider.name, error: errorMessage(err) });
      throw new HttpError(500, `Error processing image: ${errorMessage(err)}`);
    }
    const barcode = pickBarcode(reply);
    this.log.debug("Barcode OCR reply", { reply, barcode });
    return barcode;
  }

  async scan(payload: ScanPayload): Promise<ScanResult> {
    const image = parseImagePayload(payload);
    const barcode = await this.readBarcode(image);
    if (!barcode) {
      throw new HttpError(400, "No barcode detected in image");
    }
    const food = await this.catalog.lookupByUpc(barcode);
    if (!food) {
      throw new HttpError(404, "Food not found in database");
    }
    return { barcode, food };
  }
}
