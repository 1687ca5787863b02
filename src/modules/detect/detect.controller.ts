/**
 * Detect Controller
 * Leaf disease analysis of an uploaded image with Gemini vision
 */

import { Request, Response } from 'express';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { IImageAnalyzer, extractJson } from '../../lib/gemini';
import { JsonObject } from '../../lib/cache/cache.types';
import { jsonObjectSchema } from '../../lib/cache/cache.schema';
import { describeError } from '../../lib/upstream/upstream.errors';
import { LEAF_DISEASE_PROMPT } from './detect.prompts';
import { detectRequestSchema, sniffImageType } from './detect.validation';

const DEFAULT_FILENAME = 'upload';

/**
 * The model's JSON object, or its raw text when it did not answer with one
 */
export function parseDetectionReply(text: string): JsonObject {
  let candidate: unknown;
  try {
    candidate = extractJson(text);
  } catch (error: unknown) {
    console.warn(`⚠️ Detection reply is not JSON: ${describeError(error)}`);
    return { raw_response: text };
  }

  const parsed = jsonObjectSchema.safeParse(candidate);
  return parsed.success ? parsed.data : { raw_response: text };
}

export class DetectController {
  private analyzer: IImageAnalyzer;

  constructor(analyzer: IImageAnalyzer) {
    this.analyzer = analyzer;
  }

  /**
   * POST /api/detect
   */
  detectDisease = asyncHandler(async (req: Request, res: Response) => {
    const { image, mimeType, filename } = detectRequestSchema.parse(req.body);

    const detectedType = sniffImageType(Buffer.from(image, 'base64'));
    if (!detectedType) {
      throw new ApiError(400, 'Uploaded file is not a valid image');
    }

    if (mimeType && mimeType !== detectedType) {
      console.warn(`⚠️ Declared ${mimeType} but the upload is ${detectedType}`);
    }

    let reply: string;
    try {
      reply = await this.analyzer.analyzeImage(LEAF_DISEASE_PROMPT, { data: image, mimeType: detectedType });
    } catch (error: unknown) {
      console.error('❌ Gemini vision error:', describeError(error));
      throw new ApiError(502, 'Image analysis failed. Please try again later.');
    }

    res.json({ ...parseDetectionReply(reply), filename: filename ?? DEFAULT_FILENAME });
  });
}
