/**
 * Detect request schema and image checks
 */

import { z } from 'zod';

const DATA_URL_PATTERN = /^data:([\w.+-]+\/[\w.+-]+);base64,/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export const detectRequestSchema = z.object({
  image: z
    .string()
    .min(1, 'Image is required')
    .transform((value) => value.replace(DATA_URL_PATTERN, '').replace(/\s+/g, ''))
    .refine((value) => value.length > 0 && BASE64_PATTERN.test(value), { message: 'Image must be base64 encoded' }),
  mimeType: z
    .string()
    .regex(/^image\/[\w.+-]+$/, 'mimeType must be an image type')
    .optional(),
  filename: z.string().trim().min(1).max(255).optional(),
});

export type DetectRequest = z.infer<typeof detectRequestSchema>;

/**
 * Image type from the file signature, or null when the bytes are not a supported image
 */
export function sniffImageType(bytes: Buffer): string | null {
  if (bytes.length >= 4 && bytes[0] === 0x89 && bytes.subarray(1, 4).toString('ascii') === 'PNG') {
    return 'image/png';
  }
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return 'image/jpeg';
  }
  if (bytes.length >= 12 && bytes.subarray(0, 4).toString('ascii') === 'RIFF' && bytes.subarray(8, 12).toString('ascii') === 'WEBP') {
    return 'image/webp';
  }
  if (bytes.length >= 4 && bytes.subarray(0, 4).toString('ascii') === 'GIF8') {
    return 'image/gif';
  }
  return null;
}
