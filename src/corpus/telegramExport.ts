/**
 * Telegram Export Extraction
 *
 * Turns a Telegram Desktop channel export (`result.json`) into the flat
 * list of post texts the corpus loader reads. Service messages (pins,
 * joins, title changes) are skipped; formatted text arrives as a mix of
 * plain strings and entity objects and is flattened back to one string.
 */

import { z } from 'zod';

const TextEntitySchema = z.object({ text: z.string() }).passthrough();

const MessageTextSchema = z.union([z.string(), z.array(z.union([z.string(), TextEntitySchema]))]);

const ExportMessageSchema = z
  .object({
    id: z.number().optional(),
    type: z.string().optional(),
    text: MessageTextSchema.optional(),
  })
  .passthrough();

export const TelegramExportSchema = z
  .object({
    name: z.string().optional(),
    id: z.union([z.number(), z.string()]).optional(),
    messages: z.array(ExportMessageSchema),
  })
  .passthrough();

export type TelegramExport = z.infer<typeof TelegramExportSchema>;
export type MessageText = z.infer<typeof MessageTextSchema>;

export function flattenText(text: MessageText | undefined): string {
  if (text === undefined) return '';
  if (typeof text === 'string') return text;
  return text.map((part) => (typeof part === 'string' ? part : part.text)).join('');
}

/**
 * Extract the post texts of an export, in message order, trimmed, with
 * empty posts (photo-only, stickers) dropped.
 *
 * @throws ZodError if `data` is not shaped like a channel export
 */
export function extractPostTexts(data: unknown): string[] {
  const parsed = TelegramExportSchema.parse(data);

  return parsed.messages
    .filter((message) => message.type !== 'service')
    .map((message) => flattenText(message.text).trim())
    .filter((text) => text.length > 0);
}
