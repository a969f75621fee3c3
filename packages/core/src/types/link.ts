/**
 * Link Types
 *
 * A tracked URL with its classification and download state. The zod schema is
 * the persisted shape; optional fields are defaulted when older files are read.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export const LINK_STATUSES = [
  'pending',
  'to_download',
  'to_skip',
  'to_skip_limit',
  'to_reprocess',
  'downloading',
  'downloaded',
  'skipped',
  'error',
] as const;

export type LinkStatus = (typeof LINK_STATUSES)[number];

export const LINK_SOURCES = ['file', 'clipboard', 'manual', 'unknown'] as const;

export type LinkSource = (typeof LINK_SOURCES)[number];

export const LIMIT_KINDS = ['timeout', 'image_count', 'file_size'] as const;

export type LimitKind = (typeof LIMIT_KINDS)[number];

/**
 * Display reference to the filter that classified a link: the filter's numeric
 * id, or a filter name written by older versions.
 */
export const filterReferenceSchema = z.union([z.number().int(), z.string()]).nullable();

export type FilterReference = z.infer<typeof filterReferenceSchema>;

export const linkSchema = z.object({
  id: z.string().min(1).default(() => randomUUID()),
  url: z.string().min(1),
  status: z.enum(LINK_STATUSES).default('pending'),
  source: z.enum(LINK_SOURCES).catch('unknown'),
  sourceFile: z.string().default(''),
  addedAt: z.string().default(() => new Date().toISOString()),
  processedAt: z.string().nullable().default(null),
  downloadedAt: z.string().nullable().default(null),
  filterMatched: filterReferenceSchema.default(null),
  downloadPath: z.string().default(''),
  imagesCount: z.number().int().nonnegative().default(0),
  fileSizeMb: z.number().nonnegative().default(0),
  errorMessage: z.string().default(''),
  limitExceeded: z.enum(LIMIT_KINDS).nullable().default(null),
  deleted: z.boolean().default(false),
  tags: z.array(z.string()).default([]),
  metadata: z.record(z.unknown()).default({}),
});

export type Link = z.infer<typeof linkSchema>;

export type LinkInput = z.input<typeof linkSchema>;

/**
 * Build a new link in its initial state
 */
export function createLink(
  url: string,
  source: LinkSource = 'manual',
  sourceFile: string = ''
): Link {
  return linkSchema.parse({ url, source, sourceFile });
}

