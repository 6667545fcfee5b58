import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const FormatId = z.string().regex(/^[a-z0-9_]+$/, 'Invalid format identifier');
const Extension = z.string().regex(/^\.[a-z0-9]+$/, 'Invalid extension');

const CatalogSchema = z.object({
  input: z.array(FormatId).min(1),
  output: z.array(FormatId).min(1),
  extensions: z.record(FormatId, Extension),
  extensionFormats: z.record(Extension, FormatId),
  contentTypes: z.record(Extension, z.string().min(1)),
});

export type FormatCatalog = z.infer<typeof CatalogSchema>;

const CATALOG_FILE = new URL('../data/formats.json', import.meta.url);

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';
const DEFAULT_EXTENSION = '.out';
const DEFAULT_SOURCE_FORMAT = 'markdown';

export function loadFormatCatalog(file: URL | string = CATALOG_FILE): FormatCatalog {
  const raw = fs.readFileSync(file, 'utf8');
  return CatalogSchema.parse(JSON.parse(raw));
}

const catalog = loadFormatCatalog();
const inputSet = new Set(catalog.input);
const outputSet = new Set(catalog.output);

export const inputFormats: readonly string[] = catalog.input;
export const outputFormats: readonly string[] = catalog.output;

export const isInputFormat = (format: string): boolean => inputSet.has(format);
export const isOutputFormat = (format: string): boolean => outputSet.has(format);

/** File extension written for a format, e.g. `latex` → `.tex`. */
export function extensionFor(format: string): string {
  return catalog.extensions[format] ?? DEFAULT_EXTENSION;
}

/**
 * Guess the source format of an uploaded file from its name.
 * Unknown or missing extensions fall back to markdown.
 */
export function detectFormat(filename: string | undefined): string {
  if (!filename) return DEFAULT_SOURCE_FORMAT;
  const ext = path.extname(filename).toLowerCase();
  return catalog.extensionFormats[ext] ?? DEFAULT_SOURCE_FORMAT;
}

export function contentTypeFor(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return catalog.contentTypes[ext] ?? DEFAULT_CONTENT_TYPE;
}
