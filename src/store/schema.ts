/**
 * Schema of the `library.yaml` record store file.
 */

import { z } from "zod";

export const LIBRARY_FILE_VERSION = 1;

const optionalText = z.string().nullable().optional();

export const LibraryRecordSchema = z.object({
  id: z.number().int().positive(),
  syncKey: z.string().min(1).optional(),
  title: z.string(),
  authors: z.array(z.string()).default([]),
  abstract: optionalText,
  venueFull: optionalText,
  venueAcronym: optionalText,
  year: z.number().int().nullable().optional(),
  volume: optionalText,
  issue: optionalText,
  pages: optionalText,
  paperType: optionalText,
  doi: optionalText,
  preprintId: optionalText,
  category: optionalText,
  url: optionalText,
  pdfPath: optionalText,
  notes: optionalText,
  tags: z.array(z.string()).default([]),
  addedDate: z.string(),
  modifiedDate: z.string(),
});

export const LibraryCollectionSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  description: optionalText,
  createdAt: z.string(),
  lastModified: z.string(),
  paperIds: z.array(z.number().int()).default([]),
});

export const LibraryFileSchema = z.object({
  version: z.literal(LIBRARY_FILE_VERSION),
  nextId: z.number().int().positive().default(1),
  records: z.array(LibraryRecordSchema).default([]),
  collections: z.array(LibraryCollectionSchema).default([]),
});

export type LibraryFile = z.infer<typeof LibraryFileSchema>;

export function createEmptyLibrary(): LibraryFile {
  return {
    version: LIBRARY_FILE_VERSION,
    nextId: 1,
    records: [],
    collections: [],
  };
}
