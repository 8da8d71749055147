// src/services/OutputSchemas.ts
// zod schemas for the JSON files written per document, used when reading them back.

import { z } from 'zod';
import { WarningReason } from '../types/extraction.types';

export const RowSchema = z.record(z.string());

export const SubCategorySchema = z.object({
  name: z.string(),
  rows: z.array(RowSchema)
});

export const CategorySchema = z.object({
  name: z.string(),
  subCategories: z.array(SubCategorySchema)
});

export const CategoriesFileSchema = z.array(CategorySchema);

export const WarningSchema = z.object({
  pageNumber: z.number().int(),
  rawText: z.string(),
  reason: z.nativeEnum(WarningReason),
  context: z.string().optional()
});

export const WarningsFileSchema = z.array(WarningSchema);

export const TocEntrySchema = z.object({
  label: z.string(),
  pageReference: z.union([z.string(), z.number().int()])
});

export const TocFileSchema = z.array(TocEntrySchema);
