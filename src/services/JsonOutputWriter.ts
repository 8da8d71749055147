// src/services/JsonOutputWriter.ts
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Category, ExtractionResult, ExtractionWarning, TOCEntry } from '../types/extraction.types';
import { CategoriesFileSchema, TocFileSchema, WarningsFileSchema } from './OutputSchemas';
import { FileHelpers } from '../utils/file-helpers';

export const CATEGORIES_FILE = 'extracted_data.json';
export const WARNINGS_FILE = 'extraction_warnings.json';
export const TOC_FILE = 'table_of_contents.json';

export interface JsonOutputPaths {
  categories: string;
  warnings: string;
  tableOfContents: string;
}

export interface LoadedExtraction {
  categories: Category[];
  warnings: ExtractionWarning[];
  tableOfContents: TOCEntry[];
}

export class JsonOutputWriter {
  /**
   * Write the three JSON files of one document into its output directory.
   */
  async write(result: ExtractionResult, outputDir: string): Promise<JsonOutputPaths> {
    FileHelpers.ensureDirectory(outputDir);

    const paths: JsonOutputPaths = {
      categories: path.join(outputDir, CATEGORIES_FILE),
      warnings: path.join(outputDir, WARNINGS_FILE),
      tableOfContents: path.join(outputDir, TOC_FILE)
    };

    await FileHelpers.writeJsonFile(paths.categories, result.categories);
    await FileHelpers.writeJsonFile(paths.warnings, result.warnings);
    await FileHelpers.writeJsonFile(paths.tableOfContents, result.table_of_contents);

    return paths;
  }

  /**
   * Read an extracted_data.json back, plus the warnings and TOC files beside it when present.
   */
  async load(categoriesPath: string): Promise<LoadedExtraction> {
    const dir = path.dirname(categoriesPath);
    const categories = await this.readValidated(categoriesPath, CategoriesFileSchema);

    const warningsPath = path.join(dir, WARNINGS_FILE);
    const tocPath = path.join(dir, TOC_FILE);

    return {
      categories,
      warnings: fs.existsSync(warningsPath) ? await this.readValidated(warningsPath, WarningsFileSchema) : [],
      tableOfContents: fs.existsSync(tocPath) ? await this.readValidated(tocPath, TocFileSchema) : []
    };
  }

  private async readValidated<T>(filePath: string, schema: z.ZodType<T>): Promise<T> {
    const raw = await FileHelpers.readJsonFile(filePath);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`${filePath} does not match the expected structure: ${issue?.path.join('.') || '(root)'} ${issue?.message ?? ''}`.trim());
    }
    return parsed.data;
  }
}
