// src/utils/file-helpers.ts
import * as fs from 'fs';
import * as path from 'path';

export class FileHelpers {
  /**
   * Ensure directory exists
   */
  static ensureDirectory(dirPath: string): void {
    if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
    }
  }

  static async readJsonFile(filePath: string): Promise<unknown> {
    const content = await fs.promises.readFile(filePath, 'utf-8');
    return JSON.parse(content);
  }

  /**
   * Write JSON with 2-space indentation; non-ASCII text is kept as-is
   */
  static async writeJsonFile(filePath: string, data: unknown): Promise<void> {
    await fs.promises.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
  }

  /**
   * PDF files directly inside a directory, sorted by name
   */
  static listPdfFiles(dirPath: string): string[] {
    return fs.readdirSync(dirPath)
      .filter(f => f.toLowerCase().endsWith('.pdf'))
      .filter(f => fs.statSync(path.join(dirPath, f)).isFile())
      .sort((a, b) => a.localeCompare(b))
      .map(f => path.join(dirPath, f));
  }

  static isDirectory(dirPath: string): boolean {
    return fs.existsSync(dirPath) && fs.statSync(dirPath).isDirectory();
  }

  /**
   * File name without its extension ("reports/Formulary.pdf" -> "Formulary")
   */
  static stem(filePath: string): string {
    return path.basename(filePath, path.extname(filePath));
  }
}
