/**
 * KnowledgeAggregator - Build the knowledge catalogue JSON from an export
 */

import path from 'path';
import { Logger } from '../utils/logger';
import { isDirectory, readTextFile } from '../utils/files/FileReader';
import { writeJsonFile } from '../utils/files/FileWriter';
import { findFiles } from '../utils/files/FileSearch';
import { FileOperationError } from '../utils/files/types';
import { AggregateSummary, SyncOutcome, configError, runtimeError, success } from '../models/SyncModels';
import { inferCategory, inferType } from './KnowledgeClassifier';
import { Category, KnowledgeCatalogue, KnowledgeItem } from './types';

/** Navigation pages that carry no knowledge of their own */
const EXCLUDED_FILES = new Set(['home.md', 'index.md']);

export interface AggregateOptions {
  inputDir: string;
  outputFile: string;
  /** Called after each file with the number processed so far */
  onProgress?: (done: number, total: number) => void;
}

export function countByCategory(items: KnowledgeItem[]): Record<Category, number> {
  const counts: Record<Category, number> = { Networking: 0, Security: 0, DevOps: 0 };
  for (const item of items) {
    counts[item.category]++;
  }
  return counts;
}

export async function collectKnowledgeItems(
  inputDir: string,
  onProgress?: (done: number, total: number) => void
): Promise<KnowledgeItem[]> {
  const files = (await findFiles('**/*.md', { cwd: inputDir, absolute: true })).filter(
    file => !EXCLUDED_FILES.has(path.basename(file).toLowerCase())
  );

  const items: KnowledgeItem[] = [];
  for (const [index, file] of files.entries()) {
    const read = await readTextFile(file);
    const content = read.ok ? read.text : '';
    const fileName = path.basename(file);
    const folders = path.relative(inputDir, path.dirname(file)).split(path.sep).filter(Boolean);

    items.push({
      id: String(items.length + 1),
      file_name: fileName,
      category: inferCategory(folders, content),
      type: inferType(fileName),
      content
    });
    onProgress?.(index + 1, files.length);
  }
  return items;
}

export class KnowledgeAggregator {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async run(options: AggregateOptions): Promise<SyncOutcome<AggregateSummary>> {
    if (!(await isDirectory(options.inputDir))) {
      return configError<AggregateSummary>(`Input folder not found: ${options.inputDir}`);
    }

    try {
      const items = await collectKnowledgeItems(options.inputDir, options.onProgress);
      const catalogue: KnowledgeCatalogue = { items };
      await writeJsonFile(options.outputFile, catalogue);

      const byCategory = countByCategory(items);
      this.logger.info(`Wrote ${items.length} items to ${options.outputFile}`, { byCategory });
      return success({ outputFile: options.outputFile, itemCount: items.length, byCategory });
    } catch (error: unknown) {
      if (error instanceof FileOperationError) {
        return runtimeError<AggregateSummary>(error.message);
      }
      throw error;
    }
  }
}
