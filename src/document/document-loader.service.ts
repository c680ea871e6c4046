import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { InvalidArgumentError } from '../common/errors';

@Injectable()
export class DocumentLoaderService {
  private readonly logger = new Logger(DocumentLoaderService.name);

  /**
   * Load every `*.{extension}` file directly inside `directory`, keyed by file
   * name, in file-name order.
   */
  async loadDocuments(directory: string, extension = 'txt'): Promise<Map<string, string>> {
    const suffix = `.${extension.replace(/^\./, '')}`;

    let entries: string[];
    try {
      const stat = await fs.stat(directory);
      if (!stat.isDirectory()) {
        throw new InvalidArgumentError('corpus directory', `${directory} is not a directory`);
      }
      entries = await fs.readdir(directory);
    } catch (error) {
      if (error instanceof InvalidArgumentError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidArgumentError('corpus directory', `cannot read ${directory}: ${reason}`);
    }

    const names = entries.filter(name => name.endsWith(suffix)).sort();
    const documents = new Map<string, string>();

    for (const name of names) {
      const filePath = path.join(directory, name);
      const stat = await fs.stat(filePath);
      if (!stat.isFile()) continue;
      documents.set(name, await fs.readFile(filePath, 'utf8'));
    }

    if (documents.size === 0) {
      this.logger.warn(`No ${suffix} documents found in ${directory}`);
    } else {
      this.logger.log(`Loaded ${documents.size} documents from ${directory}`);
    }

    return documents;
  }
}
