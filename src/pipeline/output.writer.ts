import { Injectable } from '@nestjs/common';
import fs from 'node:fs/promises';

/**
 * Append-only sink for output records. Each call opens the file in append
 * mode, so lines from earlier runs are kept unless `truncate` is called.
 */
@Injectable()
export class OutputWriter {
  async append(filePath: string, lines: readonly string[]): Promise<void> {
    if (lines.length === 0) return;
    await fs.appendFile(filePath, lines.map((l) => `${l}\n`).join(''), 'utf-8');
  }

  async truncate(filePath: string): Promise<void> {
    await fs.writeFile(filePath, '', 'utf-8');
  }
}
