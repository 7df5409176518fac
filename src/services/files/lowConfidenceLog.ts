import path from 'path';
import fs from 'fs-extra';

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Append-only audit of rejected matches:
 * `original,parsed title,provider title,score`
 */
export class LowConfidenceLog {
  constructor(private readonly filePath: string) {}

  async append(original: string, parsedTitle: string, providerTitle: string, score: number): Promise<void> {
    const line = [original, parsedTitle, providerTitle].map(csvField).join(',') + `,${score.toFixed(2)}\n`;
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.appendFile(this.filePath, line, 'utf8');
  }
}
