import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import logger from '../lib/logger.js';

export interface LetterSink {
  /** Persist an accepted letter. */
  write(vacancyId: string, letterText: string): Promise<string>;
  /** Persist the last draft of a rejected vacancy for manual review. */
  writeRejected(vacancyId: string, letterText: string): Promise<string>;
}

/** Local calendar date as YYYY-MM-DD. */
export function formatLetterDate(date: Date): string {
  const yyyy = date.getFullYear();
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

export function letterFileName(vacancyId: string, date: Date): string {
  return `${vacancyId}-${formatLetterDate(date)}.txt`;
}

/**
 * Writes one text file per vacancy: accepted letters into `lettersDir`,
 * rejected drafts into `lettersDir/defective`.
 */
export class FileLetterSink implements LetterSink {
  constructor(
    private readonly lettersDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async write(vacancyId: string, letterText: string): Promise<string> {
    return this.save(this.lettersDir, vacancyId, letterText);
  }

  async writeRejected(vacancyId: string, letterText: string): Promise<string> {
    return this.save(path.join(this.lettersDir, 'defective'), vacancyId, letterText);
  }

  private async save(dir: string, vacancyId: string, letterText: string): Promise<string> {
    if (!/^[\w.]+$/.test(vacancyId)) {
      throw new Error(`Refusing to write letter for unsafe vacancy id "${vacancyId}"`);
    }
    await mkdir(dir, { recursive: true });
    const filePath = path.join(dir, letterFileName(vacancyId, this.now()));
    await writeFile(filePath, `${letterText.trim()}\n`, 'utf8');
    logger.debug({ vacancyId, filePath }, 'Saved letter');
    return filePath;
  }
}
