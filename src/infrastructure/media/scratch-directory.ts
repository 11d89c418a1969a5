import { randomUUID } from 'node:crypto';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { ScratchProvider, ScratchSpace } from '../../domain/media/index.js';

export function dailyDirectoryName(date: Date): string {
  const year = date.getFullYear().toString();
  const month = (date.getMonth() + 1).toString().padStart(2, '0');
  const day = date.getDate().toString().padStart(2, '0');
  return `daily-${year}-${month}-${day}`;
}

/**
 * Per-day working area shared by every request of that day. Nothing written
 * here is removed; requests stay apart through the token in each file name.
 */
export class ScratchDirectory implements ScratchProvider {
  public constructor(
    private readonly baseDirectory: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public get directory(): string {
    return path.join(this.baseDirectory, dailyDirectoryName(this.clock()));
  }

  public async open(token: string = randomUUID()): Promise<ScratchSpace> {
    const directory = this.directory;
    await mkdir(directory, { recursive: true });

    return {
      directory,
      token,
      file: (stem: string, extension: string) =>
        path.join(directory, `${stem}-${token}.${extension.replace(/^\./, '')}`),
    };
  }
}
