import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ensureDailyDirectory, formatDateStamp } from '../directory.js';

describe('formatDateStamp', () => {
  it('formats the local date with padding', () => {
    expect(formatDateStamp(new Date(2024, 0, 5, 23, 59))).toBe('2024-01-05');
    expect(formatDateStamp(new Date(2024, 10, 30))).toBe('2024-11-30');
  });
});

describe('ensureDailyDirectory', () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) {
      await rm(root, { recursive: true, force: true });
    }
  });

  it('creates the dated folder, including missing parents, and reuses it', async () => {
    root = await mkdtemp(join(tmpdir(), 'output-'));
    const base = join(root, 'downloaded_news_pictures');
    const now = new Date(2024, 5, 15);

    const first = await ensureDailyDirectory(base, now);
    const second = await ensureDailyDirectory(base, now);

    expect(first).toBe(join(base, '2024-06-15'));
    expect(second).toBe(first);
    expect((await stat(first)).isDirectory()).toBe(true);
  });
});
