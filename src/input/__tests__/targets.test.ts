import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { readTargetNames } from '../targets.js';
import { InputFormatError, InputMissingError } from '../../utils/errors.js';

describe('readTargetNames', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'targets-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function csv(content: string): Promise<string> {
    const path = join(dir, 'newspapers.csv');
    await writeFile(path, content, 'utf-8');
    return path;
  }

  it('reads names in file order, trimming and skipping blanks', async () => {
    const path = await csv('\uFEFFNewspaperName,Country\nΚαθημερινή,GR\n  Τα Νέα  ,GR\n,GR\n\nLe Monde,FR\n');

    expect(await readTargetNames(path)).toEqual(['Καθημερινή', 'Τα Νέα', 'Le Monde']);
  });

  it('keeps duplicate names', async () => {
    const path = await csv('NewspaperName\nAlpha\nAlpha\n');

    expect(await readTargetNames(path)).toEqual(['Alpha', 'Alpha']);
  });

  it('excludes names longer than the limit', async () => {
    const path = await csv('NewspaperName\nAlpha\nThe Extraordinarily Long Daily\nBeta\n');

    expect(await readTargetNames(path, { maxLength: 10 })).toEqual(['Alpha', 'Beta']);
  });

  it('throws InputMissingError when the file does not exist', async () => {
    await expect(readTargetNames(join(dir, 'absent.csv'))).rejects.toBeInstanceOf(InputMissingError);
  });

  it('throws InputFormatError when the name column is absent', async () => {
    const path = await csv('Name\nAlpha\n');

    await expect(readTargetNames(path)).rejects.toThrow(InputFormatError);
    await expect(readTargetNames(path)).rejects.toMatchObject({
      code: 'INPUT_FORMAT',
      details: { columns: ['Name'] },
    });
  });

  it('throws InputFormatError for an empty file', async () => {
    const path = await csv('');

    await expect(readTargetNames(path)).rejects.toThrow("'NewspaperName' column not found in CSV");
  });

  it('throws InputFormatError for an unclosed quote', async () => {
    const path = await csv('NewspaperName\n"Τα Νέα\nAlpha');

    await expect(readTargetNames(path)).rejects.toMatchObject({
      code: 'INPUT_FORMAT',
      message: `Could not parse CSV at ${path}`,
    });
  });
});
