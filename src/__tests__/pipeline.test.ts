import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import nock from 'nock';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import { PDFDocument } from 'pdf-lib';
import { runPipeline } from '../pipeline.js';
import { StaticHtmlSession } from '../scraper/static-session.js';
import type { SessionHandle } from '../scraper/types.js';

const FRONTPAGES_INDEX = 'https://www.frontpages.gr/';
const ZOUGLA_INDEX = 'https://www.zougla.gr/newspapers/';
const clock = (): Date => new Date(2024, 5, 15, 7);

function thumber(name: string, date: string, src: string): string {
  return `<div class="thumber"><div class="paperName"><a href="#">${name}</a></div><div class="paperdate">${date}</div><img src="${src}"></div>`;
}

function zouglaBlock(name: string, date: string, href: string): string {
  return `<div class="newspaper-block"><div class="front-img"><a href="${href}"><img src="/t-sm.jpg"></a></div><div class="newspaper-info"><strong>${name}</strong> ${date}</div></div>`;
}

const PAGES: Record<string, string> = {
  [FRONTPAGES_INDEX]: [
    thumber('Alpha', '15 / 6', '/data/alpha300.jpg'),
    thumber('Beta', '14 / 6', '/data/beta300.jpg'),
    thumber('Gamma', '14 / 6', '/data/gamma300.jpg'),
  ].join(''),
  [ZOUGLA_INDEX]: [
    zouglaBlock('BETA', '15/06/2024', '/newspapers/beta/'),
    zouglaBlock('GAMMA', '14/06/2024', '/newspapers/gamma/'),
  ].join(''),
  'https://www.zougla.gr/newspapers/beta/': '<div class="newspaper-cover"><img src="/covers/beta.jpg"></div>',
  'https://www.zougla.gr/newspapers/gamma/': '<div class="newspaper-cover"><img src="/covers/gamma.jpg"></div>',
};

function staticSession(): Promise<SessionHandle> {
  const session = new StaticHtmlSession(async (url) => {
    const html = PAGES[url];
    if (html === undefined) {
      throw new Error(`No page for ${url}`);
    }
    return html;
  });
  return Promise.resolve({ session, close: async () => {} });
}

function jpeg(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 20, g: 120, b: 200 } } })
    .jpeg()
    .toBuffer();
}

describe('runPipeline', () => {
  let root: string;
  let alphaJpeg: Buffer;
  let betaJpeg: Buffer;

  beforeAll(async () => {
    nock.disableNetConnect();
    alphaJpeg = await jpeg(30, 20);
    betaJpeg = await jpeg(40, 10);
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'pipeline-'));
  });

  afterEach(async () => {
    nock.cleanAll();
    await rm(root, { recursive: true, force: true });
  });

  async function targets(...names: string[]): Promise<string> {
    const path = join(root, 'newspapers.csv');
    await writeFile(path, ['NewspaperName', ...names].join('\n'), 'utf-8');
    return path;
  }

  it('collects each paper from the first site that has it today and builds the PDF', async () => {
    nock('https://www.frontpages.gr').get('/data/alphaI.jpg').reply(200, alphaJpeg);
    nock('https://www.zougla.gr').get('/covers/beta.jpg').reply(200, betaJpeg);
    const outputRoot = join(root, 'out');

    const result = await runPipeline({
      csvPath: await targets('Alpha', 'Beta'),
      outputRoot,
      clock,
      openSession: staticSession,
    });

    const day = join(outputRoot, '2024-06-15');
    expect(result.status).toBe('completed');
    expect(result.targets).toBe(2);
    expect(result.missing).toEqual([]);
    expect(result.downloaded).toEqual([
      {
        target: 'alpha',
        site: 'fp',
        path: join(day, 'alpha_fp.jpg'),
        sourceUrl: 'https://www.frontpages.gr/data/alphaI.jpg',
      },
      {
        target: 'beta',
        site: 'zg',
        path: join(day, 'beta_zg.jpg'),
        sourceUrl: 'https://www.zougla.gr/covers/beta.jpg',
      },
    ]);
    expect(result.documentPath).toBe(join(day, 'Papers_2024-06-15.pdf'));

    const pdf = await PDFDocument.load(await readFile(join(day, 'Papers_2024-06-15.pdf')));
    const sizes = pdf.getPages().map((page) => page.getSize());
    expect(sizes).toHaveLength(2);
    expect(sizes[0]?.width).toBeCloseTo(7.2, 3);
    expect(sizes[1]?.width).toBeCloseTo(9.6, 3);
  });

  it('skips a paper that is stale on both sites', async () => {
    const outputRoot = join(root, 'out');

    const result = await runPipeline({
      csvPath: await targets('Gamma'),
      outputRoot,
      clock,
      openSession: staticSession,
    });

    expect(result.status).toBe('completed');
    expect(result.downloaded).toEqual([]);
    expect(result.missing).toEqual(['Gamma']);
    expect(result.documentPath).toBeNull();
    expect(await readdir(join(outputRoot, '2024-06-15'))).toEqual([]);
  });

  it('aborts before opening a session when the target list is missing', async () => {
    const openSession = vi.fn(staticSession);

    const result = await runPipeline({
      csvPath: join(root, 'absent.csv'),
      outputRoot: join(root, 'out'),
      clock,
      openSession,
    });

    expect(result.status).toBe('aborted');
    expect(result.targets).toBe(0);
    expect(openSession).not.toHaveBeenCalled();
  });

  it('aborts before opening a session when the target list is malformed', async () => {
    const csvPath = join(root, 'newspapers.csv');
    await writeFile(csvPath, 'NewspaperName\n"Τα Νέα\nAlpha', 'utf-8');
    const openSession = vi.fn(staticSession);

    const result = await runPipeline({ csvPath, outputRoot: join(root, 'out'), clock, openSession });

    expect(result.status).toBe('aborted');
    expect(openSession).not.toHaveBeenCalled();
  });

  it('aborts when the output folder cannot be created', async () => {
    const blocker = join(root, 'not-a-dir');
    await writeFile(blocker, 'x', 'utf-8');
    const openSession = vi.fn(staticSession);

    const result = await runPipeline({
      csvPath: await targets('Alpha'),
      outputRoot: blocker,
      clock,
      openSession,
    });

    expect(result.status).toBe('aborted');
    expect(result.targets).toBe(1);
    expect(openSession).not.toHaveBeenCalled();
  });

  it('aborts when the list has no names', async () => {
    const result = await runPipeline({
      csvPath: await targets(),
      outputRoot: join(root, 'out'),
      clock,
      openSession: staticSession,
    });

    expect(result.status).toBe('aborted');
  });

  it('aborts when no session can be opened', async () => {
    const result = await runPipeline({
      csvPath: await targets('Alpha'),
      outputRoot: join(root, 'out'),
      clock,
      openSession: () => Promise.reject(new Error('no chromium')),
    });

    expect(result.status).toBe('aborted');
    expect(result.downloaded).toEqual([]);
  });

  it('closes the session after searching', async () => {
    const close = vi.fn(async () => {});
    const handle = await staticSession();

    await runPipeline({
      csvPath: await targets('Gamma'),
      outputRoot: join(root, 'out'),
      clock,
      openSession: async () => ({ session: handle.session, close }),
    });

    expect(close).toHaveBeenCalledTimes(1);
  });
});
