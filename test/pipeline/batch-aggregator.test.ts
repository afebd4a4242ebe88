import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { MockAgent } from 'undici';
import { runBatch } from '../../src/pipeline/batch-aggregator.js';
import type { processEntry } from '../../src/pipeline/entry-processor.js';
import { MalformedDocumentError, OutputWriteError } from '../../src/errors.js';
import { SENTINEL_TIMESTAMP } from '../../src/sources/freshness.js';
import type { CatalogueEntry } from '../../src/types/catalogue.js';
import type { NormalizedRecord, ScenarioMetrics } from '../../src/types/record.js';
import { loadFixture } from '../helpers/fixture-loader.js';
import { API_ORIGIN, createMockNetwork, testOptions } from '../helpers/mock-network.js';

const FIVE_ENTRIES = ['One', 'Two', 'Three', 'Four', 'Five']
  .map((name, i) => `[${name}]\nexternal=https://example.org/${i + 1}\n`)
  .join('\n');

function stubRecord(entry: CatalogueEntry): NormalizedRecord {
  return {
    name: entry.name,
    data: new Map([
      ['url', entry.sourceUrl ?? ''],
      ['latest_update', SENTINEL_TIMESTAMP],
    ]),
  };
}

describe('runBatch', () => {
  let agent: MockAgent;
  let dir: string;
  let outputPath: string;

  beforeEach(async () => {
    agent = createMockNetwork();
    dir = await mkdtemp(path.join(os.tmpdir(), 'manifest-sync-'));
    outputPath = path.join(dir, 'MoM', 'manifestDownload.ini');
  });

  afterEach(async () => {
    await agent.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('should leave out an entry that throws and keep the others in order', async () => {
    const handleEntry = vi.fn(async (entry: CatalogueEntry): Promise<NormalizedRecord | null> => {
      if (entry.name === 'Three') throw new Error('unexpected payload');
      return stubRecord(entry);
    });

    const summary = await runBatch(
      { catalogueText: FIVE_ENTRIES, outputPath, fileExtension: '.valkyrie', kind: 'scenarios' },
      { options: testOptions(agent), processEntry: handleEntry },
    );

    expect(summary).toEqual({ outputPath, written: 4, skipped: 0, failed: 1 });
    expect(handleEntry).toHaveBeenCalledTimes(5);
    const sections = (await readFile(outputPath, 'utf-8')).match(/^\[.*\]$/gm);
    expect(sections).toEqual(['[One]', '[Two]', '[Four]', '[Five]']);
  });

  it('should fetch the statistics index once and hand it to every entry', async () => {
    const stats = new Map<string, ScenarioMetrics>([['One.valkyrie', { scenario_avg_rating: 5 }]]);
    const fetchStats = vi.fn(async () => stats);
    const handleEntry = vi.fn<typeof processEntry>(async (entry) => stubRecord(entry));
    const options = testOptions(agent);

    await runBatch(
      { catalogueText: FIVE_ENTRIES, outputPath, fileExtension: '.valkyrie', kind: 'scenarios' },
      { options, statsUrl: 'https://stats.example.org/s.json', fetchStats, processEntry: handleEntry },
    );

    expect(fetchStats).toHaveBeenCalledTimes(1);
    expect(fetchStats).toHaveBeenCalledWith('https://stats.example.org/s.json', options);
    for (const call of handleEntry.mock.calls) {
      expect(call[1]).toBe(stats);
      expect(call[2]).toBe('.valkyrie');
    }
  });

  it('should write the manifest with a count header and one section per record', async () => {
    const handleEntry = vi.fn(async (entry: CatalogueEntry) =>
      entry.name === 'Two' ? stubRecord(entry) : null,
    );

    await runBatch(
      { catalogueText: FIVE_ENTRIES, outputPath, fileExtension: '.pak', kind: 'content-packs' },
      { options: testOptions(agent), processEntry: handleEntry },
    );

    expect(await readFile(outputPath, 'utf-8')).toBe(
      '# 1 content packs\n[Two]\nurl=https://example.org/2\nlatest_update=1970-01-01T12:28:29Z\n\n',
    );
  });

  it('should write a valid empty manifest when nothing resolves', async () => {
    const summary = await runBatch(
      { catalogueText: FIVE_ENTRIES, outputPath, fileExtension: '.valkyrie', kind: 'scenarios' },
      { options: testOptions(agent), processEntry: vi.fn(async () => null) },
    );

    expect(summary).toEqual({ outputPath, written: 0, skipped: 5, failed: 0 });
    expect(await readFile(outputPath, 'utf-8')).toBe('# 0 scenarios\n');
  });

  it('should overwrite a previous manifest completely', async () => {
    await runBatch(
      { catalogueText: FIVE_ENTRIES, outputPath, fileExtension: '.valkyrie', kind: 'scenarios' },
      { options: testOptions(agent), processEntry: vi.fn(async (e: CatalogueEntry) => stubRecord(e)) },
    );

    await runBatch(
      { catalogueText: '[Solo]\nexternal=https://example.org/solo\n', outputPath, fileExtension: '.valkyrie', kind: 'scenarios' },
      { options: testOptions(agent), processEntry: vi.fn(async (e: CatalogueEntry) => stubRecord(e)) },
    );

    expect(await readFile(outputPath, 'utf-8')).toBe(
      '# 1 scenarios\n[Solo]\nurl=https://example.org/solo\nlatest_update=1970-01-01T12:28:29Z\n\n',
    );
  });

  it('should skip entries without a source URL or with an unreachable source', async () => {
    agent
      .get(API_ORIGIN)
      .intercept({ path: '/repos/quest-writer/manor/contents/Manor?ref=main', method: 'GET' })
      .reply(503, 'unavailable')
      .times(3);
    agent
      .get('https://scenarios.example.org')
      .intercept({ path: '/crypt/Crypt.ini', method: 'GET' })
      .reply(200, '[Quest]\ntype=MoM\n');

    const summary = await runBatch(
      {
        catalogueText: loadFixture('catalogue', 'manifest.ini'),
        outputPath,
        fileExtension: '.valkyrie',
        kind: 'scenarios',
      },
      { options: testOptions(agent) },
    );

    expect(summary).toEqual({ outputPath, written: 1, skipped: 2, failed: 0 });
    expect(await readFile(outputPath, 'utf-8')).toBe(
      [
        '# 1 scenarios',
        '[Crypt]',
        'type=MoM',
        'url=https://scenarios.example.org/crypt',
        'latest_update=1970-01-01T12:28:29Z',
        '',
        '',
      ].join('\n'),
    );
    agent.assertNoPendingInterceptors();
  });

  it('should fail on an unreadable catalogue without processing entries', async () => {
    const handleEntry = vi.fn(async (entry: CatalogueEntry) => stubRecord(entry));

    await expect(
      runBatch(
        { catalogueText: 'external=https://example.org\n', outputPath, fileExtension: '.valkyrie', kind: 'scenarios' },
        { options: testOptions(agent), processEntry: handleEntry },
      ),
    ).rejects.toBeInstanceOf(MalformedDocumentError);
    expect(handleEntry).not.toHaveBeenCalled();
  });

  it('should raise OutputWriteError and leave no temporary file when the write fails', async () => {
    const blocker = path.join(dir, 'blocker');
    await writeFile(blocker, 'not a directory');
    const blockedPath = path.join(blocker, 'manifestDownload.ini');

    await expect(
      runBatch(
        { catalogueText: FIVE_ENTRIES, outputPath: blockedPath, fileExtension: '.valkyrie', kind: 'scenarios' },
        { options: testOptions(agent), processEntry: vi.fn(async (e: CatalogueEntry) => stubRecord(e)) },
      ),
    ).rejects.toBeInstanceOf(OutputWriteError);
    expect(existsSync(`${blockedPath}.tmp`)).toBe(false);
  });
});
