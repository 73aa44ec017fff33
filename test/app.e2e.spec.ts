import { INestApplicationContext } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { AppModule } from '../src/app.module';
import { SCHEDULER } from '../src/common/scheduling';
import { PipelineService } from '../src/pipeline/pipeline.service';
import { WikidataHttpClient } from '../src/wikidata/wikidata-http.client';
import { FakeScheduler } from './helpers/fake-scheduler';
import {
  FakeWikidataHttpClient,
  labelTable,
  sparqlResponse,
} from './helpers/fake-wikidata-http.client';

const WD = 'http://www.wikidata.org/entity/';
const WDT = 'http://www.wikidata.org/prop/direct/';

describe('AppModule (e2e)', () => {
  let app: INestApplicationContext;
  let http: FakeWikidataHttpClient;
  let scheduler: FakeScheduler;
  let dir: string;

  beforeEach(async () => {
    http = new FakeWikidataHttpClient();
    scheduler = new FakeScheduler();

    const moduleRef = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(WikidataHttpClient)
      .useValue(http)
      .overrideProvider(SCHEDULER)
      .useValue(scheduler)
      .compile();

    app = await moduleRef.init();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'path-enricher-e2e-'));
  });

  afterEach(async () => {
    await app.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('runs a four-hop enrichment end to end', async () => {
    const inputPath = path.join(dir, 'pairs.tsv');
    const outputPath = path.join(dir, 'fourhop.txt');
    await fs.writeFile(inputPath, 'Q10\tQ20\nQ30\tQ40\n');

    http
      .onSparql(() =>
        sparqlResponse([
          {
            entity1: WD + 'Q10',
            entity2: WD + 'Q20',
            relation1: WDT + 'P31',
            x: WD + 'Q5',
            relation2: WDT + 'P279',
            y: WD + 'statement/q215627-8f1e2a',
            relation3: WDT + 'P31',
            z: WD + 'Q5',
            relation4: WDT + 'P279',
          },
        ]),
      )
      .onLabels(
        labelTable({
          P31: 'instance of',
          P279: 'subclass of',
          Q5: 'human',
          Q215627: 'person',
        }),
      );

    const summary = await app.get(PipelineService).run({
      variant: 'four-hop',
      inputPath,
      outputPath,
    });

    expect(await fs.readFile(outputPath, 'utf-8')).toBe(
      'Q10#Q20\tinstance of#human#subclass of#person#instance of#human#subclass of\n',
    );
    expect(summary).toEqual({
      variant: 'four-hop',
      totalPairs: 2,
      totalBatches: 1,
      skippedBatches: 0,
      recordsWritten: 1,
    });
    // relation labels, entity labels, then the pair batch
    expect(scheduler.sleeps).toEqual([1500, 1500, 1500]);
  });
});
