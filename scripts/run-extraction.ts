import { resolve } from 'node:path';
import { loadConfig } from '@gleaner/schemas/src/config-loader.js';
import { loadRawItems } from '@gleaner/ingestion/src/load-raw-items.js';
import { createConfiguredTextClient } from '@gleaner/core/src/llm/text-client-factory.js';
import { withTextClient } from '@gleaner/core/src/llm/text-client.js';
import { createDefaultRegistries } from '@gleaner/core/src/strategies/strategy-factory.js';
import { createExtractionOrchestrator } from '@gleaner/core/src/orchestration/extraction-orchestrator.js';
import { createExtractionPipeline } from '@gleaner/core/src/orchestration/extraction-pipeline.js';
import { createSqliteSemanticStore } from '@gleaner/core/src/infrastructure/sqlite-semantic-store.js';
import { ExtractionCancelledError } from '@gleaner/shared/src/utils/errors.js';

async function main(): Promise<void> {
  const inputPath = process.argv[2] ?? resolve(process.cwd(), 'config', 'sample-bundle.json');
  const configPath = process.argv[3] ?? resolve(process.cwd(), 'config', 'gleaner.json');

  console.log('=== Gleaner Extraction Runner ===\n');
  console.log(`Input: ${inputPath}`);
  console.log(`Config: ${configPath}`);
  console.log(`Mock LLM: ${process.env['GLEANER_MOCK_LLM'] === 'true' ? 'yes' : 'no'}\n`);

  const startTime = Date.now();

  const config = await loadConfig(configPath);
  const items = await loadRawItems(inputPath);
  console.log(`Model: ${config.llm.model} (${config.llm.location})`);
  console.log(`Store: ${config.store.dbPath}`);
  console.log(`Raw items: ${String(items.length)}\n`);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\nCancelling after the current item...');
    controller.abort();
  });

  const store = createSqliteSemanticStore({ dbPath: config.store.dbPath });

  const result = await withTextClient(createConfiguredTextClient(config.llm), (textClient) => {
    const orchestrator = createExtractionOrchestrator({
      registries: createDefaultRegistries(textClient, {
        minSectionLength: config.extraction.minSectionLength,
      }),
      itemTimeoutMs: config.extraction.itemTimeoutMs,
    });
    const pipeline = createExtractionPipeline({
      orchestrator,
      textClient,
      store,
      enhancement: config.enhancement,
    });

    return pipeline.run(items, {
      signal: controller.signal,
      onProgress: (current, total) => {
        process.stdout.write(`\rProcessing ${String(current)}/${String(total)}`);
      },
    });
  });
  await store.close();

  const elapsed = Date.now() - startTime;

  const byKind = new Map<string, number>();
  for (const record of result.records) {
    byKind.set(record.kind, (byKind.get(record.kind) ?? 0) + 1);
  }

  console.log('\n\n--- Records ---');
  for (const [kind, count] of byKind) {
    console.log(`  ${kind}: ${String(count)}`);
  }
  console.log(`  Glossary terms changed by review: ${String(result.glossaryEnhanced)}`);
  console.log(`  Stored: ${String(result.stored.length)}`);

  console.log(`\n=== Extraction completed in ${String(elapsed)}ms ===`);
}

main().catch((error: unknown) => {
  if (error instanceof ExtractionCancelledError) {
    console.error(`\nExtraction cancelled; ${String(error.records.length)} records were not stored.`);
    process.exit(130);
  }
  console.error('Extraction failed:', error);
  process.exit(1);
});
