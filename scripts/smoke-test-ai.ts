import { aiConfigFromEnv, loadEnv } from '../src/config/env.js';
import { AiExtractor } from '../src/services/aiExtractor.js';

const SAMPLE_DETAIL_TEXT = `
Blue Door Bakery
4.6 (212)
Bakery
Open ⋅ Closes 6 PM
12 Harbour Road, Portsmouth PO1 2AB
01234 567890
bluedoorbakery.example
`;

function maskKey(key: string): string {
  return `****${key.slice(-4)}`;
}

function fail(reason: string): never {
  console.error(`[SmokeTest] ❌ FAILED: ${reason}`);
  process.exit(1);
}

async function main(): Promise<void> {
  const env = loadEnv();
  const config = aiConfigFromEnv(env);

  console.info('[SmokeTest] Resolved AI configuration:');
  console.info(`  Model    : ${config.model}`);
  console.info(`  Endpoint : ${config.baseUrl}`);
  console.info(`  API Key  : ${maskKey(config.apiKey)}`);

  const extractor = new AiExtractor({ ...config, maxAttempts: Math.min(config.maxAttempts, 3) });
  const fields = await extractor.extract(SAMPLE_DETAIL_TEXT);

  console.info('[SmokeTest] Extraction result:');
  console.log(JSON.stringify(fields, null, 2));

  if (!fields) {
    fail('Extractor returned null (endpoint unreachable, rejected the key, or replied without JSON).');
  }

  if (!fields.name.toLowerCase().includes('blue door')) {
    fail(`Unexpected business name "${fields.name}".`);
  }

  console.info('[SmokeTest] ✅ PASSED');
}

main().catch((err: unknown) => {
  fail(err instanceof Error ? err.message : String(err));
});
