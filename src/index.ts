import 'dotenv/config';
import path from 'node:path';
import { createLogger } from './logger';
import { loadProviderFixture, SimulatedProvider } from './provider';
import { assertRuntimeEnv, shouldRunRuntimePreflight } from './runtimePreflight';
import { buildServer } from './server';

async function main() {
  if (shouldRunRuntimePreflight(process.env)) {
    assertRuntimeEnv(process.env, {
      allowNonProd: process.env.ALLOW_NON_PROD === '1',
      allowMemoryInProduction: process.env.ALLOW_MEMORY_IN_PRODUCTION === '1'
    });
  }

  const logger = createLogger();
  const fixturePath = path.resolve(
    process.cwd(),
    process.env.PROVIDER_FIXTURE ?? 'fixtures/provider.json'
  );
  const provider = new SimulatedProvider(await loadProviderFixture(fixturePath));
  logger.info({ fixture: fixturePath }, 'simulated provider loaded');

  const app = buildServer({ provider, logger });
  const port = Number(process.env.PORT ?? 3000);
  await app.listen({ port, host: process.env.HOST ?? '127.0.0.1' });
  logger.info({ port }, 'alarm session core listening');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
