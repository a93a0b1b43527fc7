/**
 * Load the default price table into DynamoDB.
 *
 * Usage: npm run seed:prices [-- --model <modelKey>]
 *
 * Rows are upserted, so running it again resets edited prices for the
 * seeded keys and leaves other rows alone.
 */

import { z } from 'zod';
import pricesJson from '../data/default-prices.json';
import { PriceRowSchema } from '../src/models/index.js';
import { PriceRepository } from '../src/repositories/index.js';
import { getModelCatalog } from '../src/services/index.js';
import { getLogger } from '../src/utils/index.js';

const PriceFileSchema = z.object({ prices: z.array(PriceRowSchema) });

function parseModelFilter(argv: readonly string[]): string | null {
  const index = argv.indexOf('--model');
  if (index === -1) {
    return null;
  }
  return argv[index + 1] ?? null;
}

async function main(): Promise<void> {
  const logger = getLogger().child({ script: 'seed-prices' });
  const { prices } = PriceFileSchema.parse(pricesJson);
  const catalog = getModelCatalog();
  const modelFilter = parseModelFilter(process.argv.slice(2));

  const rows = prices.filter((row) => modelFilter === null || row.modelKey === modelFilter);
  const unknown = [...new Set(rows.map((row) => row.modelKey))].filter((key) => catalog.get(key) === null);
  if (unknown.length > 0) {
    logger.warn({ models: unknown }, 'Price rows reference models missing from the catalog');
  }

  const repository = new PriceRepository();
  for (const row of rows) {
    await repository.put(row);
  }

  logger.info({ rows: rows.length, model: modelFilter ?? 'all' }, 'Prices seeded');
}

main().catch((error: unknown) => {
  getLogger().fatal({ error }, 'Price seeding failed');
  process.exit(1);
});
