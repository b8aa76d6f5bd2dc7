import dayjs from 'dayjs';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { SeedDataSchema } from '../../../application/dto/SeedDataDTO.js';
import type { StoragePort } from '../../../application/ports/StoragePort.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_SEED_PATH = path.resolve(__dirname, '../../../../data/demo-seed.json');

export const seedStorage = async (
  storage: StoragePort,
  seedPath = DEFAULT_SEED_PATH,
  now: Date = new Date(),
): Promise<number> => {
  const seed = SeedDataSchema.parse(JSON.parse(fs.readFileSync(seedPath, 'utf8')));

  for (const user of seed.users) {
    await storage.upsertUser(user);
  }

  for (const account of seed.accounts) {
    await storage.upsertAccount(account);
  }

  await storage.bulkUpsertTransactions(
    seed.transactions.map(({ daysAgo, ...txn }) => ({
      ...txn,
      date: dayjs(now).subtract(daysAgo, 'day').format('YYYY-MM-DD'),
    })),
  );

  console.log('🌱 Demo data loaded', {
    users: seed.users.length,
    accounts: seed.accounts.length,
    transactions: seed.transactions.length,
  });

  return seed.users.length;
};
