import { z } from 'zod';

export const AccountSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  name: z.string().min(1),
  type: z.enum(['depository', 'credit', 'loan', 'investment']),
  subtype: z.string().min(1),
  currency: z.string().length(3).default('USD'),
  balance: z.number().int(),
  limit: z.number().int().nonnegative().optional(),
  apr: z.number().nonnegative().optional(),
  minimumPayment: z.number().int().nonnegative().optional(),
  lastPaymentAmount: z.number().int().nonnegative().optional(),
  isOverdue: z.boolean().default(false),
});

export const TransactionSchema = z.object({
  id: z.string().min(1),
  accountId: z.string().min(1),
  date: z.string().date(),
  amount: z.number().int(),
  merchantName: z.string().optional(),
  category: z.string().min(1),
  pending: z.boolean().default(false),
});

// Seed transactions are dated relative to load time so demo data stays inside the window.
const SeedTransactionSchema = TransactionSchema.omit({ date: true }).extend({
  daysAgo: z.number().int().nonnegative(),
});

export const SeedDataSchema = z.object({
  users: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      consentGranted: z.boolean(),
    }),
  ),
  accounts: z.array(AccountSchema),
  transactions: z.array(SeedTransactionSchema),
});

export type SeedDataDTO = z.infer<typeof SeedDataSchema>;
