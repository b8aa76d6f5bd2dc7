import type { Account } from '../../domain/entities/Account.js';
import type { OperatorOverride } from '../../domain/entities/OperatorOverride.js';
import type { PersonaAssignment } from '../../domain/entities/Persona.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import type { UserProfile } from '../../domain/entities/UserProfile.js';

export interface StoragePort {
  findUser(userId: string): Promise<UserProfile | null>;
  /** Newest first. */
  listUsers(): Promise<UserProfile[]>;
  upsertUser(user: UserProfile): Promise<void>;
  setConsent(userId: string, granted: boolean): Promise<UserProfile | null>;
  upsertAccount(account: Account): Promise<void>;
  bulkUpsertTransactions(transactions: Transaction[]): Promise<void>;
  loadAccounts(userId: string): Promise<Account[]>;
  loadTransactions(userId: string, params: { startDate: string; endDate: string }): Promise<Transaction[]>;
  savePersonaAssignment(assignment: PersonaAssignment): Promise<void>;
  loadPersonaAssignments(userId: string, windowDays?: number): Promise<PersonaAssignment[]>;
  saveOverride(override: OperatorOverride): Promise<void>;
  loadOverrides(userId: string): Promise<OperatorOverride[]>;
}
