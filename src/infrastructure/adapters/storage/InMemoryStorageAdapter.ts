import type { Account } from '../../../domain/entities/Account.js';
import type { OperatorOverride } from '../../../domain/entities/OperatorOverride.js';
import type { PersonaAssignment } from '../../../domain/entities/Persona.js';
import type { Transaction } from '../../../domain/entities/Transaction.js';
import type { UserProfile } from '../../../domain/entities/UserProfile.js';
import type { StoragePort } from '../../../application/ports/StoragePort.js';

export class InMemoryStorageAdapter implements StoragePort {
  private readonly users = new Map<string, UserProfile>();
  private readonly accounts = new Map<string, Account>();
  private readonly transactions = new Map<string, Transaction>();
  private readonly assignments: PersonaAssignment[] = [];
  private readonly overrides = new Map<string, OperatorOverride>();

  async findUser(userId: string): Promise<UserProfile | null> {
    return this.users.get(userId) ?? null;
  }

  async listUsers(): Promise<UserProfile[]> {
    return Array.from(this.users.values()).reverse();
  }

  async upsertUser(user: UserProfile): Promise<void> {
    this.users.set(user.id, user);
  }

  async setConsent(userId: string, granted: boolean): Promise<UserProfile | null> {
    const user = this.users.get(userId);
    if (!user) {
      return null;
    }

    const updated = { ...user, consentGranted: granted };
    this.users.set(userId, updated);
    return updated;
  }

  async upsertAccount(account: Account): Promise<void> {
    this.accounts.set(account.id, account);
  }

  async bulkUpsertTransactions(transactions: Transaction[]): Promise<void> {
    for (const txn of transactions) {
      this.transactions.set(txn.id, txn);
    }
  }

  async loadAccounts(userId: string): Promise<Account[]> {
    return Array.from(this.accounts.values()).filter((account) => account.userId === userId);
  }

  async loadTransactions(userId: string, params: { startDate: string; endDate: string }): Promise<Transaction[]> {
    const accountIds = new Set((await this.loadAccounts(userId)).map((account) => account.id));

    return Array.from(this.transactions.values())
      .filter((txn) => accountIds.has(txn.accountId))
      .filter((txn) => {
        const day = txn.date.slice(0, 10);
        return day >= params.startDate && day <= params.endDate;
      })
      .sort((a, b) => a.date.localeCompare(b.date) || a.id.localeCompare(b.id));
  }

  async savePersonaAssignment(assignment: PersonaAssignment): Promise<void> {
    this.assignments.push(assignment);
  }

  async loadPersonaAssignments(userId: string, windowDays?: number): Promise<PersonaAssignment[]> {
    return this.assignments
      .filter((assignment) => assignment.userId === userId)
      .filter((assignment) => windowDays === undefined || assignment.windowDays === windowDays)
      .sort((a, b) => b.assignedAt.localeCompare(a.assignedAt));
  }

  async saveOverride(override: OperatorOverride): Promise<void> {
    this.overrides.set(override.id, override);
  }

  async loadOverrides(userId: string): Promise<OperatorOverride[]> {
    return Array.from(this.overrides.values())
      .filter((override) => override.userId === userId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }
}
