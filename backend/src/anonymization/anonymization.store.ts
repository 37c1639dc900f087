import { UserStatus } from '../database/entities';
import { PersonalFields } from './anon-label';

export const ANONYMIZATION_STORE = Symbol('ANONYMIZATION_STORE');

export interface ErasableUser extends PersonalFields {
  id: number;
  status: UserStatus;
  anonymizedTime: Date | null;
}

/**
 * Writes available to the engine while it holds the user's row lock.
 * Every method runs inside the transaction that created it.
 */
export interface AnonymizationTransaction {
  /**
   * Locks the user row for the rest of the transaction (SELECT ... FOR UPDATE).
   * Resolves to null when the user does not exist.
   */
  lockUser(userId: number): Promise<ErasableUser | null>;

  eraseUser(userId: number, label: string, erasedAt: Date): Promise<void>;

  /** @returns number of rows updated */
  scrubShippingAddresses(userId: number, label: string): Promise<number>;

  /** @returns number of rows updated */
  scrubOrders(userId: number, label: string): Promise<number>;

  /** Payments are matched through the user's orders. */
  scrubPayments(userId: number, label: string): Promise<number>;
}

export interface AnonymizationStore {
  /**
   * Runs `work` in a single transaction. Commits when it resolves, rolls back
   * every write when it throws and rethrows the error.
   */
  transaction<T>(work: (tx: AnonymizationTransaction) => Promise<T>): Promise<T>;
}
