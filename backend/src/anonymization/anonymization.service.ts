import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { UserStatus } from '../database/entities';
import { buildLabelSource, deriveAnonLabel } from './anon-label';
import {
  DEFAULT_HASH_ROUNDS,
  DEFAULT_LABEL_LENGTH,
  MAX_LABEL_LENGTH,
  MIN_LABEL_LENGTH,
  MIN_SALT_BYTES,
} from './anonymization.constants';
import { ANONYMIZATION_STORE, AnonymizationStore, AnonymizationTransaction } from './anonymization.store';
import { stretchDigest } from './digest';

export type ErasureOutcome =
  | { kind: 'anonymized'; label: string; addresses: number; orders: number; payments: number }
  | { kind: 'not_found' }
  | { kind: 'already_erased' };

/**
 * Right-to-erasure for a single user.
 *
 * Replaces the user's personal data, and every copy of it on shipping addresses, order
 * snapshots and payments, with a salted, key-stretched label. Financial columns are
 * never touched. The whole cascade runs in one transaction under the user's row lock.
 */
@Injectable()
export class AnonymizationService {
  private readonly logger = new Logger(AnonymizationService.name);
  private readonly hashRounds: number;
  private readonly labelLength: number;
  private readonly saltBytes: number;

  constructor(
    @Inject(ANONYMIZATION_STORE) private readonly store: AnonymizationStore,
    private readonly configService: ConfigService,
  ) {
    this.hashRounds = this.configService.get<number>('ANONYMIZATION_HASH_ROUNDS', DEFAULT_HASH_ROUNDS);
    this.labelLength = Math.min(
      Math.max(this.configService.get<number>('ANONYMIZATION_LABEL_LENGTH', DEFAULT_LABEL_LENGTH), MIN_LABEL_LENGTH),
      MAX_LABEL_LENGTH,
    );
    this.saltBytes = Math.max(this.configService.get<number>('ANONYMIZATION_SALT_BYTES', MIN_SALT_BYTES), MIN_SALT_BYTES);
  }

  /**
   * Erase a user. Unknown and already erased users are a silent no-op, so the call is
   * always safe to repeat. Storage errors are rethrown after the transaction rolled back.
   */
  async anonymizeUser(userId: number): Promise<void> {
    if (!Number.isSafeInteger(userId) || userId <= 0) {
      this.logger.warn(`Ignoring erasure request for invalid user id: ${userId}`);
      return;
    }

    let outcome: ErasureOutcome;
    try {
      outcome = await this.store.transaction(tx => this.eraseWithin(tx, userId));
    } catch (error) {
      this.logger.error(`Erasure of user ${userId} failed, nothing was changed`, error);
      throw error;
    }

    switch (outcome.kind) {
      case 'not_found':
        this.logger.log(`User ${userId} not found, nothing to erase`);
        break;
      case 'already_erased':
        this.logger.log(`User ${userId} is already erased`);
        break;
      case 'anonymized':
        this.logger.log(
          `User ${userId} erased as ${outcome.label} | Addresses: ${outcome.addresses} | Orders: ${outcome.orders} | Payments: ${outcome.payments}`,
        );
        break;
    }
  }

  private async eraseWithin(tx: AnonymizationTransaction, userId: number): Promise<ErasureOutcome> {
    // 1. Lock the user row before reading anything else
    const user = await tx.lockUser(userId);
    if (!user) {
      return { kind: 'not_found' };
    }

    // 2. Erasure happens once
    if (user.status === UserStatus.ERASED || user.anonymizedTime !== null) {
      return { kind: 'already_erased' };
    }

    // 3. Per-call salt, never stored
    const saltHex = randomBytes(this.saltBytes).toString('hex');
    const digest = stretchDigest(buildLabelSource(user, saltHex), this.hashRounds);
    const label = deriveAnonLabel(digest, this.labelLength);

    // 4. Cascade top-down: user, addresses, orders, payments
    await tx.eraseUser(userId, label, new Date());
    const addresses = await tx.scrubShippingAddresses(userId, label);
    const orders = await tx.scrubOrders(userId, label);
    const payments = await tx.scrubPayments(userId, label);

    return { kind: 'anonymized', label, addresses, orders, payments };
  }
}
