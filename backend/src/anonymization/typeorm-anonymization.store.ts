import { Injectable } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { OrderEntity, PaymentEntity, ShippingAddressEntity, UserEntity, UserStatus } from '../database/entities';
import { anonEmail } from './anon-label';
import { AnonymizationStore, AnonymizationTransaction, ErasableUser } from './anonymization.store';

@Injectable()
export class TypeOrmAnonymizationStore implements AnonymizationStore {
  constructor(private readonly dataSource: DataSource) {}

  async transaction<T>(work: (tx: AnonymizationTransaction) => Promise<T>): Promise<T> {
    return await this.dataSource.transaction(async manager => {
      return work(new TypeOrmAnonymizationTransaction(manager));
    });
  }
}

export class TypeOrmAnonymizationTransaction implements AnonymizationTransaction {
  constructor(private readonly manager: EntityManager) {}

  async lockUser(userId: number): Promise<ErasableUser | null> {
    const user = await this.manager.findOne(UserEntity, {
      select: ['id', 'email', 'firstName', 'lastName', 'username', 'status', 'anonymizedTime'],
      where: { id: userId },
      lock: { mode: 'pessimistic_write' },
    });

    if (!user) {
      return null;
    }

    return {
      id: Number(user.id),
      email: user.email,
      firstName: user.firstName,
      lastName: user.lastName,
      username: user.username,
      status: user.status,
      anonymizedTime: user.anonymizedTime,
    };
  }

  async eraseUser(userId: number, label: string, erasedAt: Date): Promise<void> {
    await this.manager.update(
      UserEntity,
      { id: userId },
      {
        firstName: label,
        lastName: label,
        username: label,
        email: anonEmail(label),
        anonymizedTime: erasedAt,
        anonTag: label,
        status: UserStatus.ERASED,
      },
    );
  }

  async scrubShippingAddresses(userId: number, label: string): Promise<number> {
    const result = await this.manager.update(
      ShippingAddressEntity,
      { userId },
      {
        street: label,
        phoneNumber: label,
        city: null,
        state: null,
        zip: null,
      },
    );
    return result.affected ?? 0;
  }

  async scrubOrders(userId: number, label: string): Promise<number> {
    // Financial and delivery columns are left alone
    const result = await this.manager.update(
      OrderEntity,
      { userId },
      {
        emailSnapshot: anonEmail(label),
        shippingName: label,
        shippingAddress: label,
        shippingCity: null,
        shippingState: null,
        shippingZip: null,
      },
    );
    return result.affected ?? 0;
  }

  async scrubPayments(userId: number, label: string): Promise<number> {
    const result = await this.manager
      .createQueryBuilder()
      .update(PaymentEntity)
      .set({ billingName: label, billingAddress: label })
      .where('order_id IN (SELECT o.order_id FROM orders o WHERE o.user_id = :userId)', { userId })
      .execute();
    return result.affected ?? 0;
  }
}
