import { DataSource, EntityManager } from 'typeorm';
import { OrderEntity, PaymentEntity, ShippingAddressEntity, UserEntity, UserStatus } from '../database/entities';
import { TypeOrmAnonymizationStore, TypeOrmAnonymizationTransaction } from './typeorm-anonymization.store';

describe('TypeOrmAnonymizationStore', () => {
  const label = 'anon_0123456789ab';

  const createQueryBuilderMock = (affected: number | undefined) => {
    const builder = {
      update: jest.fn().mockReturnThis(),
      set: jest.fn().mockReturnThis(),
      where: jest.fn().mockReturnThis(),
      execute: jest.fn().mockResolvedValue({ affected }),
    };
    return builder;
  };

  let queryBuilder: ReturnType<typeof createQueryBuilderMock>;
  let manager: { findOne: jest.Mock; update: jest.Mock; createQueryBuilder: jest.Mock };
  let tx: TypeOrmAnonymizationTransaction;

  beforeEach(() => {
    queryBuilder = createQueryBuilderMock(2);
    manager = {
      findOne: jest.fn(),
      update: jest.fn().mockResolvedValue({ affected: 1 }),
      createQueryBuilder: jest.fn().mockReturnValue(queryBuilder),
    };
    tx = new TypeOrmAnonymizationTransaction(manager as unknown as EntityManager);
  });

  describe('transaction', () => {
    it('should run the work inside a DataSource transaction', async () => {
      const dataSource = {
        transaction: jest.fn(async (work: (entityManager: EntityManager) => Promise<unknown>) =>
          work(manager as unknown as EntityManager),
        ),
      };
      const store = new TypeOrmAnonymizationStore(dataSource as unknown as DataSource);

      const result = await store.transaction(async inner => {
        expect(inner).toBeInstanceOf(TypeOrmAnonymizationTransaction);
        return 'done';
      });

      expect(result).toBe('done');
      expect(dataSource.transaction).toHaveBeenCalledTimes(1);
    });

    it('should propagate failures so the DataSource rolls back', async () => {
      const dataSource = {
        transaction: jest.fn(async (work: (entityManager: EntityManager) => Promise<unknown>) =>
          work(manager as unknown as EntityManager),
        ),
      };
      const store = new TypeOrmAnonymizationStore(dataSource as unknown as DataSource);

      await expect(
        store.transaction(async () => {
          throw new Error('Deadlock found when trying to get lock');
        }),
      ).rejects.toThrow('Deadlock found when trying to get lock');
    });
  });

  describe('lockUser', () => {
    it('should select the user FOR UPDATE', async () => {
      manager.findOne.mockResolvedValue({
        id: '1',
        email: 'alice@example.com',
        firstName: 'Alice',
        lastName: 'Carter',
        username: 'alicec',
        status: UserStatus.ACTIVE,
        anonymizedTime: null,
      });

      const user = await tx.lockUser(1);

      expect(manager.findOne).toHaveBeenCalledWith(UserEntity, {
        select: ['id', 'email', 'firstName', 'lastName', 'username', 'status', 'anonymizedTime'],
        where: { id: 1 },
        lock: { mode: 'pessimistic_write' },
      });
      expect(user).toEqual({
        id: 1,
        email: 'alice@example.com',
        firstName: 'Alice',
        lastName: 'Carter',
        username: 'alicec',
        status: UserStatus.ACTIVE,
        anonymizedTime: null,
      });
    });

    it('should return null when the user does not exist', async () => {
      manager.findOne.mockResolvedValue(null);

      await expect(tx.lockUser(42)).resolves.toBeNull();
    });
  });

  describe('eraseUser', () => {
    it('should overwrite personal fields and mark the user erased', async () => {
      const erasedAt = new Date('2025-03-01T10:00:00Z');

      await tx.eraseUser(1, label, erasedAt);

      expect(manager.update).toHaveBeenCalledWith(
        UserEntity,
        { id: 1 },
        {
          firstName: label,
          lastName: label,
          username: label,
          email: 'anon_0123456789ab@example.invalid',
          anonymizedTime: erasedAt,
          anonTag: label,
          status: UserStatus.ERASED,
        },
      );
    });
  });

  describe('scrubShippingAddresses', () => {
    it('should replace street and phone and clear the location', async () => {
      manager.update.mockResolvedValue({ affected: 3 });

      const count = await tx.scrubShippingAddresses(1, label);

      expect(count).toBe(3);
      expect(manager.update).toHaveBeenCalledWith(
        ShippingAddressEntity,
        { userId: 1 },
        { street: label, phoneNumber: label, city: null, state: null, zip: null },
      );
    });
  });

  describe('scrubOrders', () => {
    it('should rewrite only the purchase snapshot columns', async () => {
      const count = await tx.scrubOrders(1, label);

      expect(count).toBe(1);
      expect(manager.update).toHaveBeenCalledWith(
        OrderEntity,
        { userId: 1 },
        {
          emailSnapshot: 'anon_0123456789ab@example.invalid',
          shippingName: label,
          shippingAddress: label,
          shippingCity: null,
          shippingState: null,
          shippingZip: null,
        },
      );
    });

    it('should report zero when the driver gives no affected count', async () => {
      manager.update.mockResolvedValue({ affected: undefined });

      await expect(tx.scrubOrders(1, label)).resolves.toBe(0);
    });
  });

  describe('scrubPayments', () => {
    it('should update payments joined through the user orders', async () => {
      const count = await tx.scrubPayments(1, label);

      expect(count).toBe(2);
      expect(queryBuilder.update).toHaveBeenCalledWith(PaymentEntity);
      expect(queryBuilder.set).toHaveBeenCalledWith({ billingName: label, billingAddress: label });
      expect(queryBuilder.where).toHaveBeenCalledWith(
        'order_id IN (SELECT o.order_id FROM orders o WHERE o.user_id = :userId)',
        { userId: 1 },
      );
    });
  });
});
