import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { KeyedLock } from '../../common/keyed-lock';
import {
  getErrorMessage,
  PaymentIntegrityError,
  PersistenceError,
  StorefrontError,
} from '../../common/errors/storefront.errors';
import { Payment, Subscription, VpnUser } from './entities';
import type {
  LedgerStats,
  LedgerStore,
  NewPayment,
  NewSubscription,
  NewUser,
  SubscriptionWithPayment,
  UserPatch,
  UserTransaction,
} from './ledger.types';

const SINGLE_WRITER_DRIVERS = new Set(['sqlite', 'better-sqlite3', 'sqljs']);

class ManagedUserTransaction implements UserTransaction {
  constructor(
    private readonly manager: EntityManager,
    private current: VpnUser,
  ) {}

  get user(): VpnUser {
    return this.current;
  }

  async update(patch: UserPatch): Promise<VpnUser> {
    Object.assign(this.current, patch);
    this.current = await this.manager.save(VpnUser, this.current);
    return this.current;
  }

  async appendSubscription(record: NewSubscription): Promise<Subscription> {
    return insertSubscription(this.manager, record);
  }

  async appendSubscriptionAndPayment(subscription: NewSubscription, payment: NewPayment): Promise<SubscriptionWithPayment> {
    if (subscription.userId !== payment.userId) {
      throw new PaymentIntegrityError(
        `Payment for ${payment.userId} cannot back a subscription of ${subscription.userId}`,
      );
    }
    try {
      // Savepoint: a failed payment insert also undoes the subscription row and the supersede.
      return await this.manager.transaction(async (inner) => {
        const savedSubscription = await insertSubscription(inner, subscription);
        const savedPayment = await inner.save(
          Payment,
          inner.create(Payment, { ...payment, subscriptionId: savedSubscription.id }),
        );
        return { subscription: savedSubscription, payment: savedPayment };
      });
    } catch (error: unknown) {
      throw new PaymentIntegrityError(
        `Subscription and payment for ${payment.userId} were not recorded: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }
  }

  async findPaymentByExternalRef(externalRef: string): Promise<Payment | null> {
    return this.manager.findOneBy(Payment, { externalRef });
  }

  async findSubscription(id: number): Promise<Subscription | null> {
    return this.manager.findOneBy(Subscription, { id, userId: this.current.id });
  }
}

/** New rows supersede the identity's earlier active subscriptions. */
async function insertSubscription(manager: EntityManager, record: NewSubscription): Promise<Subscription> {
  await manager.update(Subscription, { userId: record.userId, active: true }, { active: false });
  return manager.save(Subscription, manager.create(Subscription, { ...record, active: true }));
}

@Injectable()
export class LedgerService implements LedgerStore {
  private readonly logger = new Logger(LedgerService.name);
  private readonly locks = new KeyedLock();

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  /** SQLite has one writer connection, so every write shares a single queue there. */
  private get singleWriter(): boolean {
    return SINGLE_WRITER_DRIVERS.has(this.dataSource.options.type);
  }

  private lockKey(userId: string): string {
    return this.singleWriter ? 'ledger' : `user:${userId}`;
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error: unknown) {
      if (error instanceof StorefrontError) throw error;
      this.logger.error(`${operation} failed: ${getErrorMessage(error)}`);
      throw new PersistenceError(`${operation} failed`, { cause: error });
    }
  }

  private async readUserForUpdate(manager: EntityManager, id: string): Promise<VpnUser | null> {
    if (this.singleWriter) return manager.findOneBy(VpnUser, { id });
    return manager.findOne(VpnUser, { where: { id }, lock: { mode: 'pessimistic_write' } });
  }

  async getUser(id: string): Promise<VpnUser | null> {
    return this.guard('getUser', () => this.dataSource.getRepository(VpnUser).findOneBy({ id }));
  }

  async createUser(input: NewUser): Promise<VpnUser> {
    return this.locks.run(this.lockKey(input.id), () =>
      this.guard('createUser', async () => {
        await this.dataSource
          .createQueryBuilder()
          .insert()
          .into(VpnUser)
          .values({
            id: input.id,
            name: input.name,
            username: input.username ?? null,
            lang: input.lang,
            referrerId: input.referrerId ?? null,
          })
          .orIgnore()
          .execute();
        const user = await this.dataSource.getRepository(VpnUser).findOneBy({ id: input.id });
        if (!user) throw new PersistenceError(`User ${input.id} was not stored`);
        return user;
      }),
    );
  }

  async withUser<T>(id: string, work: (tx: UserTransaction) => Promise<T>): Promise<T> {
    return this.locks.run(this.lockKey(id), () =>
      this.guard(`withUser(${id})`, () =>
        this.dataSource.transaction(async (manager) => {
          const user = await this.readUserForUpdate(manager, id);
          if (!user) throw new PersistenceError(`Unknown user ${id}`);
          return work(new ManagedUserTransaction(manager, user));
        }),
      ),
    );
  }

  async updateUser(id: string, mutator: (user: VpnUser) => UserPatch): Promise<VpnUser> {
    return this.withUser(id, (tx) => tx.update(mutator(tx.user)));
  }

  async appendSubscription(record: NewSubscription): Promise<Subscription> {
    return this.withUser(record.userId, (tx) => tx.appendSubscription(record));
  }

  async appendPayment(record: NewPayment): Promise<Payment> {
    return this.locks.run(this.lockKey(record.userId), () =>
      this.guard('appendPayment', () => {
        const repo = this.dataSource.getRepository(Payment);
        return repo.save(repo.create(record));
      }),
    );
  }

  async appendSubscriptionAndPayment(subscription: NewSubscription, payment: NewPayment): Promise<SubscriptionWithPayment> {
    return this.withUser(subscription.userId, (tx) => tx.appendSubscriptionAndPayment(subscription, payment));
  }

  async findPaymentByExternalRef(externalRef: string): Promise<Payment | null> {
    return this.guard('findPaymentByExternalRef', () => this.dataSource.getRepository(Payment).findOneBy({ externalRef }));
  }

  async listSubscriptions(userId: string): Promise<Subscription[]> {
    return this.guard('listSubscriptions', () =>
      this.dataSource.getRepository(Subscription).find({ where: { userId }, order: { id: 'ASC' } }),
    );
  }

  async listPayments(userId: string): Promise<Payment[]> {
    return this.guard('listPayments', () =>
      this.dataSource.getRepository(Payment).find({ where: { userId }, order: { id: 'ASC' } }),
    );
  }

  async countReferrals(userId: string): Promise<number> {
    return this.guard('countReferrals', () => this.dataSource.getRepository(VpnUser).countBy({ referrerId: userId }));
  }

  async stats(): Promise<LedgerStats> {
    return this.guard('stats', async () => {
      const users = this.dataSource.getRepository(VpnUser);
      const [userCount, subscriptionCount, revenue] = await Promise.all([
        users.count(),
        this.dataSource.getRepository(Subscription).count(),
        users.sum('totalPaid'),
      ]);
      return { users: userCount, subscriptions: subscriptionCount, revenue: revenue ?? 0 };
    });
  }
}
