import type { Payment, PaymentStatus, Subscription, VpnUser } from './entities';

export const LEDGER_STORE = 'LEDGER_STORE';

export type NewUser = {
  id: string;
  name: string;
  username?: string | null;
  lang: string;
  referrerId?: string | null;
};

/** Fields an entitlement-affecting step may change on the user row. */
export type UserPatch = Partial<Pick<VpnUser, 'name' | 'username' | 'lang' | 'trialUsed' | 'expiresAt' | 'totalPaid' | 'blocked'>>;

export type NewSubscription = Pick<
  Subscription,
  'userId' | 'planName' | 'devices' | 'periodDays' | 'price' | 'currency' | 'paymentMethod' | 'startsAt' | 'endsAt' | 'configUrl'
>;

export type NewPayment = Pick<Payment, 'userId' | 'amount' | 'currency' | 'method' | 'externalRef'> & {
  status: PaymentStatus;
};

export type SubscriptionWithPayment = {
  subscription: Subscription;
  payment: Payment;
};

export type LedgerStats = {
  users: number;
  subscriptions: number;
  revenue: number;
};

/**
 * One identity's critical section. `user` is the row as read inside the section;
 * every write goes through the same transaction and is visible to later calls.
 */
export interface UserTransaction {
  readonly user: VpnUser;
  update(patch: UserPatch): Promise<VpnUser>;
  appendSubscription(record: NewSubscription): Promise<Subscription>;
  /** Both rows or neither; a failure surfaces as PaymentIntegrityError. */
  appendSubscriptionAndPayment(subscription: NewSubscription, payment: NewPayment): Promise<SubscriptionWithPayment>;
  findPaymentByExternalRef(externalRef: string): Promise<Payment | null>;
  /** A subscription of this identity by id. */
  findSubscription(id: number): Promise<Subscription | null>;
}

export interface LedgerStore {
  getUser(id: string): Promise<VpnUser | null>;
  /** Inserts the user; returns the existing row untouched if the id is already known. */
  createUser(input: NewUser): Promise<VpnUser>;
  updateUser(id: string, mutator: (user: VpnUser) => UserPatch): Promise<VpnUser>;
  appendSubscription(record: NewSubscription): Promise<Subscription>;
  appendPayment(record: NewPayment): Promise<Payment>;
  appendSubscriptionAndPayment(subscription: NewSubscription, payment: NewPayment): Promise<SubscriptionWithPayment>;
  /** Runs `work` serialized per identity inside one transaction. Throws PersistenceError if the user is unknown. */
  withUser<T>(id: string, work: (tx: UserTransaction) => Promise<T>): Promise<T>;
  findPaymentByExternalRef(externalRef: string): Promise<Payment | null>;
  listSubscriptions(userId: string): Promise<Subscription[]>;
  listPayments(userId: string): Promise<Payment[]>;
  countReferrals(userId: string): Promise<number>;
  stats(): Promise<LedgerStats>;
}
