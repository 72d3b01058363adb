import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { VpnUser } from './vpn-user.entity';

/** Append-only history: one row per trial grant or purchase. Only `active` changes afterwards. */
@Entity('subscriptions')
export class Subscription {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('idx_subscriptions_user_id')
  @Column({ type: 'varchar', length: 32 })
  userId!: string;

  @ManyToOne(() => VpnUser, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'userId' })
  user?: VpnUser;

  @Column({ type: 'varchar' })
  planName!: string;

  @Column({ type: 'integer' })
  devices!: number;

  @Column({ type: 'integer' })
  periodDays!: number;

  @Column({ type: 'double precision', default: 0 })
  price!: number;

  @Column({ type: 'varchar', length: 8, default: 'USD' })
  currency!: string;

  @Column({ type: 'varchar' })
  paymentMethod!: string;

  @Column({ type: Date })
  startsAt!: Date;

  @Column({ type: Date })
  endsAt!: Date;

  /** Provisioning token handed to the user; a placeholder, not a credential. */
  @Column({ type: 'varchar' })
  configUrl!: string;

  @Column({ type: Boolean, default: true })
  active!: boolean;
}
