import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Subscription } from './subscription.entity';
import { VpnUser } from './vpn-user.entity';

export type PaymentStatus = 'pending' | 'completed' | 'failed';

@Entity('payments')
export class Payment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('idx_payments_user_id')
  @Column({ type: 'varchar', length: 32 })
  userId!: string;

  @ManyToOne(() => VpnUser, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'userId' })
  user?: VpnUser;

  /** The subscription this charge paid for; null for payments stored on their own. */
  @Column({ type: 'integer', nullable: true })
  subscriptionId!: number | null;

  @ManyToOne(() => Subscription, { onDelete: 'RESTRICT', nullable: true })
  @JoinColumn({ name: 'subscriptionId' })
  subscription?: Subscription | null;

  @Column({ type: 'double precision' })
  amount!: number;

  @Column({ type: 'varchar', length: 8, default: 'USD' })
  currency!: string;

  @Column({ type: 'varchar' })
  method!: string;

  /** Gateway charge id; null for demo methods. Unique so a redelivered confirmation cannot be stored twice. */
  @Index('uq_payments_external_ref', { unique: true })
  @Column({ type: 'varchar', nullable: true })
  externalRef!: string | null;

  @Column({ type: 'varchar', length: 16, default: 'pending' })
  status!: PaymentStatus;

  @CreateDateColumn()
  createdAt!: Date;
}
