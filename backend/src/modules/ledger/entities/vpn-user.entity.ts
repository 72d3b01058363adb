import { Column, CreateDateColumn, Entity, Index, PrimaryColumn } from 'typeorm';

@Entity('vpn_users')
export class VpnUser {
  /** Telegram id, kept as a decimal string. */
  @PrimaryColumn({ type: 'varchar', length: 32 })
  id!: string;

  @Column({ type: 'varchar', nullable: true })
  username!: string | null;

  @Column({ type: 'varchar', default: '' })
  name!: string;

  @Column({ type: 'varchar', length: 8, default: 'en' })
  lang!: string;

  /** Weak reference: no FK, the referrer may never have registered. */
  @Index('idx_vpn_users_referrer_id')
  @Column({ type: 'varchar', length: 32, nullable: true })
  referrerId!: string | null;

  /** Set once by the trial grant and never cleared. */
  @Column({ type: Boolean, default: false })
  trialUsed!: boolean;

  @Column({ type: Date, nullable: true })
  expiresAt!: Date | null;

  @Column({ type: 'double precision', default: 0 })
  totalPaid!: number;

  @Column({ type: Boolean, default: false })
  blocked!: boolean;

  @CreateDateColumn()
  createdAt!: Date;
}
