import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryColumn,
  UpdateDateColumn,
} from 'typeorm';
import { DimChannelEntity } from './dim-channel.entity';
import { DimCityEntity } from './dim-city.entity';
import { DimCustomerEntity } from './dim-customer.entity';
import { DimDateEntity } from './dim-date.entity';

@Entity('fact_transactions')
// Dashboard access paths: per-day rollups, per-channel and per-status breakdowns
@Index(['date_key', 'status'])
@Index(['channel_key'])
@Index(['customer_key'])
@Index(['city_key'])
export class FactTransactionEntity {
  @PrimaryColumn({ type: 'varchar' })
  transaction_id!: string;

  @Column({ type: 'int' })
  date_key!: number;

  @ManyToOne(() => DimDateEntity, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'date_key' })
  date!: DimDateEntity;

  @Column({ type: 'int' })
  channel_key!: number;

  @ManyToOne(() => DimChannelEntity, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'channel_key' })
  channel!: DimChannelEntity;

  @Column({ type: 'int' })
  customer_key!: number;

  @ManyToOne(() => DimCustomerEntity, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'customer_key' })
  customer!: DimCustomerEntity;

  @Column({ type: 'int' })
  city_key!: number;

  @ManyToOne(() => DimCityEntity, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'city_key' })
  city!: DimCityEntity;

  @Column({ type: 'timestamptz', nullable: true })
  transaction_ts!: Date | null;

  @Column({ type: 'decimal', precision: 18, scale: 2 })
  amount!: number;

  @Column({ type: 'varchar' })
  status!: string;

  @Column({ type: 'decimal', precision: 10, scale: 2 })
  processing_time!: number;

  @Column({ type: 'varchar' })
  processing_delay_bucket!: string;

  @Column({ type: 'decimal', precision: 18, scale: 2 })
  revenue!: number;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
