import { Column, Entity, Index, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';

@Entity('dim_channel')
export class DimChannelEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  channel_key!: number;

  @Index({ unique: true })
  @Column({ type: 'varchar' })
  channel_name!: string;

  // Updated when the fee table changes
  @Column({ type: 'decimal', precision: 5, scale: 2 })
  fee_percent!: number;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
