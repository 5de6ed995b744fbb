import { Column, Entity, Index, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';

@Entity('dim_customer')
export class DimCustomerEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  customer_key!: number;

  @Index({ unique: true })
  @Column({ type: 'varchar' })
  customer_id!: string;

  @Column({ type: 'varchar' })
  segment!: string;

  /** Earliest partition date the customer appeared in */
  @Column({ type: 'date' })
  first_seen_date!: string;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
