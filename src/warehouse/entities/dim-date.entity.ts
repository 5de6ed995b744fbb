import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('dim_date')
export class DimDateEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  date_key!: number;

  // Natural key
  @Index({ unique: true })
  @Column({ type: 'date' })
  full_date!: string;

  @Column({ type: 'smallint' })
  year!: number;

  @Column({ type: 'smallint' })
  quarter!: number;

  @Column({ type: 'smallint' })
  month!: number;

  @Column({ type: 'smallint' })
  day_of_month!: number;

  /** 0 = Sunday */
  @Column({ type: 'smallint' })
  day_of_week!: number;

  @Column({ type: 'boolean' })
  is_weekend!: boolean;
}
