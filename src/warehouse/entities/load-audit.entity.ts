import { Column, Entity, PrimaryColumn } from 'typeorm';

/** One row per loaded partition; written in the same transaction as its facts */
@Entity('etl_load_audit')
export class LoadAuditEntity {
  @PrimaryColumn({ type: 'date' })
  full_date!: string;

  /** sha-256 of the processed partition file that was loaded */
  @Column({ type: 'varchar', length: 64 })
  source_checksum!: string;

  @Column({ type: 'int' })
  facts_written!: number;

  @Column({ type: 'int' })
  dims_upserted!: number;

  @Column({ type: 'timestamptz' })
  loaded_at!: Date;
}
