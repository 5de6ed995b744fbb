import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('dim_city')
export class DimCityEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  city_key!: number;

  @Index({ unique: true })
  @Column({ type: 'varchar' })
  city_name!: string;
}
