import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import type { RiderRecord } from '../../../../types/quick-commerce';

@Entity('riders')
@Index(['zone'])
export class RiderEntity implements RiderRecord {
  @PrimaryColumn({ name: 'rider_id', type: 'integer' })
  riderId!: number;

  @Column({ type: 'varchar', length: 120 })
  name!: string;

  @Column({ type: 'varchar', length: 60 })
  zone!: string;

  @Column({ name: 'max_capacity', type: 'integer' })
  maxCapacity!: number;
}
