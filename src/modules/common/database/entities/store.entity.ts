import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import type { StoreRecord } from '../../../../types/quick-commerce';

@Entity('stores')
@Index(['zone'])
export class StoreEntity implements StoreRecord {
  @PrimaryColumn({ name: 'store_id', type: 'integer' })
  storeId!: number;

  @Column({ type: 'varchar', length: 120 })
  name!: string;

  @Column({ type: 'varchar', length: 60 })
  zone!: string;

  @Column({ name: 'avg_picking_time', type: 'double precision', nullable: true })
  avgPickingTime!: number | null;
}
