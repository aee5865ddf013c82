import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import type { ProductRecord } from '../../../../types/quick-commerce';

@Entity('products')
@Index(['department'])
export class ProductEntity implements ProductRecord {
  @PrimaryColumn({ name: 'product_id', type: 'integer' })
  productId!: number;

  @Column({ name: 'product_name', type: 'varchar', length: 160 })
  productName!: string;

  @Column({ type: 'varchar', length: 80 })
  department!: string;

  @Column({ type: 'varchar', length: 40, nullable: true })
  aisle!: string | null;

  @Column({ type: 'double precision', nullable: true })
  price!: number | null;
}
