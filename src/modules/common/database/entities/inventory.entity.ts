import { Entity, PrimaryGeneratedColumn, Column, Unique, ManyToOne, JoinColumn } from 'typeorm';
import type { InventoryRecord } from '../../../../types/quick-commerce';
import { ProductEntity } from './product.entity';
import { StoreEntity } from './store.entity';

/**
 * Per-store stock level. Not read by the analytics views; the seeder uses it
 * to decide which line items were out of stock.
 */
@Entity('inventory')
@Unique(['productId', 'storeId'])
export class InventoryEntity implements InventoryRecord {
  @PrimaryGeneratedColumn({ type: 'integer' })
  id!: number;

  @Column({ name: 'product_id', type: 'integer' })
  productId!: number;

  @ManyToOne(() => ProductEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'product_id' })
  product?: ProductEntity;

  @Column({ name: 'store_id', type: 'integer' })
  storeId!: number;

  @ManyToOne(() => StoreEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'store_id' })
  store?: StoreEntity;

  @Column({ name: 'stock_level', type: 'integer' })
  stockLevel!: number;

  @Column({ name: 'last_updated', type: 'timestamp' })
  lastUpdated!: Date;

  @Column({ name: 'stockout_count', type: 'integer', default: 0 })
  stockoutCount!: number;
}
