import { Entity, PrimaryGeneratedColumn, Column, Index, ManyToOne, JoinColumn } from 'typeorm';
import type { OrderProductRecord } from '../../../../types/quick-commerce';
import { OrderEntity } from './order.entity';
import { ProductEntity } from './product.entity';

@Entity('order_products')
@Index(['orderId'])
@Index(['productId'])
export class OrderProductEntity implements OrderProductRecord {
  @PrimaryGeneratedColumn({ type: 'integer' })
  id!: number;

  @Column({ name: 'order_id', type: 'integer' })
  orderId!: number;

  @ManyToOne(() => OrderEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'order_id' })
  order?: OrderEntity;

  @Column({ name: 'product_id', type: 'integer' })
  productId!: number;

  @ManyToOne(() => ProductEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'product_id' })
  product?: ProductEntity;

  @Column({ type: 'integer' })
  quantity!: number;

  @Column({ name: 'was_out_of_stock', type: 'boolean', default: false })
  wasOutOfStock!: boolean;
}
