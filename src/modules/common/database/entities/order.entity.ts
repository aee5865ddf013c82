import { Entity, PrimaryColumn, Column, Index, ManyToOne, JoinColumn } from 'typeorm';
import type { OrderRecord } from '../../../../types/quick-commerce';
import { StoreEntity } from './store.entity';
import { RiderEntity } from './rider.entity';

@Entity('orders')
@Index(['status'])
@Index(['storeId'])
@Index(['riderId'])
@Index(['orderDatetime'])
export class OrderEntity implements OrderRecord {
  @PrimaryColumn({ name: 'order_id', type: 'integer' })
  orderId!: number;

  @Column({ name: 'user_id', type: 'integer', nullable: true })
  userId!: number | null;

  @Column({ name: 'store_id', type: 'integer' })
  storeId!: number;

  @ManyToOne(() => StoreEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'store_id' })
  store?: StoreEntity;

  @Column({ name: 'rider_id', type: 'integer', nullable: true })
  riderId!: number | null;

  @ManyToOne(() => RiderEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'rider_id' })
  rider?: RiderEntity | null;

  @Column({ name: 'order_datetime', type: 'timestamp' })
  orderDatetime!: Date;

  @Column({ name: 'promised_delivery_time', type: 'timestamp', nullable: true })
  promisedDeliveryTime!: Date | null;

  @Column({ name: 'actual_delivery_time', type: 'timestamp', nullable: true })
  actualDeliveryTime!: Date | null;

  @Column({ type: 'varchar', length: 20 })
  status!: string; // delivered, cancelled, pending

  @Column({ name: 'cancellation_reason', type: 'varchar', length: 120, nullable: true })
  cancellationReason!: string | null;

  @Column({ name: 'total_items', type: 'integer' })
  totalItems!: number;

  @Column({ name: 'total_amount', type: 'double precision', nullable: true })
  totalAmount!: number | null;

  @Column({ name: 'picking_time_minutes', type: 'double precision', nullable: true })
  pickingTimeMinutes!: number | null;

  @Column({ name: 'delivery_time_minutes', type: 'double precision', nullable: true })
  deliveryTimeMinutes!: number | null;

  @Column({ name: 'delay_minutes', type: 'double precision', nullable: true })
  delayMinutes!: number | null;
}
