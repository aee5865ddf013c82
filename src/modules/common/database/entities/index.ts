import { StoreEntity } from './store.entity';
import { RiderEntity } from './rider.entity';
import { ProductEntity } from './product.entity';
import { OrderEntity } from './order.entity';
import { OrderProductEntity } from './order-product.entity';
import { InventoryEntity } from './inventory.entity';

export { StoreEntity, RiderEntity, ProductEntity, OrderEntity, OrderProductEntity, InventoryEntity };

export const QUICK_COMMERCE_ENTITIES = [
  StoreEntity,
  RiderEntity,
  ProductEntity,
  OrderEntity,
  OrderProductEntity,
  InventoryEntity,
];
