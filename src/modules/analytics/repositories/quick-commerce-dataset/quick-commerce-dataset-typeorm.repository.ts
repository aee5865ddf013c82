import { Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { QuickCommerceDatasetRepository } from './quick-commerce-dataset.repository';
import {
  OrderEntity,
  OrderProductEntity,
  ProductEntity,
  RiderEntity,
  StoreEntity,
} from '@modules/common/database/entities';
import type {
  OrderProductRecord,
  OrderRecord,
  ProductRecord,
  QuickCommerceDataset,
  RiderRecord,
  StoreRecord,
} from '../../../../types/quick-commerce';

@Injectable()
export class QuickCommerceDatasetTypeOrmRepository extends QuickCommerceDatasetRepository {
  private readonly logger = new Logger(QuickCommerceDatasetTypeOrmRepository.name);

  constructor(private readonly dataSource: DataSource) {
    super();
  }

  async loadSnapshot(): Promise<QuickCommerceDataset> {
    try {
      // One repeatable-read transaction so every table is read at the same point in time
      return await this.dataSource.transaction('REPEATABLE READ', manager =>
        this.readTables(manager),
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to load quick-commerce snapshot: ${message}`);
      throw error;
    }
  }

  private async readTables(manager: EntityManager): Promise<QuickCommerceDataset> {
    const stores = await manager.find(StoreEntity, { order: { storeId: 'ASC' } });
    const riders = await manager.find(RiderEntity, { order: { riderId: 'ASC' } });
    const products = await manager.find(ProductEntity, { order: { productId: 'ASC' } });
    const orders = await manager.find(OrderEntity, { order: { orderId: 'ASC' } });
    const orderProducts = await manager.find(OrderProductEntity, { order: { id: 'ASC' } });

    this.logger.debug(
      `Snapshot loaded: ${orders.length} orders, ${orderProducts.length} line items`,
    );

    return {
      stores: stores.map(store => this.mapStore(store)),
      riders: riders.map(rider => this.mapRider(rider)),
      products: products.map(product => this.mapProduct(product)),
      orders: orders.map(order => this.mapOrder(order)),
      orderProducts: orderProducts.map(item => this.mapOrderProduct(item)),
    };
  }

  private mapStore(store: StoreEntity): StoreRecord {
    return {
      storeId: store.storeId,
      name: store.name,
      zone: store.zone,
      avgPickingTime: store.avgPickingTime,
    };
  }

  private mapRider(rider: RiderEntity): RiderRecord {
    return {
      riderId: rider.riderId,
      name: rider.name,
      zone: rider.zone,
      maxCapacity: rider.maxCapacity,
    };
  }

  private mapProduct(product: ProductEntity): ProductRecord {
    return {
      productId: product.productId,
      productName: product.productName,
      department: product.department,
      aisle: product.aisle,
      price: product.price,
    };
  }

  private mapOrder(order: OrderEntity): OrderRecord {
    return {
      orderId: order.orderId,
      userId: order.userId,
      storeId: order.storeId,
      riderId: order.riderId,
      orderDatetime: order.orderDatetime,
      promisedDeliveryTime: order.promisedDeliveryTime,
      actualDeliveryTime: order.actualDeliveryTime,
      status: order.status,
      cancellationReason: order.cancellationReason,
      totalItems: order.totalItems,
      totalAmount: order.totalAmount,
      pickingTimeMinutes: order.pickingTimeMinutes,
      deliveryTimeMinutes: order.deliveryTimeMinutes,
      delayMinutes: order.delayMinutes,
    };
  }

  private mapOrderProduct(item: OrderProductEntity): OrderProductRecord {
    return {
      id: item.id,
      orderId: item.orderId,
      productId: item.productId,
      quantity: item.quantity,
      wasOutOfStock: item.wasOutOfStock,
    };
  }
}
