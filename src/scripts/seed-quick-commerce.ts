#!/usr/bin/env tsx
/**
 * Seed Script: synthetic quick-commerce dataset
 *
 * Replaces every store, product, inventory, rider, order and order line row
 * with freshly generated data covering the last 90 days.
 *
 * Usage:
 *   npm run seed
 *   SEED=42 npm run seed   # reproducible dataset
 *
 * Safety:
 * - Runs in one transaction (all or nothing)
 * - Creates missing tables through TypeORM schema sync
 */

import 'reflect-metadata';
import type { EntityManager, EntityTarget, ObjectLiteral } from 'typeorm';
import { validateEnv } from '../common/config/env.validation';
import { createDataSource } from '../modules/common/database/data-source';
import {
  InventoryEntity,
  OrderEntity,
  OrderProductEntity,
  ProductEntity,
  RiderEntity,
  StoreEntity,
} from '../modules/common/database/entities';
import {
  createSeededRandom,
  generateQuickCommerceDataset,
} from '../modules/common/database/seed/quick-commerce-dataset.generator';

const INSERT_CHUNK_SIZE = 1000;

async function insertInChunks<TEntity extends ObjectLiteral>(
  manager: EntityManager,
  target: EntityTarget<TEntity>,
  rows: TEntity[],
): Promise<void> {
  for (let start = 0; start < rows.length; start += INSERT_CHUNK_SIZE) {
    await manager.insert(target, rows.slice(start, start + INSERT_CHUNK_SIZE));
  }
}

async function seed(): Promise<void> {
  const env = validateEnv();
  const dataSource = createDataSource({ ...env, DATABASE_SYNCHRONIZE: true });

  const seedValue = env.SEED ?? Date.now();
  const data = generateQuickCommerceDataset({
    random: createSeededRandom(seedValue),
    referenceDate: new Date(),
  });

  console.log(`🌱 Generating quick-commerce data (seed ${seedValue})...`);

  await dataSource.initialize();
  try {
    await dataSource.transaction(async manager => {
      await manager.query(
        'TRUNCATE TABLE order_products, inventory, orders, riders, products, stores RESTART IDENTITY CASCADE',
      );

      // Generated ids are left to the sequences
      const inventory = data.inventory.map(({ id: _id, ...row }) =>
        manager.create(InventoryEntity, row),
      );
      const orderProducts = data.orderProducts.map(({ id: _id, ...row }) =>
        manager.create(OrderProductEntity, row),
      );

      await insertInChunks(
        manager,
        StoreEntity,
        data.stores.map(row => manager.create(StoreEntity, row)),
      );
      await insertInChunks(
        manager,
        ProductEntity,
        data.products.map(row => manager.create(ProductEntity, row)),
      );
      await insertInChunks(manager, InventoryEntity, inventory);
      await insertInChunks(
        manager,
        RiderEntity,
        data.riders.map(row => manager.create(RiderEntity, row)),
      );
      await insertInChunks(
        manager,
        OrderEntity,
        data.orders.map(row => manager.create(OrderEntity, row)),
      );
      await insertInChunks(manager, OrderProductEntity, orderProducts);
    });

    console.log(
      `✅ Seed complete: ${data.stores.length} stores, ${data.products.length} products, ` +
        `${data.inventory.length} inventory rows, ${data.riders.length} riders, ` +
        `${data.orders.length} orders, ${data.orderProducts.length} order lines`,
    );
  } finally {
    await dataSource.destroy();
  }
}

seed().catch((error: unknown) => {
  console.error('❌ Seed failed:', error);
  process.exit(1);
});
