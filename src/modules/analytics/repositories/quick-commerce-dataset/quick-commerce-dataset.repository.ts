import type { QuickCommerceDataset } from '../../../../types/quick-commerce';

export abstract class QuickCommerceDatasetRepository {
  /**
   * Reads orders, stores, riders, products and order line items as one
   * consistent snapshot. Rejects when any read fails.
   */
  abstract loadSnapshot(): Promise<QuickCommerceDataset>;
}
