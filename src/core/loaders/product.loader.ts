import { Product, SubscriptionPlan } from "../domain/entities/crm-records.entity.js";
import { ErrorContext } from "../domain/entities/error-record.entity.js";
import { errorMessage } from "../domain/errors/api.errors.js";
import { Identified, ListPage, ListQuery } from "../domain/services/crm-api.service.js";
import { BaseEntityLoader } from "./base-entity.loader.js";

/** First occurrence of each plan id, in payload order. */
export function uniquePlans(plans: readonly SubscriptionPlan[]): SubscriptionPlan[] {
  const seen = new Set<number>();
  return plans.filter((plan) => {
    if (seen.has(plan.id)) return false;
    seen.add(plan.id);
    return true;
  });
}

/**
 * Products commit first, together with the removal of plans the product no
 * longer lists; each embedded subscription plan then commits on its own, so a
 * bad plan costs only itself.
 */
export class ProductLoader extends BaseEntityLoader<Product> {
  readonly entityType = "products";
  override readonly supportsSince = false;

  protected listPage(query: ListQuery): Promise<ListPage<Identified>> {
    return this.api.listProducts(query);
  }

  protected fetchDetail(id: number): Promise<Product> {
    return this.api.getProduct(id);
  }

  protected async resolveRelationships(product: Product): Promise<Product> {
    return product;
  }

  protected persist(product: Product): void {
    this.store.upsert("products", {
      id: product.id,
      product_name: product.productName,
      sku: product.sku,
      product_price: product.productPrice,
      data: product,
    });
  }

  protected override write(product: Product): void {
    const plans = uniquePlans(product.subscriptionPlans);
    this.store.transaction(() => {
      this.persist(product);
      const removed = this.store.pruneChildren(
        "subscription_plans",
        "product_id",
        product.id,
        plans.map((plan) => plan.id),
      );
      if (removed > 0) {
        this.logger.info("Removed subscription plans no longer listed", { productId: product.id, removed });
      }
    });
    if (plans.length === 0) return;
    let stored = 0;
    for (const plan of plans) {
      try {
        this.store.transaction(() =>
          this.store.upsert("subscription_plans", {
            id: plan.id,
            product_id: product.id,
            name: plan.name,
            data: { ...plan, productId: product.id },
          }),
        );
        stored++;
      } catch (err) {
        this.logger.warn("Failed to store subscription plan", {
          planId: plan.id,
          productId: product.id,
          error: errorMessage(err),
        });
      }
    }
    this.logger.info("Stored subscription plans", {
      productId: product.id,
      stored,
      unique: plans.length,
      received: product.subscriptionPlans.length,
    });
  }

  protected override describe(product: Product): ErrorContext {
    return {
      product_name: product.productName,
      sku: product.sku,
      active: product.active,
      subscription_only: product.subscriptionOnly,
    };
  }
}
