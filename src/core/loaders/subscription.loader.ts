import { Subscription } from "../domain/entities/crm-records.entity.js";
import { ErrorContext } from "../domain/entities/error-record.entity.js";
import { ListPage, ListQuery } from "../domain/services/crm-api.service.js";
import { BaseEntityLoader } from "./base-entity.loader.js";

/** Subscriptions have no by-id endpoint: the listed record is the whole record. */
export class SubscriptionLoader extends BaseEntityLoader<Subscription, Subscription, Subscription> {
  readonly entityType = "subscriptions";
  override readonly supportsSince = false;

  protected listPage(query: ListQuery): Promise<ListPage<Subscription>> {
    return this.api.listSubscriptions(query);
  }

  override async loadById(id: number): Promise<boolean> {
    this.logger.warn("Subscriptions cannot be loaded by id", { id });
    return false;
  }

  protected fetchDetail(id: number): Promise<Subscription> {
    return Promise.reject(new Error(`Subscription ${id} has no by-id endpoint`));
  }

  protected override processListedItem(item: Subscription): Promise<boolean> {
    return this.loadWith(item.id, () => Promise.resolve(item));
  }

  protected async resolveRelationships(subscription: Subscription): Promise<Subscription> {
    return subscription;
  }

  protected persist(subscription: Subscription): void {
    this.store.upsert("subscriptions", {
      id: subscription.id,
      contact_id: subscription.contactId,
      product_id: subscription.productId,
      status: subscription.status,
      data: subscription,
    });
  }

  protected override describe(subscription: Subscription): ErrorContext {
    return {
      contact_id: subscription.contactId,
      product_id: subscription.productId,
      status: subscription.status,
    };
  }
}
