import { EntityType } from "../domain/entities/entity-type.entity.js";
import { AffiliateLoader } from "./affiliate.loader.js";
import { EntityLoader, LoaderDeps, LoaderLookup } from "./base-entity.loader.js";
import { ContactLoader } from "./contact.loader.js";
import { CustomFieldLoader } from "./custom-field.loader.js";
import { OrderLoader } from "./order.loader.js";
import { ProductLoader } from "./product.loader.js";
import {
  CAMPAIGN_DESCRIPTOR,
  NOTE_DESCRIPTOR,
  OPPORTUNITY_DESCRIPTOR,
  SimpleEntityLoader,
  TASK_DESCRIPTOR,
} from "./simple-entity.loader.js";
import { SubscriptionLoader } from "./subscription.loader.js";
import { TagLoader } from "./tag.loader.js";

export type LoaderFactory = (deps: LoaderDeps) => EntityLoader;

export const LOADER_FACTORIES: Readonly<Record<EntityType, LoaderFactory>> = {
  custom_fields: (deps) => new CustomFieldLoader(deps),
  tags: (deps) => new TagLoader(deps),
  products: (deps) => new ProductLoader(deps),
  contacts: (deps) => new ContactLoader(deps),
  opportunities: (deps) => new SimpleEntityLoader(deps, OPPORTUNITY_DESCRIPTOR),
  affiliates: (deps) => new AffiliateLoader(deps),
  orders: (deps) => new OrderLoader(deps),
  tasks: (deps) => new SimpleEntityLoader(deps, TASK_DESCRIPTOR),
  notes: (deps) => new SimpleEntityLoader(deps, NOTE_DESCRIPTOR),
  campaigns: (deps) => new SimpleEntityLoader(deps, CAMPAIGN_DESCRIPTOR),
  subscriptions: (deps) => new SubscriptionLoader(deps),
};

/**
 * One loader per entity type, built on first use. Loaders reach each other
 * through the registry, so a contact load can pull in a missing tag.
 */
export class LoaderRegistry implements LoaderLookup {
  private readonly instances = new Map<EntityType, EntityLoader>();

  constructor(
    private readonly deps: Omit<LoaderDeps, "loaders">,
    private readonly factories: Readonly<Record<EntityType, LoaderFactory>> = LOADER_FACTORIES,
  ) {}

  get(entityType: EntityType): EntityLoader {
    let loader = this.instances.get(entityType);
    if (!loader) {
      loader = this.factories[entityType]({ ...this.deps, loaders: this });
      this.instances.set(entityType, loader);
    }
    return loader;
  }
}
