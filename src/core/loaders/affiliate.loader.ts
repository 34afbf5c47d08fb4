import {
  Affiliate,
  AffiliateClawback,
  AffiliatePayment,
} from "../domain/entities/crm-records.entity.js";
import { ErrorContext } from "../domain/entities/error-record.entity.js";
import { Identified, ListPage, ListQuery } from "../domain/services/crm-api.service.js";
import { BaseEntityLoader } from "./base-entity.loader.js";

export interface PreparedAffiliate {
  affiliate: Affiliate;
  /** Parent to reference, null for roots and for a parent still being loaded. */
  parentId: number | null;
  payments: AffiliatePayment[];
  clawbacks: AffiliateClawback[];
}

/**
 * Affiliates form a hierarchy: a missing parent is loaded before its child.
 * Ids currently being loaded are tracked so a parent cycle ends instead of
 * recursing forever; the affiliate that closes the cycle is stored without
 * its parent reference and the outer load stores the link.
 */
export class AffiliateLoader extends BaseEntityLoader<Affiliate, PreparedAffiliate> {
  readonly entityType = "affiliates";
  private readonly inFlight = new Set<number>();

  protected listPage(query: ListQuery): Promise<ListPage<Identified>> {
    return this.api.listAffiliates(query);
  }

  protected fetchDetail(id: number): Promise<Affiliate> {
    return this.api.getAffiliate(id);
  }

  override async loadById(id: number): Promise<boolean> {
    this.inFlight.add(id);
    try {
      return await super.loadById(id);
    } finally {
      this.inFlight.delete(id);
    }
  }

  protected async resolveRelationships(affiliate: Affiliate): Promise<PreparedAffiliate> {
    let parentId = affiliate.parentId !== null && affiliate.parentId > 0 ? affiliate.parentId : null;
    if (parentId !== null && parentId !== affiliate.id) {
      if (this.inFlight.has(parentId)) {
        this.logger.warn("Affiliate parent cycle, not loading parent", {
          affiliateId: affiliate.id,
          parentId,
        });
        parentId = null;
      } else if (!(await this.ensureLoaded("affiliates", "affiliates", parentId))) {
        this.logger.warn("Parent affiliate could not be loaded", { affiliateId: affiliate.id, parentId });
      }
    }

    const payments = await this.fetchOptional(
      `payments of affiliate ${affiliate.id}`,
      () => this.api.listAffiliatePayments(affiliate.id),
      [],
    );
    const clawbacks = await this.fetchOptional(
      `clawbacks of affiliate ${affiliate.id}`,
      () => this.api.listAffiliateClawbacks(affiliate.id),
      [],
    );
    return { affiliate, parentId, payments, clawbacks };
  }

  protected persist({ affiliate, parentId, payments, clawbacks }: PreparedAffiliate): void {
    this.store.upsert("affiliates", {
      id: affiliate.id,
      contact_id: affiliate.contactId,
      parent_id: parentId,
      code: affiliate.code,
      name: affiliate.name,
      data: affiliate,
    });
    this.store.replaceChildren(
      "affiliate_payments",
      "affiliate_id",
      affiliate.id,
      payments.map((p) => ({ id: p.id, amount: p.amount, data: p })),
    );
    this.store.replaceChildren(
      "affiliate_clawbacks",
      "affiliate_id",
      affiliate.id,
      clawbacks.map((c) => ({ id: c.id, amount: c.amount, data: c })),
    );
  }

  protected override describe(affiliate: Affiliate): ErrorContext {
    return {
      code: affiliate.code,
      name: affiliate.name,
      contact_id: affiliate.contactId,
      parent_id: affiliate.parentId,
    };
  }
}
