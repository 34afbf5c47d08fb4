import {
  Order,
  OrderPayment,
  OrderTransaction,
  PaymentGateway,
  PaymentPlan,
} from "../domain/entities/crm-records.entity.js";
import { ErrorContext } from "../domain/entities/error-record.entity.js";
import { errorMessage } from "../domain/errors/api.errors.js";
import { Identified, ListPage, ListQuery } from "../domain/services/crm-api.service.js";
import { BaseEntityLoader } from "./base-entity.loader.js";

export interface PreparedOrder {
  order: Order;
  payments: OrderPayment[];
  transactions: OrderTransaction[];
}

/** Placeholder row for a gateway the API only names inside a payment plan. */
export function gatewayStub(plan: PaymentPlan, id: number): PaymentGateway {
  return {
    id,
    name: plan.merchantAccountName ?? `Gateway ${id}`,
    type: "Unknown",
    isActive: true,
  };
}

/** Affiliate id 0 means no affiliate. */
function affiliateRef(id: number | null): number | null {
  return id === null || id === 0 ? null : id;
}

/**
 * Orders with items, payment plan, payments and transactions, all written in
 * one transaction once every referenced parent had its chance to be stored.
 */
export class OrderLoader extends BaseEntityLoader<Order, PreparedOrder> {
  readonly entityType = "orders";

  protected listPage(query: ListQuery): Promise<ListPage<Identified>> {
    return this.api.listOrders(query);
  }

  protected fetchDetail(id: number): Promise<Order> {
    return this.api.getOrder(id);
  }

  protected async resolveRelationships(order: Order): Promise<PreparedOrder> {
    const paymentPlan = order.paymentPlan ? this.resolvePaymentPlan(order.id, order.paymentPlan) : null;

    const payments = await this.fetchOptional(
      `payments of order ${order.id}`,
      () => this.api.listOrderPayments(order.id),
      [],
    );
    const transactions = await this.fetchOptional(
      `transactions of order ${order.id}`,
      () => this.api.listOrderTransactions(order.id),
      [],
    );

    const leadAffiliateId = affiliateRef(order.leadAffiliateId);
    const salesAffiliateId = affiliateRef(order.salesAffiliateId);
    for (const affiliateId of new Set([leadAffiliateId, salesAffiliateId])) {
      if (affiliateId === null) continue;
      if (!(await this.ensureLoaded("affiliates", "affiliates", affiliateId))) {
        this.logger.warn("Referenced affiliate could not be loaded", { orderId: order.id, affiliateId });
      }
    }

    return {
      order: { ...order, leadAffiliateId, salesAffiliateId, paymentPlan },
      payments,
      transactions,
    };
  }

  /** Plan to store with the order, or null when its gateway cannot be satisfied. */
  private resolvePaymentPlan(orderId: number, plan: PaymentPlan): PaymentPlan | null {
    const gatewayId = plan.paymentGatewayId;
    if (gatewayId !== null && !this.store.exists("payment_gateways", gatewayId)) {
      const stub = gatewayStub(plan, gatewayId);
      try {
        this.store.transaction(() =>
          this.store.upsert("payment_gateways", {
            id: stub.id,
            name: stub.name,
            type: stub.type,
            is_active: stub.isActive,
            data: stub,
          }),
        );
        this.logger.info("Created payment gateway stub", { orderId, gatewayId });
      } catch (err) {
        this.logger.warn("Could not create payment gateway, dropping payment plan", {
          orderId,
          gatewayId,
          error: errorMessage(err),
        });
        return null;
      }
    }
    if (plan.creditCardId !== null && !this.store.exists("credit_cards", plan.creditCardId)) {
      this.logger.warn("Payment plan references a credit card missing locally", {
        orderId,
        creditCardId: plan.creditCardId,
      });
    }
    return plan;
  }

  protected persist({ order, payments, transactions }: PreparedOrder): void {
    this.store.upsert("orders", {
      id: order.id,
      contact_id: order.contactId,
      lead_affiliate_id: order.leadAffiliateId,
      sales_affiliate_id: order.salesAffiliateId,
      title: order.title,
      status: order.status,
      total: order.total,
      data: order,
    });
    this.store.replaceChildren(
      "order_items",
      "order_id",
      order.id,
      order.items.map((item) => ({
        id: item.id,
        product_id: item.productId,
        name: item.name,
        data: item,
      })),
    );
    const plan = order.paymentPlan;
    this.store.replaceChildren(
      "payment_plans",
      "order_id",
      order.id,
      plan
        ? [
            {
              // one plan per order, keyed by the order id
              id: order.id,
              payment_gateway_id: plan.paymentGatewayId,
              credit_card_id: plan.creditCardId,
              data: plan,
            },
          ]
        : [],
    );
    this.store.replaceChildren(
      "order_payments",
      "order_id",
      order.id,
      payments.map((p) => ({ id: p.id, amount: p.amount, data: p })),
    );
    this.store.replaceChildren(
      "order_transactions",
      "order_id",
      order.id,
      transactions.map((t) => ({ id: t.id, amount: t.amount, status: t.status, data: t })),
    );
  }

  protected override describe(order: Order): ErrorContext {
    return {
      title: order.title,
      status: order.status,
      order_date: order.orderDate,
      total: order.total,
      contact_id: order.contactId,
    };
  }
}
