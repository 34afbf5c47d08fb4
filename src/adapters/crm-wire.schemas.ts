import { z } from "zod";
import {
  Affiliate,
  AffiliateClawback,
  AffiliatePayment,
  Campaign,
  Contact,
  CreditCard,
  Note,
  Opportunity,
  Order,
  OrderItem,
  OrderPayment,
  OrderTransaction,
  PaymentPlan,
  Product,
  RawCustomField,
  Subscription,
  SubscriptionPlan,
  Tag,
  Task,
} from "../core/domain/entities/crm-records.entity.js";

/**
 * Wire schemas for CRM REST payloads. Each parses the upstream snake_case
 * JSON and transforms it into the camelCase domain record. Unknown fields are
 * ignored; absent optional fields become `null`.
 */

const idSchema = z.number().int();

/** Numbers occasionally arrive as numeric strings. */
const numeric = z.union([
  z.number(),
  z
    .string()
    .regex(/^-?\d+(\.\d+)?$/)
    .transform(Number),
]);

const optStr = z
  .string()
  .nullish()
  .transform((v) => v ?? null);
const optNum = numeric.nullish().transform((v) => v ?? null);
const optBool = z
  .boolean()
  .nullish()
  .transform((v) => v ?? null);
const ref = z
  .object({ id: idSchema })
  .passthrough()
  .nullish()
  .transform((v) => v?.id ?? null);
const list = <T extends z.ZodTypeAny>(item: T) =>
  z
    .array(item)
    .nullish()
    .transform((v): z.output<T>[] => v ?? []);

export const IdentifiedSchema = z.object({ id: idSchema }).passthrough().transform((v) => ({ id: v.id }));

// ─── Contacts ────────────────────────────────────────────────────────────────

const emailAddressSchema = z.object({ email: z.string(), field: optStr });
const phoneNumberSchema = z.object({ number: z.string(), field: optStr, type: optStr });
const addressSchema = z
  .object({
    field: optStr,
    line1: optStr,
    line2: optStr,
    locality: optStr,
    region: optStr,
    postal_code: optStr,
    country_code: optStr,
  })
  .transform((a) => ({
    field: a.field,
    line1: a.line1,
    line2: a.line2,
    locality: a.locality,
    region: a.region,
    postalCode: a.postal_code,
    countryCode: a.country_code,
  }));

export const ContactSchema = z
  .object({
    id: idSchema,
    given_name: optStr,
    family_name: optStr,
    middle_name: optStr,
    company_name: optStr,
    company: z.object({ company_name: optStr }).passthrough().nullish(),
    job_title: optStr,
    email_addresses: list(emailAddressSchema),
    phone_numbers: list(phoneNumberSchema),
    addresses: list(addressSchema),
    tag_ids: list(idSchema),
    custom_fields: list(z.object({ id: idSchema, content: z.unknown() })),
    owner_id: optNum,
    lead_source_id: optNum,
    email_opted_in: optBool,
    email_status: optStr,
    source_type: optStr,
    time_zone: optStr,
    website: optStr,
    date_created: optStr,
    last_updated: optStr,
  })
  .transform(
    (c): Contact => ({
      id: c.id,
      givenName: c.given_name,
      familyName: c.family_name,
      middleName: c.middle_name,
      companyName: c.company_name ?? c.company?.company_name ?? null,
      jobTitle: c.job_title,
      emailAddresses: c.email_addresses,
      phoneNumbers: c.phone_numbers,
      addresses: c.addresses,
      tagIds: c.tag_ids,
      customFields: c.custom_fields.map((f) => ({ id: f.id, content: f.content })),
      ownerId: c.owner_id,
      leadSourceId: c.lead_source_id,
      emailOptedIn: c.email_opted_in,
      emailStatus: c.email_status,
      sourceType: c.source_type,
      timeZone: c.time_zone,
      website: c.website,
      createdAt: c.date_created,
      modifiedAt: c.last_updated,
    }),
  );

export const creditCardSchema = (contactId: number) =>
  z
    .object({
      id: idSchema,
      card_type: optStr,
      card_number: optStr,
      expiration_month: optStr,
      expiration_year: optStr,
      card_holder_name: optStr,
      is_default: optBool,
    })
    .transform(
      (c): CreditCard => ({
        id: c.id,
        contactId,
        cardType: c.card_type,
        cardNumber: c.card_number,
        expirationMonth: c.expiration_month,
        expirationYear: c.expiration_year,
        cardHolderName: c.card_holder_name,
        isDefault: c.is_default ?? false,
      }),
    );

// ─── Tags ────────────────────────────────────────────────────────────────────

export const TagSchema = z
  .object({
    id: idSchema,
    name: optStr,
    description: optStr,
    category: z.object({ id: idSchema, name: optStr }).nullish(),
  })
  .transform(
    (t): Tag => ({
      id: t.id,
      name: t.name ?? "",
      description: t.description,
      category: t.category ? { id: t.category.id, name: t.category.name } : null,
    }),
  );

// ─── Products ────────────────────────────────────────────────────────────────

const subscriptionPlanSchema = (productId: number) =>
  z
    .object({
      id: idSchema,
      subscription_plan_name: optStr,
      name: optStr,
      frequency: optNum,
      cycle: optStr,
      plan_price: optNum,
      active: optBool,
    })
    .transform(
      (p): SubscriptionPlan => ({
        id: p.id,
        productId,
        name: p.subscription_plan_name ?? p.name,
        frequency: p.frequency,
        cycle: p.cycle,
        planPrice: p.plan_price,
        active: p.active,
      }),
    );

export const ProductSchema = z
  .object({
    id: idSchema,
    product_name: optStr,
    sku: optStr,
    product_price: optNum,
    product_desc: optStr,
    product_short_desc: optStr,
    active: optBool,
    subscription_only: optBool,
    subscription_plans: z.array(z.unknown()).nullish(),
  })
  .transform((p, ctx): Product => {
    const plans: SubscriptionPlan[] = [];
    for (const raw of p.subscription_plans ?? []) {
      const parsed = subscriptionPlanSchema(p.id).safeParse(raw);
      if (parsed.success) plans.push(parsed.data);
      else {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid subscription plan: ${parsed.error.message}`,
          path: ["subscription_plans"],
        });
      }
    }
    return {
      id: p.id,
      productName: p.product_name,
      sku: p.sku,
      productPrice: p.product_price,
      productDesc: p.product_desc,
      productShortDesc: p.product_short_desc,
      active: p.active ?? true,
      subscriptionOnly: p.subscription_only ?? false,
      subscriptionPlans: plans,
    };
  });

// ─── Orders ──────────────────────────────────────────────────────────────────

const orderItemSchema = z
  .object({
    id: idSchema,
    name: optStr,
    description: optStr,
    type: optStr,
    quantity: optNum,
    price: optNum,
    cost: optNum,
    discount: optNum,
    product: ref,
    subscription_plan: ref,
  })
  .transform(
    (i): OrderItem => ({
      id: i.id,
      name: i.name,
      description: i.description,
      type: i.type,
      quantity: i.quantity,
      price: i.price,
      cost: i.cost,
      discount: i.discount,
      productId: i.product,
      subscriptionPlanId: i.subscription_plan,
    }),
  );

const paymentPlanSchema = z
  .object({
    auto_charge: optBool,
    credit_card_id: optNum,
    days_between_payments: optNum,
    initial_payment_amount: optNum,
    number_of_payments: optNum,
    plan_start_date: optStr,
    payment_gateway: z
      .object({ merchant_account_id: optNum, merchant_account_name: optStr })
      .nullish(),
  })
  .transform(
    (p): PaymentPlan => ({
      autoCharge: p.auto_charge,
      creditCardId: p.credit_card_id,
      daysBetweenPayments: p.days_between_payments,
      initialPaymentAmount: p.initial_payment_amount,
      numberOfPayments: p.number_of_payments,
      planStartDate: p.plan_start_date,
      paymentGatewayId: p.payment_gateway?.merchant_account_id ?? null,
      merchantAccountName: p.payment_gateway?.merchant_account_name ?? null,
    }),
  );

export const OrderSchema = z
  .object({
    id: idSchema,
    title: optStr,
    status: optStr,
    total: optNum,
    total_paid: optNum,
    total_due: optNum,
    order_type: optStr,
    source_type: optStr,
    order_date: optStr,
    creation_date: optStr,
    modification_date: optStr,
    contact_id: optNum,
    contact: ref,
    lead_affiliate_id: optNum,
    sales_affiliate_id: optNum,
    invoice_number: optNum,
    recurring: optBool,
    order_items: list(orderItemSchema),
    payment_plan: paymentPlanSchema.nullish(),
  })
  .transform(
    (o): Order => ({
      id: o.id,
      title: o.title,
      status: o.status,
      total: o.total,
      totalPaid: o.total_paid,
      totalDue: o.total_due,
      orderType: o.order_type,
      sourceType: o.source_type,
      orderDate: o.order_date,
      creationDate: o.creation_date,
      modificationDate: o.modification_date,
      contactId: o.contact_id ?? o.contact,
      leadAffiliateId: o.lead_affiliate_id,
      salesAffiliateId: o.sales_affiliate_id,
      invoiceNumber: o.invoice_number,
      recurring: o.recurring,
      items: o.order_items,
      paymentPlan: o.payment_plan ?? null,
    }),
  );

export const orderPaymentSchema = (orderId: number) =>
  z
    .object({
      id: idSchema,
      amount: optNum,
      note: optStr,
      pay_date: optStr,
      pay_status: optStr,
      invoice_id: optNum,
      payment_id: optNum,
      skip_commission: optBool,
    })
    .transform(
      (p): OrderPayment => ({
        id: p.id,
        orderId,
        amount: p.amount,
        note: p.note,
        payDate: p.pay_date,
        payStatus: p.pay_status,
        invoiceId: p.invoice_id,
        paymentId: p.payment_id,
        skipCommission: p.skip_commission ?? false,
      }),
    );

export const orderTransactionSchema = (orderId: number) =>
  z
    .object({
      id: idSchema,
      amount: optNum,
      currency: optStr,
      gateway: optStr,
      type: optStr,
      status: optStr,
      test: optBool,
      transaction_date: optStr,
      payment_id: optNum,
    })
    .transform(
      (t): OrderTransaction => ({
        id: t.id,
        orderId,
        amount: t.amount,
        currency: t.currency,
        gateway: t.gateway,
        type: t.type,
        status: t.status,
        test: t.test ?? false,
        transactionDate: t.transaction_date,
        paymentId: t.payment_id,
      }),
    );

// ─── Affiliates ──────────────────────────────────────────────────────────────

export const AffiliateSchema = z
  .object({
    id: idSchema,
    code: optStr,
    name: optStr,
    contact_id: optNum,
    parent_id: optNum,
    status: optStr,
    notify_on_lead: optBool,
    notify_on_sale: optBool,
    track_leads_for: optNum,
  })
  .transform(
    (a): Affiliate => ({
      id: a.id,
      code: a.code,
      name: a.name,
      contactId: a.contact_id,
      parentId: a.parent_id,
      status: a.status,
      notifyOnLead: a.notify_on_lead,
      notifyOnSale: a.notify_on_sale,
      trackLeadsFor: a.track_leads_for,
    }),
  );

export const affiliatePaymentSchema = (affiliateId: number) =>
  z
    .object({ id: idSchema, amount: optNum, date: optStr, notes: optStr, type: optStr })
    .transform(
      (p): AffiliatePayment => ({
        id: p.id,
        affiliateId,
        amount: p.amount,
        date: p.date,
        notes: p.notes,
        type: p.type,
      }),
    );

export const affiliateClawbackSchema = (affiliateId: number) =>
  z
    .object({
      id: idSchema,
      amount: optNum,
      contact_id: optNum,
      date_earned: optStr,
      description: optStr,
      product_name: optStr,
    })
    .transform(
      (c): AffiliateClawback => ({
        id: c.id,
        affiliateId,
        amount: c.amount,
        contactId: c.contact_id,
        dateEarned: c.date_earned,
        description: c.description,
        productName: c.product_name,
      }),
    );

// ─── Subscriptions ───────────────────────────────────────────────────────────

export const SubscriptionSchema = z
  .object({
    id: idSchema,
    contact_id: optNum,
    product_id: optNum,
    subscription_plan_id: optNum,
    status: optStr,
    billing_cycle: optStr,
    billing_amount: optNum,
    next_bill_date: optStr,
    start_date: optStr,
    end_date: optStr,
    payment_gateway_id: optNum,
    credit_card_id: optNum,
  })
  .transform(
    (s): Subscription => ({
      id: s.id,
      contactId: s.contact_id,
      productId: s.product_id,
      subscriptionPlanId: s.subscription_plan_id,
      status: s.status,
      billingCycle: s.billing_cycle,
      billingAmount: s.billing_amount,
      nextBillDate: s.next_bill_date,
      startDate: s.start_date,
      endDate: s.end_date,
      paymentGatewayId: s.payment_gateway_id,
      creditCardId: s.credit_card_id,
    }),
  );

// ─── Custom fields ───────────────────────────────────────────────────────────

export const CustomFieldSchema = z
  .object({
    id: idSchema,
    label: optStr,
    field_name: optStr,
    field_type: optStr,
    record_type: optStr,
    default_value: optStr,
    options: z.array(z.unknown()).nullish(),
  })
  .transform(
    (f): RawCustomField => ({
      id: f.id,
      label: f.label,
      fieldName: f.field_name,
      fieldType: f.field_type,
      recordType: f.record_type,
      defaultValue: f.default_value,
      options: f.options ?? [],
    }),
  );

/** `{model}/model` responses carry custom fields as an array or keyed by name. */
export const CustomFieldModelSchema = z.object({
  custom_fields: z
    .union([z.array(z.unknown()), z.record(z.string(), z.unknown())])
    .nullish(),
});

// ─── Opportunities, tasks, notes, campaigns ──────────────────────────────────

export const OpportunitySchema = z
  .object({
    id: idSchema,
    opportunity_title: optStr,
    contact: ref,
    stage: z.object({ name: optStr }).passthrough().nullish(),
    projected_revenue_high: optNum,
    projected_revenue_low: optNum,
    next_action_date: optStr,
    next_action_notes: optStr,
    user: ref,
    date_created: optStr,
    last_updated: optStr,
  })
  .transform(
    (o): Opportunity => ({
      id: o.id,
      title: o.opportunity_title,
      contactId: o.contact,
      stageName: o.stage?.name ?? null,
      projectedRevenueHigh: o.projected_revenue_high,
      projectedRevenueLow: o.projected_revenue_low,
      nextActionDate: o.next_action_date,
      nextActionNotes: o.next_action_notes,
      ownerId: o.user,
      dateCreated: o.date_created,
      lastUpdated: o.last_updated,
    }),
  );

export const TaskSchema = z
  .object({
    id: idSchema,
    title: optStr,
    description: optStr,
    contact: ref,
    type: optStr,
    priority: optNum,
    completed: optBool,
    due_date: optStr,
    completion_date: optStr,
    creation_date: optStr,
  })
  .transform(
    (t): Task => ({
      id: t.id,
      title: t.title,
      description: t.description,
      contactId: t.contact,
      type: t.type,
      priority: t.priority,
      completed: t.completed,
      dueDate: t.due_date,
      completionDate: t.completion_date,
      creationDate: t.creation_date,
    }),
  );

export const NoteSchema = z
  .object({
    id: idSchema,
    title: optStr,
    body: optStr,
    type: optStr,
    contact_id: optNum,
    date_created: optStr,
    last_updated: optStr,
  })
  .transform(
    (n): Note => ({
      id: n.id,
      title: n.title,
      body: n.body,
      type: n.type,
      contactId: n.contact_id,
      dateCreated: n.date_created,
      lastUpdated: n.last_updated,
    }),
  );

export const CampaignSchema = z
  .object({
    id: idSchema,
    name: optStr,
    description: optStr,
    published_status: optStr,
    active_contact_count: optNum,
    completed_contact_count: optNum,
    published_date: optStr,
    time_zone: optStr,
  })
  .transform(
    (c): Campaign => ({
      id: c.id,
      name: c.name,
      description: c.description,
      status: c.published_status,
      activeContactCount: c.active_contact_count,
      completedContactCount: c.completed_contact_count,
      publishedDate: c.published_date,
      timeZone: c.time_zone,
    }),
  );

// ─── Listing envelope ────────────────────────────────────────────────────────

export const ListEnvelopeSchema = z
  .object({
    next: z.string().nullish(),
    count: z.number().optional(),
    total: z.number().optional(),
  })
  .passthrough();
