import {
  Affiliate,
  Campaign,
  Contact,
  CreditCard,
  Note,
  Opportunity,
  Order,
  OrderItem,
  PaymentPlan,
  Product,
  Subscription,
  SubscriptionPlan,
  Tag,
  Task,
} from "../../src/core/domain/entities/crm-records.entity.js";

export function makeContact(id: number, overrides: Partial<Contact> = {}): Contact {
  return {
    id,
    givenName: `Given${id}`,
    familyName: `Family${id}`,
    middleName: null,
    companyName: null,
    jobTitle: null,
    emailAddresses: [{ email: `contact${id}@example.test`, field: "EMAIL1" }],
    phoneNumbers: [],
    addresses: [],
    tagIds: [],
    customFields: [],
    ownerId: null,
    leadSourceId: null,
    emailOptedIn: null,
    emailStatus: null,
    sourceType: null,
    timeZone: null,
    website: null,
    createdAt: "2026-01-01T00:00:00Z",
    modifiedAt: "2026-01-02T00:00:00Z",
    ...overrides,
  };
}

export function makeCreditCard(id: number, contactId: number): CreditCard {
  return {
    id,
    contactId,
    cardType: "VISA",
    cardNumber: "1111",
    expirationMonth: "01",
    expirationYear: "2030",
    cardHolderName: null,
    isDefault: false,
  };
}

export function makeTag(id: number, overrides: Partial<Tag> = {}): Tag {
  return { id, name: `Tag ${id}`, description: null, category: null, ...overrides };
}

export function makePlan(id: number, productId: number): SubscriptionPlan {
  return { id, productId, name: `Plan ${id}`, frequency: 1, cycle: "MONTH", planPrice: 10, active: true };
}

export function makeProduct(id: number, overrides: Partial<Product> = {}): Product {
  return {
    id,
    productName: `Product ${id}`,
    sku: `SKU-${id}`,
    productPrice: 25,
    productDesc: null,
    productShortDesc: null,
    active: true,
    subscriptionOnly: false,
    subscriptionPlans: [],
    ...overrides,
  };
}

export function makeOrderItem(id: number, productId: number | null): OrderItem {
  return {
    id,
    name: `Item ${id}`,
    description: null,
    type: "Product",
    quantity: 1,
    price: 25,
    cost: null,
    discount: null,
    productId,
    subscriptionPlanId: null,
  };
}

export function makePaymentPlan(overrides: Partial<PaymentPlan> = {}): PaymentPlan {
  return {
    autoCharge: true,
    creditCardId: null,
    daysBetweenPayments: 30,
    initialPaymentAmount: 10,
    numberOfPayments: 3,
    planStartDate: null,
    paymentGatewayId: null,
    merchantAccountName: null,
    ...overrides,
  };
}

export function makeOrder(id: number, overrides: Partial<Order> = {}): Order {
  return {
    id,
    title: `Order ${id}`,
    status: "PAID",
    total: 25,
    totalPaid: 25,
    totalDue: 0,
    orderType: "Online",
    sourceType: null,
    orderDate: "2026-02-01T00:00:00Z",
    creationDate: null,
    modificationDate: null,
    contactId: null,
    leadAffiliateId: null,
    salesAffiliateId: null,
    invoiceNumber: null,
    recurring: false,
    items: [],
    paymentPlan: null,
    ...overrides,
  };
}

export function makeAffiliate(id: number, overrides: Partial<Affiliate> = {}): Affiliate {
  return {
    id,
    code: `AFF${id}`,
    name: `Affiliate ${id}`,
    contactId: null,
    parentId: null,
    status: "Active",
    notifyOnLead: null,
    notifyOnSale: null,
    trackLeadsFor: null,
    ...overrides,
  };
}

export function makeSubscription(id: number, overrides: Partial<Subscription> = {}): Subscription {
  return {
    id,
    contactId: null,
    productId: null,
    subscriptionPlanId: null,
    status: "Active",
    billingCycle: "MONTH",
    billingAmount: 10,
    nextBillDate: null,
    startDate: null,
    endDate: null,
    paymentGatewayId: null,
    creditCardId: null,
    ...overrides,
  };
}

export function makeOpportunity(id: number, overrides: Partial<Opportunity> = {}): Opportunity {
  return {
    id,
    title: `Opportunity ${id}`,
    contactId: null,
    stageName: "New",
    projectedRevenueHigh: null,
    projectedRevenueLow: null,
    nextActionDate: null,
    nextActionNotes: null,
    ownerId: null,
    dateCreated: null,
    lastUpdated: null,
    ...overrides,
  };
}

export function makeTask(id: number, overrides: Partial<Task> = {}): Task {
  return {
    id,
    title: `Task ${id}`,
    description: null,
    contactId: null,
    type: "Call",
    priority: 1,
    completed: false,
    dueDate: null,
    completionDate: null,
    creationDate: null,
    ...overrides,
  };
}

export function makeNote(id: number, overrides: Partial<Note> = {}): Note {
  return {
    id,
    title: `Note ${id}`,
    body: "body",
    type: "Call",
    contactId: null,
    dateCreated: null,
    lastUpdated: null,
    ...overrides,
  };
}

export function makeCampaign(id: number, overrides: Partial<Campaign> = {}): Campaign {
  return {
    id,
    name: `Campaign ${id}`,
    description: null,
    status: "Published",
    activeContactCount: 0,
    completedContactCount: 0,
    publishedDate: null,
    timeZone: null,
    ...overrides,
  };
}
