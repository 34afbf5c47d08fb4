/**
 * Domain records produced by the wire transformers and written by the loaders.
 * Optional scalars are `null` when the upstream omits them; foreign keys are
 * `number | null` and are checked by the entity store on write.
 */

export interface Address {
  field: string | null;
  line1: string | null;
  line2: string | null;
  locality: string | null;
  region: string | null;
  postalCode: string | null;
  countryCode: string | null;
}

export interface EmailAddress {
  email: string;
  field: string | null;
}

export interface PhoneNumber {
  number: string;
  field: string | null;
  type: string | null;
}

export interface CustomFieldValue {
  id: number;
  content: unknown;
}

export interface Contact {
  id: number;
  givenName: string | null;
  familyName: string | null;
  middleName: string | null;
  companyName: string | null;
  jobTitle: string | null;
  emailAddresses: EmailAddress[];
  phoneNumbers: PhoneNumber[];
  addresses: Address[];
  tagIds: number[];
  customFields: CustomFieldValue[];
  ownerId: number | null;
  leadSourceId: number | null;
  emailOptedIn: boolean | null;
  emailStatus: string | null;
  sourceType: string | null;
  timeZone: string | null;
  website: string | null;
  createdAt: string | null;
  modifiedAt: string | null;
}

export interface CreditCard {
  id: number;
  contactId: number;
  cardType: string | null;
  cardNumber: string | null;
  expirationMonth: string | null;
  expirationYear: string | null;
  cardHolderName: string | null;
  isDefault: boolean;
}

export interface TagCategory {
  id: number;
  name: string | null;
}

export interface Tag {
  id: number;
  name: string;
  description: string | null;
  category: TagCategory | null;
}

export interface SubscriptionPlan {
  id: number;
  productId: number;
  name: string | null;
  frequency: number | null;
  cycle: string | null;
  planPrice: number | null;
  active: boolean | null;
}

export interface Product {
  id: number;
  productName: string | null;
  sku: string | null;
  productPrice: number | null;
  productDesc: string | null;
  productShortDesc: string | null;
  active: boolean;
  subscriptionOnly: boolean;
  subscriptionPlans: SubscriptionPlan[];
}

export interface OrderItem {
  id: number;
  name: string | null;
  description: string | null;
  type: string | null;
  quantity: number | null;
  price: number | null;
  cost: number | null;
  discount: number | null;
  productId: number | null;
  subscriptionPlanId: number | null;
}

export interface PaymentGateway {
  id: number;
  name: string;
  type: string;
  isActive: boolean;
}

export interface PaymentPlan {
  autoCharge: boolean | null;
  creditCardId: number | null;
  daysBetweenPayments: number | null;
  initialPaymentAmount: number | null;
  numberOfPayments: number | null;
  planStartDate: string | null;
  paymentGatewayId: number | null;
  merchantAccountName: string | null;
}

export interface OrderPayment {
  id: number;
  orderId: number;
  amount: number | null;
  note: string | null;
  payDate: string | null;
  payStatus: string | null;
  invoiceId: number | null;
  paymentId: number | null;
  skipCommission: boolean;
}

export interface OrderTransaction {
  id: number;
  orderId: number;
  amount: number | null;
  currency: string | null;
  gateway: string | null;
  type: string | null;
  status: string | null;
  test: boolean;
  transactionDate: string | null;
  paymentId: number | null;
}

export interface Order {
  id: number;
  title: string | null;
  status: string | null;
  total: number | null;
  totalPaid: number | null;
  totalDue: number | null;
  orderType: string | null;
  sourceType: string | null;
  orderDate: string | null;
  creationDate: string | null;
  modificationDate: string | null;
  contactId: number | null;
  leadAffiliateId: number | null;
  salesAffiliateId: number | null;
  invoiceNumber: number | null;
  recurring: boolean | null;
  items: OrderItem[];
  paymentPlan: PaymentPlan | null;
}

export interface Affiliate {
  id: number;
  code: string | null;
  name: string | null;
  contactId: number | null;
  parentId: number | null;
  status: string | null;
  notifyOnLead: boolean | null;
  notifyOnSale: boolean | null;
  trackLeadsFor: number | null;
}

export interface AffiliatePayment {
  id: number;
  affiliateId: number;
  amount: number | null;
  date: string | null;
  notes: string | null;
  type: string | null;
}

export interface AffiliateClawback {
  id: number;
  affiliateId: number;
  amount: number | null;
  contactId: number | null;
  dateEarned: string | null;
  description: string | null;
  productName: string | null;
}

export interface Subscription {
  id: number;
  contactId: number | null;
  productId: number | null;
  subscriptionPlanId: number | null;
  status: string | null;
  billingCycle: string | null;
  billingAmount: number | null;
  nextBillDate: string | null;
  startDate: string | null;
  endDate: string | null;
  paymentGatewayId: number | null;
  creditCardId: number | null;
}

export const CUSTOM_FIELD_TYPES = [
  "TEXT",
  "NUMBER",
  "DATE",
  "DROPDOWN",
  "MULTISELECT",
  "RADIO",
  "CHECKBOX",
  "URL",
  "EMAIL",
  "PHONE",
  "CURRENCY",
  "PERCENT",
  "SOCIAL",
  "ADDRESS",
  "IMAGE",
  "FILE",
  "LIST",
  "MULTILINE",
  "PASSWORD",
  "TIME",
  "DATETIME",
  "BOOLEAN",
  "HIDDEN",
] as const;

export type CustomFieldType = (typeof CUSTOM_FIELD_TYPES)[number];

/** Parent record kinds that carry custom field definitions upstream. */
export const CUSTOM_FIELD_MODELS = [
  "contacts",
  "companies",
  "opportunities",
  "orders",
  "subscriptions",
] as const;

export type CustomFieldModel = (typeof CUSTOM_FIELD_MODELS)[number];

/** Definition as listed upstream, before its type name is translated. */
export interface RawCustomField {
  id: number;
  label: string | null;
  fieldName: string | null;
  fieldType: string | null;
  recordType: string | null;
  defaultValue: string | null;
  options: unknown[];
}

export interface CustomField {
  id: number;
  model: CustomFieldModel;
  name: string;
  label: string | null;
  type: CustomFieldType;
  upstreamType: string | null;
  defaultValue: string | null;
  options: unknown[];
}

export interface Opportunity {
  id: number;
  title: string | null;
  contactId: number | null;
  stageName: string | null;
  projectedRevenueHigh: number | null;
  projectedRevenueLow: number | null;
  nextActionDate: string | null;
  nextActionNotes: string | null;
  ownerId: number | null;
  dateCreated: string | null;
  lastUpdated: string | null;
}

export interface Task {
  id: number;
  title: string | null;
  description: string | null;
  contactId: number | null;
  type: string | null;
  priority: number | null;
  completed: boolean | null;
  dueDate: string | null;
  completionDate: string | null;
  creationDate: string | null;
}

export interface Note {
  id: number;
  title: string | null;
  body: string | null;
  type: string | null;
  contactId: number | null;
  dateCreated: string | null;
  lastUpdated: string | null;
}

export interface Campaign {
  id: number;
  name: string | null;
  description: string | null;
  status: string | null;
  activeContactCount: number | null;
  completedContactCount: number | null;
  publishedDate: string | null;
  timeZone: string | null;
}
