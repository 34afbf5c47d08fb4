import {
  Campaign,
  Note,
  Opportunity,
  Task,
} from "../domain/entities/crm-records.entity.js";
import { EntityType } from "../domain/entities/entity-type.entity.js";
import { ErrorContext } from "../domain/entities/error-record.entity.js";
import { ColumnValue, StoreTable } from "../domain/repositories/entity-store.repository.js";
import {
  ICrmApi,
  Identified,
  ListPage,
  ListQuery,
} from "../domain/services/crm-api.service.js";
import { BaseEntityLoader, LoaderDeps } from "./base-entity.loader.js";

/** Everything that differs between the loaders with no sub-resources. */
export interface SimpleEntityDescriptor<T extends Identified> {
  entityType: EntityType;
  table: StoreTable;
  list(api: ICrmApi, query: ListQuery): Promise<ListPage<Identified>>;
  get(api: ICrmApi, id: number): Promise<T>;
  /** Queryable columns stored beside the JSON payload. */
  columns(record: T): Record<string, ColumnValue>;
  /** Contact the record belongs to, checked before the write. */
  contactId?(record: T): number | null;
  describe(record: T): ErrorContext;
}

export class SimpleEntityLoader<T extends Identified> extends BaseEntityLoader<T> {
  readonly entityType: EntityType;

  constructor(
    deps: LoaderDeps,
    private readonly descriptor: SimpleEntityDescriptor<T>,
  ) {
    super(deps);
    this.entityType = descriptor.entityType;
  }

  protected listPage(query: ListQuery): Promise<ListPage<Identified>> {
    return this.descriptor.list(this.api, query);
  }

  protected fetchDetail(id: number): Promise<T> {
    return this.descriptor.get(this.api, id);
  }

  protected async resolveRelationships(record: T): Promise<T> {
    const contactId = this.descriptor.contactId?.(record) ?? null;
    if (contactId !== null && !this.store.exists("contacts", contactId)) {
      this.logger.warn("Referenced contact not found locally", { id: record.id, contactId });
    }
    return record;
  }

  protected persist(record: T): void {
    this.store.upsert(this.descriptor.table, {
      ...this.descriptor.columns(record),
      id: record.id,
      data: record,
    });
  }

  protected override describe(record: T): ErrorContext {
    return this.descriptor.describe(record);
  }
}

export const OPPORTUNITY_DESCRIPTOR: SimpleEntityDescriptor<Opportunity> = {
  entityType: "opportunities",
  table: "opportunities",
  list: (api, query) => api.listOpportunities(query),
  get: (api, id) => api.getOpportunity(id),
  columns: (o) => ({ contact_id: o.contactId, title: o.title }),
  contactId: (o) => o.contactId,
  describe: (o) => ({ title: o.title, stage: o.stageName, contact_id: o.contactId }),
};

export const TASK_DESCRIPTOR: SimpleEntityDescriptor<Task> = {
  entityType: "tasks",
  table: "tasks",
  list: (api, query) => api.listTasks(query),
  get: (api, id) => api.getTask(id),
  columns: (t) => ({ contact_id: t.contactId, title: t.title }),
  contactId: (t) => t.contactId,
  describe: (t) => ({ title: t.title, priority: t.priority, due_date: t.dueDate, contact_id: t.contactId }),
};

export const NOTE_DESCRIPTOR: SimpleEntityDescriptor<Note> = {
  entityType: "notes",
  table: "notes",
  list: (api, query) => api.listNotes(query),
  get: (api, id) => api.getNote(id),
  columns: (n) => ({ contact_id: n.contactId, title: n.title }),
  contactId: (n) => n.contactId,
  describe: (n) => ({ title: n.title, type: n.type, contact_id: n.contactId }),
};

export const CAMPAIGN_DESCRIPTOR: SimpleEntityDescriptor<Campaign> = {
  entityType: "campaigns",
  table: "campaigns",
  list: (api, query) => api.listCampaigns(query),
  get: (api, id) => api.getCampaign(id),
  columns: (c) => ({ name: c.name }),
  describe: (c) => ({ name: c.name, status: c.status }),
};
