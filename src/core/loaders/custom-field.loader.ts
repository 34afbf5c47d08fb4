import {
  CUSTOM_FIELD_MODELS,
  CUSTOM_FIELD_TYPES,
  CustomField,
  CustomFieldModel,
  CustomFieldType,
  RawCustomField,
} from "../domain/entities/crm-records.entity.js";
import { ErrorContext } from "../domain/entities/error-record.entity.js";
import { errorClassName, errorMessage } from "../domain/errors/api.errors.js";
import { ListPage } from "../domain/services/crm-api.service.js";
import { ILogger } from "../domain/services/logger.service.js";
import { BaseEntityLoader } from "./base-entity.loader.js";

/** Upstream field type names that differ from the stored enumeration. */
const FIELD_TYPE_ALIASES: Readonly<Record<string, CustomFieldType>> = {
  textarea: "MULTILINE",
  wholenumber: "NUMBER",
  decimalnumber: "NUMBER",
  website: "URL",
  email: "EMAIL",
  yesno: "BOOLEAN",
  listbox: "MULTISELECT",
  dropdown: "DROPDOWN",
  dayofweek: "DROPDOWN",
  month: "DROPDOWN",
  year: "NUMBER",
  state: "TEXT",
  name: "TEXT",
  socialsecuritynumber: "TEXT",
  drilldown: "DROPDOWN",
};

function isCustomFieldType(value: string): value is CustomFieldType {
  return (CUSTOM_FIELD_TYPES as readonly string[]).includes(value);
}

/**
 * Store type for an upstream field type name. Unknown names become TEXT with
 * a warning so one odd definition does not fail the batch.
 */
export function mapCustomFieldType(upstream: string | null, logger?: ILogger): CustomFieldType {
  if (!upstream) return "TEXT";
  const key = upstream.replace(/[\s_-]/g, "").toLowerCase();
  const alias = FIELD_TYPE_ALIASES[key];
  if (alias) return alias;
  const upper = key.toUpperCase();
  if (isCustomFieldType(upper)) return upper;
  logger?.warn("Unmapped custom field type, storing as TEXT", { upstreamType: upstream });
  return "TEXT";
}

export function toCustomField(
  raw: RawCustomField,
  model: CustomFieldModel,
  logger?: ILogger,
): CustomField {
  return {
    id: raw.id,
    model,
    name: raw.fieldName ?? raw.label ?? `field_${raw.id}`,
    label: raw.label,
    type: mapCustomFieldType(raw.fieldType, logger),
    upstreamType: raw.fieldType,
    defaultValue: raw.defaultValue,
    options: raw.options,
  };
}

/** Definitions from every model in one unpaginated sweep, written as listed. */
export class CustomFieldLoader extends BaseEntityLoader<CustomField, CustomField, CustomField> {
  readonly entityType = "custom_fields";
  override readonly supportsPagination = false;
  override readonly supportsSince = false;

  protected async listPage(): Promise<ListPage<CustomField>> {
    const items: CustomField[] = [];
    for (const model of CUSTOM_FIELD_MODELS) {
      let raw: RawCustomField[];
      try {
        raw = await this.api.listCustomFields(model);
      } catch (err) {
        if (this.mustPropagate(err)) throw err;
        this.recordModelFailure(model, err);
        continue;
      }
      if (raw.length === 0) {
        this.logger.warn("No custom fields found", { model });
        continue;
      }
      this.logger.info("Fetched custom fields", { model, count: raw.length });
      items.push(...raw.map((field) => toCustomField(field, model, this.logger)));
    }
    return { items, next: null };
  }

  /** A model that cannot be listed is skipped; the others still load. */
  private recordModelFailure(model: CustomFieldModel, err: unknown): void {
    this.logger.error("Failed to list custom fields, skipping model", {
      model,
      error: errorMessage(err),
    });
    this.ledger.logError({
      entityType: this.entityType,
      entityId: 0,
      errorKind: errorClassName(err),
      message: errorMessage(err),
      additionalContext: { operation: "list_custom_fields", model_entity_type: model },
      stackTrace: err instanceof Error ? (err.stack ?? null) : null,
    });
  }

  /** Definitions cannot be fetched one by one; reports whether it is stored. */
  override async loadById(id: number): Promise<boolean> {
    if (this.store.exists("custom_fields", id)) return true;
    this.logger.warn("Custom field not found", { id });
    return false;
  }

  protected fetchDetail(id: number): Promise<CustomField> {
    return Promise.reject(new Error(`Custom field ${id} has no by-id endpoint`));
  }

  protected override processListedItem(item: CustomField): Promise<boolean> {
    return this.loadWith(item.id, () => Promise.resolve(item));
  }

  protected async resolveRelationships(field: CustomField): Promise<CustomField> {
    return field;
  }

  protected persist(field: CustomField): void {
    this.store.upsert("custom_fields", {
      id: field.id,
      model: field.model,
      name: field.name,
      type: field.type,
      data: field,
    });
  }

  protected override describe(field: CustomField): ErrorContext {
    return { field_name: field.name, field_type: field.upstreamType, model_entity_type: field.model };
  }
}
