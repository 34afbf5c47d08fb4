import { Tag } from "../domain/entities/crm-records.entity.js";
import { ErrorContext } from "../domain/entities/error-record.entity.js";
import { ListPage, ListQuery } from "../domain/services/crm-api.service.js";
import { BaseEntityLoader } from "./base-entity.loader.js";

export class TagLoader extends BaseEntityLoader<Tag, Tag, Tag> {
  readonly entityType = "tags";

  protected listPage(query: ListQuery): Promise<ListPage<Tag>> {
    return this.api.listTags(query);
  }

  protected fetchDetail(id: number): Promise<Tag> {
    return this.api.getTag(id);
  }

  protected async resolveRelationships(tag: Tag): Promise<Tag> {
    return tag;
  }

  protected persist(tag: Tag): void {
    const category = tag.category;
    if (category && !this.store.exists("tag_categories", category.id)) {
      this.store.upsert("tag_categories", { id: category.id, name: category.name, data: category });
      this.logger.debug("Created tag category", { categoryId: category.id });
    }
    this.store.upsert("tags", {
      id: tag.id,
      name: tag.name,
      category_id: category?.id ?? null,
      data: tag,
    });
  }

  protected override describe(tag: Tag): ErrorContext {
    return { name: tag.name, category_id: tag.category?.id ?? null };
  }
}
