import { Contact, CreditCard } from "../domain/entities/crm-records.entity.js";
import { ErrorContext } from "../domain/entities/error-record.entity.js";
import { Identified, ListPage, ListQuery } from "../domain/services/crm-api.service.js";
import { BaseEntityLoader } from "./base-entity.loader.js";

export interface PreparedContact {
  contact: Contact;
  creditCards: CreditCard[];
  /** Referenced tags that are stored locally. */
  tagIds: number[];
}

/**
 * Contacts with their credit cards and tag links. Both collections are
 * replaced on every load so links removed upstream disappear here too.
 */
export class ContactLoader extends BaseEntityLoader<Contact, PreparedContact> {
  readonly entityType = "contacts";

  protected listPage(query: ListQuery): Promise<ListPage<Identified>> {
    return this.api.listContacts(query);
  }

  protected fetchDetail(id: number): Promise<Contact> {
    return this.api.getContact(id);
  }

  protected async resolveRelationships(contact: Contact): Promise<PreparedContact> {
    const creditCards = await this.fetchOptional(
      `credit cards of contact ${contact.id}`,
      () => this.api.listContactCreditCards(contact.id),
      [],
    );

    const tagIds: number[] = [];
    for (const tagId of new Set(contact.tagIds)) {
      if (await this.ensureLoaded("tags", "tags", tagId)) tagIds.push(tagId);
      else this.logger.warn("Skipping tag missing locally", { contactId: contact.id, tagId });
    }
    return { contact, creditCards, tagIds };
  }

  protected persist({ contact, creditCards, tagIds }: PreparedContact): void {
    this.store.upsert("contacts", {
      id: contact.id,
      given_name: contact.givenName,
      family_name: contact.familyName,
      email: contact.emailAddresses[0]?.email ?? null,
      data: contact,
    });
    this.store.replaceChildren(
      "credit_cards",
      "contact_id",
      contact.id,
      creditCards.map((card) => ({ id: card.id, card_type: card.cardType, data: card })),
    );
    this.store.replaceLinks("contact_tags", "contact_id", contact.id, "tag_id", tagIds);
  }

  protected override describe(contact: Contact): ErrorContext {
    return {
      given_name: contact.givenName,
      family_name: contact.familyName,
      date_created: contact.createdAt,
      last_updated: contact.modifiedAt,
    };
  }
}
