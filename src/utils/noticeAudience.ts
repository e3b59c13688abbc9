import { NoticeAudience } from '../types';

export type CategoryAudienceTable = Readonly<Record<string, NoticeAudience>>;

export interface AudienceResolver {
  /** Audience of a category per the table, or null when the category is in neither set. */
  forCategory(category: string): NoticeAudience | null;
  /** Audience for a notice being created: an explicit choice wins over the table. */
  onCreate(category: string, explicit?: NoticeAudience | null): NoticeAudience | null;
  /** Audience after an update, given what is stored and what the caller changed. */
  onUpdate(
    stored: { category: string; audience: NoticeAudience | null },
    changes: { category?: string; audience?: NoticeAudience | null }
  ): NoticeAudience | null;
}

export function createAudienceResolver(table: CategoryAudienceTable): AudienceResolver {
  const lookup = new Map<string, NoticeAudience>(Object.entries(table));

  const forCategory = (category: string): NoticeAudience | null => lookup.get(category) ?? null;

  return {
    forCategory,
    onCreate(category, explicit) {
      return explicit ?? forCategory(category);
    },
    onUpdate(stored, changes) {
      if (changes.audience) return changes.audience;
      if (changes.category !== undefined && changes.category !== stored.category) {
        return forCategory(changes.category) ?? stored.audience;
      }
      return stored.audience ?? forCategory(stored.category);
    },
  };
}
