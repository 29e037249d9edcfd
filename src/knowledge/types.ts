/**
 * Knowledge catalogue types
 */

export const CATEGORIES = ['Networking', 'Security', 'DevOps'] as const;

export type Category = (typeof CATEGORIES)[number];

export type KnowledgeType = 'code' | 'meeting_notes' | 'knowledge' | 'credentials' | 'others';

export const DEFAULT_CATEGORY: Category = 'DevOps';

export const DEFAULT_TYPE: KnowledgeType = 'others';

/**
 * One exported page as it appears in the catalogue JSON
 */
export interface KnowledgeItem {
  id: string;
  file_name: string;
  category: Category;
  type: KnowledgeType;
  content: string;
}

export interface KnowledgeCatalogue {
  items: KnowledgeItem[];
}
