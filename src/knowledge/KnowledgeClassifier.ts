/**
 * KnowledgeClassifier - Category and type inference for exported pages
 *
 * Pure functions: the same path and content always give the same answer.
 */

import { CATEGORIES, Category, DEFAULT_CATEGORY, DEFAULT_TYPE, KnowledgeType } from './types';

/** Content keywords, checked in this order when no folder decides */
const CATEGORY_KEYWORDS: ReadonlyArray<[Category, string[]]> = [
  ['Networking', ['vpn', 'subnet', 'network', 'gateway', 'cidr', 'dns']],
  ['Security', ['incident', 'vulnerability', 'threat', 'siem', 'soc', 'security']]
];

/** File name rules; the first match wins */
const TYPE_RULES: ReadonlyArray<[KnowledgeType, (name: string) => boolean]> = [
  ['meeting_notes', name => name.includes('meeting-notes') || name.includes('meeting_notes')],
  ['knowledge', name => name.startsWith('knowledge') || name.includes('knowledge-')],
  ['credentials', name => name.includes('credentials')],
  // Sources exported as pages, e.g. check_gateway.py.md
  ['code', name => /\.(py|ps1|sh|js|ts|yaml|yml|json|xml|cs)\.md$/.test(name)]
];

const CATEGORY_NAMES: readonly string[] = CATEGORIES;

function isCategory(value: string): value is Category {
  return CATEGORY_NAMES.includes(value);
}

/**
 * @param folders - directories between the scanned root and the file, outermost first
 */
export function inferCategory(folders: string[], content: string): Category {
  for (let i = folders.length - 1; i >= 0; i--) {
    const folder = folders[i];
    if (isCategory(folder)) {
      return folder;
    }
  }

  const lower = content.toLowerCase();
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some(keyword => lower.includes(keyword))) {
      return category;
    }
  }

  return DEFAULT_CATEGORY;
}

export function inferType(fileName: string): KnowledgeType {
  const name = fileName.toLowerCase();
  for (const [type, matches] of TYPE_RULES) {
    if (matches(name)) {
      return type;
    }
  }
  return DEFAULT_TYPE;
}
