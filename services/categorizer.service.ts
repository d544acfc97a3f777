import Joi from 'joi';
import rawCategoryTable from '../data/categories.json';
import type { AlertRecord } from '../alert.model.js';

export const CATEGORY_GROUPS = ['weather', 'geological', 'agricultural_environmental', 'other'] as const;
export type CategoryGroup = (typeof CATEGORY_GROUPS)[number];

export interface Category {
  slug: string;
  group: CategoryGroup;
  english: readonly string[];
  hindi: readonly string[];
}

export const OTHER_CATEGORY_SLUG = 'other';
export const DEFAULT_TOPIC_PREFIX = 'alerts';

type SearchableFields = Pick<AlertRecord, 'disasterType' | 'warningMessage' | 'areaDescription'>;

const categoryTableSchema = Joi.array<Category[]>()
  .items(
    Joi.object({
      slug: Joi.string()
        .pattern(/^[a-z0-9_]+$/)
        .required(),
      group: Joi.string()
        .valid(...CATEGORY_GROUPS)
        .required(),
      english: Joi.array().items(Joi.string().min(1)).required(),
      hindi: Joi.array().items(Joi.string().min(1)).required(),
    }),
  )
  .unique('slug')
  .min(1)
  .required();

/**
 * Validates a rule table: rows must be grouped in priority order
 * (weather, geological, agricultural/environmental, other) and end with
 * the pattern-less catch-all.
 */
export function loadCategoryTable(raw: unknown): readonly Category[] {
  const { value, error } = categoryTableSchema.validate(raw, { abortEarly: false });
  if (error) {
    throw new Error(`Invalid category table: ${error.message}`);
  }
  let lastGroup = 0;
  for (const category of value) {
    const group = CATEGORY_GROUPS.indexOf(category.group);
    if (group < lastGroup) {
      throw new Error(`Invalid category table: ${category.slug} is out of group priority order`);
    }
    lastGroup = group;
  }
  const fallback = value[value.length - 1];
  if (
    fallback.slug !== OTHER_CATEGORY_SLUG ||
    fallback.english.length > 0 ||
    fallback.hindi.length > 0
  ) {
    throw new Error(`Invalid category table: last row must be "${OTHER_CATEGORY_SLUG}" with no patterns`);
  }
  return Object.freeze(value);
}

export const CATEGORY_TABLE = loadCategoryTable(rawCategoryTable);

function normalize(text: string): string {
  return text.normalize('NFC').toLowerCase();
}

/** Lowercased disaster type, warning message and area description, empty fields skipped. */
export function buildSearchText(record: SearchableFields): string {
  return normalize(
    [record.disasterType, record.warningMessage, record.areaDescription]
      .filter((field): field is string => typeof field === 'string' && field.trim() !== '')
      .join(' '),
  );
}

export type Categorizer = (record: SearchableFields) => Category;

export function createCategorizer(table: readonly Category[]): Categorizer {
  const compiled = table.map((category) => ({
    category,
    patterns: [...category.english, ...category.hindi].map(normalize),
  }));
  const fallback = table[table.length - 1];

  return (record) => {
    const text = buildSearchText(record);
    if (!text) return fallback;
    // Plain substring test, so "rain" also hits "train"
    const match = compiled.find(({ patterns }) => patterns.some((p) => text.includes(p)));
    return match ? match.category : fallback;
  };
}

export const categorize: Categorizer = createCategorizer(CATEGORY_TABLE);

export function topicFor(slug: string, prefix: string = DEFAULT_TOPIC_PREFIX): string {
  return `${prefix}/${slug}`;
}

export function findCategory(slug: string): Category | undefined {
  return CATEGORY_TABLE.find((c) => c.slug === slug);
}

export interface CategoryPartition<T> {
  category: Category;
  records: T[];
}

/**
 * Groups records by category. Map order follows first appearance in the
 * batch; record order inside each partition follows the batch.
 */
export function partitionByCategory<T extends SearchableFields>(
  records: readonly T[],
  categorizer: Categorizer = categorize,
): Map<string, CategoryPartition<T>> {
  const partitions = new Map<string, CategoryPartition<T>>();
  for (const record of records) {
    const category = categorizer(record);
    const partition = partitions.get(category.slug);
    if (partition) {
      partition.records.push(record);
    } else {
      partitions.set(category.slug, { category, records: [record] });
    }
  }
  return partitions;
}
