/**
 * @fileoverview Indicator category table.
 *
 * Maps every indicator name to its category. The table is read once from
 * `categories.json` when this module loads and is frozen afterwards.
 *
 * @module @swingta/contracts/categories
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

export const INDICATOR_CATEGORIES = [
  'candles',
  'cycles',
  'momentum',
  'overlap',
  'performance',
  'statistics',
  'transform',
  'trend',
  'volatility',
  'volume',
] as const;

export type IndicatorCategory = (typeof INDICATOR_CATEGORIES)[number];

const categoryTableSchema = z.record(z.enum(INDICATOR_CATEGORIES), z.array(z.string().min(1)));

function loadCategoryTable(): ReadonlyMap<IndicatorCategory, readonly string[]> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('./categories.json', import.meta.url), 'utf-8')
  );
  const parsed = categoryTableSchema.parse(raw);

  return new Map(
    INDICATOR_CATEGORIES.map((category): [IndicatorCategory, readonly string[]] => [
      category,
      Object.freeze([...(parsed[category] ?? [])]),
    ])
  );
}

const CATEGORY_TABLE = loadCategoryTable();

const CATEGORY_BY_INDICATOR: ReadonlyMap<string, IndicatorCategory> = new Map(
  [...CATEGORY_TABLE].flatMap(([category, names]) =>
    names.map((name): [string, IndicatorCategory] => [name, category])
  )
);

/**
 * Category of an indicator, or `undefined` for an unknown name.
 *
 * @example
 * ```typescript
 * categoryOf('zigzag'); // 'trend'
 * ```
 */
export function categoryOf(indicator: string): IndicatorCategory | undefined {
  return CATEGORY_BY_INDICATOR.get(indicator.toLowerCase());
}

/**
 * Indicator names registered under a category, in table order.
 */
export function indicatorsIn(category: IndicatorCategory): readonly string[] {
  return CATEGORY_TABLE.get(category) ?? [];
}

export function isIndicatorCategory(value: string): value is IndicatorCategory {
  return INDICATOR_CATEGORIES.some((category) => category === value);
}
