/**
 * Keyword rule tables used by the tagger.
 *
 * Each table is evaluated in the order written here. For categories and
 * seasons the first rule with a matching keyword wins; topics collect every
 * matching rule. Keywords are lowercase stems matched by plain substring
 * containment, so `весн` also matches `весна`, `весенний` and so on.
 *
 * The category order (educational before seasonal before fragrance, ...)
 * decides which label a post gets when it mentions several things. Existing
 * tagged corpora depend on it; do not reorder.
 */

export const CATEGORIES = [
  'educational',
  'seasonal',
  'fragrance',
  'decor',
  'commercial',
  'process',
  'general',
] as const;

export type Category = (typeof CATEGORIES)[number];

export const SEASONS = ['winter', 'spring', 'summer', 'autumn'] as const;

export type Season = (typeof SEASONS)[number];

export const TOPICS = ['ароматы', 'декор', 'процесс', 'материалы', 'праздники', 'подарки'] as const;

export type Topic = (typeof TOPICS)[number];

export interface KeywordRule<L extends string> {
  label: L;
  keywords: readonly string[];
}

/** Ordered; `general` is the fallback and has no rule. */
export const CATEGORY_RULES: readonly KeywordRule<Exclude<Category, 'general'>>[] = [
  { label: 'educational', keywords: ['интересн', 'факт'] },
  { label: 'seasonal', keywords: ['новогод', 'новый год', 'рождеств', '8 марта', 'весн'] },
  { label: 'fragrance', keywords: ['аромат', 'запах', 'парфюм'] },
  { label: 'decor', keywords: ['декор', 'сухоцвет', 'камн'] },
  { label: 'commercial', keywords: ['заказ', 'подарок', 'цена'] },
  { label: 'process', keywords: ['процесс', 'создан', 'изготовл'] },
];

export const TOPIC_RULES: readonly KeywordRule<Topic>[] = [
  { label: 'ароматы', keywords: ['аромат', 'запах', 'парфюм', 'отдушк'] },
  { label: 'декор', keywords: ['декор', 'сухоцвет', 'камн', 'украшен'] },
  { label: 'процесс', keywords: ['процесс', 'создан', 'изготовл', 'ручн'] },
  { label: 'материалы', keywords: ['воск', 'кокосов', 'натуральн', 'качеств'] },
  { label: 'праздники', keywords: ['новогод', 'новый год', 'рождеств', '8 марта', 'праздник'] },
  { label: 'подарки', keywords: ['подарок', 'подар', 'заказ', 'сюрприз'] },
];

export const SEASON_RULES: readonly KeywordRule<Season>[] = [
  { label: 'winter', keywords: ['новогод', 'новый год', 'рождеств', 'зим'] },
  { label: 'spring', keywords: ['весн', '8 марта'] },
  { label: 'summer', keywords: ['лет'] },
  { label: 'autumn', keywords: ['осен'] },
];

/**
 * Pictographic ranges counted as emoji: emoticons, miscellaneous symbols and
 * pictographs, transport and map symbols.
 */
export const EMOJI_PATTERN = /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}]/u;
