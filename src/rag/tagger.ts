/**
 * Tagger Module
 *
 * Derives lightweight metadata for a post from its text alone. Pure and
 * deterministic: the same text always yields the same metadata, regardless
 * of where the post sits in the corpus.
 */

import {
  CATEGORY_RULES,
  EMOJI_PATTERN,
  SEASON_RULES,
  TOPIC_RULES,
  type Category,
  type KeywordRule,
  type Season,
  type Topic,
} from './rules.js';

export interface PostMetadata {
  category: Category;
  topics: Topic[];
  season?: Season;
  lengthChars: number;
  hasEmoji: boolean;
  hasHashtag: boolean;
}

function matches<L extends string>(rule: KeywordRule<L>, lowered: string): boolean {
  return rule.keywords.some((keyword) => lowered.includes(keyword));
}

/**
 * Label of the first rule in `rules` that matches, if any.
 */
export function firstMatch<L extends string>(
  rules: readonly KeywordRule<L>[],
  lowered: string
): L | undefined {
  return rules.find((rule) => matches(rule, lowered))?.label;
}

/**
 * Labels of every rule in `rules` that matches, in table order.
 */
export function allMatches<L extends string>(
  rules: readonly KeywordRule<L>[],
  lowered: string
): L[] {
  return rules.filter((rule) => matches(rule, lowered)).map((rule) => rule.label);
}

/**
 * Tag a post with category, topics, season and simple surface features.
 *
 * @example
 * tagPost('Интересный факт про ароматы ✨').category // 'educational'
 */
export function tagPost(text: string): PostMetadata {
  const lowered = text.toLowerCase();
  const season = firstMatch(SEASON_RULES, lowered);

  return {
    category: firstMatch(CATEGORY_RULES, lowered) ?? 'general',
    topics: allMatches(TOPIC_RULES, lowered),
    ...(season ? { season } : {}),
    lengthChars: [...text].length,
    hasEmoji: EMOJI_PATTERN.test(text),
    hasHashtag: text.includes('#'),
  };
}
